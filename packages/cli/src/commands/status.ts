/**
 * helmsman status — Autonomy state, budgets, paths and outcome statistics
 *
 * @see docs/governance.md §4.4 (cascading failure monitor)
 */

import { Command } from 'commander';
import { renderStatus } from '../output/format.js';
import { fail, print, printJson, runtimeFor } from './shared.js';

export const statusCommand = new Command('status')
  .description('Show autonomy state, rate budget, failure window, paths and per-type outcomes')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    try {
      const { pipeline } = runtimeFor(command);
      const status = pipeline.status();
      if (options.json === true) {
        printJson(status);
        return;
      }
      print(renderStatus(status));
    } catch (err: unknown) {
      fail('status', err);
    }
  });
