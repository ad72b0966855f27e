/**
 * helmsman paths — The execution path table
 *
 * Subcommands:
 *   helmsman paths list    [--json]
 *   helmsman paths enable  <name>
 *   helmsman paths disable <name>
 *   helmsman paths set     <name> [--timeout <ms>] [--priority <n>] [--reliability <0..1>]
 *
 * Changes are validated, persisted to state/paths.json and apply to the
 * next dispatch.
 *
 * @see docs/governance.md §4.2 (path dispatcher)
 */

import { Command } from 'commander';
import type { PathUpdate } from '@helmsman/autopilot';
import { renderPaths } from '../output/format.js';
import { fail, parseNumberOption, print, printJson, runtimeFor } from './shared.js';

const listCommand = new Command('list')
  .description('List execution paths in dispatch order')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    try {
      const { registry, pipeline } = runtimeFor(command);
      if (options.json === true) {
        printJson({ paths: registry.list(), stats: pipeline.dispatcher.pathStats() });
        return;
      }
      print(renderPaths(registry.list(), pipeline.dispatcher.pathStats()));
    } catch (err: unknown) {
      fail('paths', err);
    }
  });

const enableCommand = new Command('enable')
  .description('Enable an execution path')
  .argument('<name>', 'Path name')
  .action((name: string, _options: unknown, command: Command) => {
    try {
      const { registry, pipeline } = runtimeFor(command);
      print(renderPaths(registry.enable(name), pipeline.dispatcher.pathStats()));
    } catch (err: unknown) {
      fail('paths', err);
    }
  });

const disableCommand = new Command('disable')
  .description('Disable an execution path')
  .argument('<name>', 'Path name')
  .action((name: string, _options: unknown, command: Command) => {
    try {
      const { registry, pipeline } = runtimeFor(command);
      print(renderPaths(registry.disable(name), pipeline.dispatcher.pathStats()));
    } catch (err: unknown) {
      fail('paths', err);
    }
  });

const setCommand = new Command('set')
  .description("Change a path's timeout, priority or reliability estimate")
  .argument('<name>', 'Path name')
  .option('--timeout <ms>', 'Attempt timeout in milliseconds')
  .option('--priority <n>', 'Dispatch priority (lower first)')
  .option('--reliability <estimate>', 'Prior reliability estimate in [0, 1]')
  .action(
    (name: string, options: { timeout?: string; priority?: string; reliability?: string }, command: Command) => {
      try {
        const patch: { -readonly [K in keyof PathUpdate]: PathUpdate[K] } = {};
        const timeout = parseNumberOption('--timeout', options.timeout);
        const priority = parseNumberOption('--priority', options.priority);
        const reliability = parseNumberOption('--reliability', options.reliability);
        if (timeout !== undefined) patch.timeout_ms = timeout;
        if (priority !== undefined) patch.priority = priority;
        if (reliability !== undefined) patch.reliability_estimate = reliability;

        const { registry, pipeline } = runtimeFor(command);
        print(renderPaths(registry.update(name, patch), pipeline.dispatcher.pathStats()));
      } catch (err: unknown) {
        fail('paths', err);
      }
    },
  );

export const pathsCommand = new Command('paths')
  .description('Inspect and change the execution path table')
  .addCommand(listCommand)
  .addCommand(enableCommand)
  .addCommand(disableCommand)
  .addCommand(setCommand);
