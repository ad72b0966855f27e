/**
 * helmsman halt / helmsman resume — The manual kill switch
 *
 * A halt stops every new admission and every further dispatch attempt. It
 * persists across restarts until an explicit resume. Resuming acknowledges
 * the failures counted so far.
 *
 * @see docs/governance.md §4.4 (cascading failure monitor)
 */

import { Command } from 'commander';
import { describeHalt } from '@helmsman/kernel';
import { t } from '../output/theme.js';
import { CLI_ACTOR_KIND, fail, print, runtimeFor } from './shared.js';

export const haltCommand = new Command('halt')
  .description('Suspend autonomy now (kill switch)')
  .argument('[reason]', 'Reason recorded with the halt', 'operator_halt')
  .option('--actor <id>', 'Operator identity', 'operator')
  .action((reason: string, options: { actor: string }, command: Command) => {
    try {
      const { pipeline } = runtimeFor(command);
      const tripped = pipeline.halt(reason, `${CLI_ACTOR_KIND}:${options.actor}`);
      const state = pipeline.status().halt;
      print(tripped ? t.red(`■ ${describeHalt(state)}`) : t.amber(`Already halted: ${describeHalt(state)}`));
    } catch (err: unknown) {
      fail('halt', err);
    }
  });

export const resumeCommand = new Command('resume')
  .description('Clear the halt and resume autonomy')
  .option('--actor <id>', 'Operator identity', 'operator')
  .action((options: { actor: string }, command: Command) => {
    try {
      const { pipeline } = runtimeFor(command);
      if (!pipeline.status().halt.active) {
        print('Autonomy is already active.');
        return;
      }
      const previous = pipeline.resume(`${CLI_ACTOR_KIND}:${options.actor}`);
      print(t.green(`◈ autonomy active`) + t.dim(` (cleared: ${previous.reason ?? 'unknown'})`));
    } catch (err: unknown) {
      fail('resume', err);
    }
  });
