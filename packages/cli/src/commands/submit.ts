/**
 * helmsman submit — Propose one action
 *
 *   helmsman submit action.json          evaluate and dispatch now
 *   helmsman submit - < action.json      read the action from stdin
 *   helmsman submit action.json --enqueue  hand it to a running `helmsman run`
 *
 * The action is validated before it reaches the governor. A DENY or a
 * dispatch that does not succeed exits with status 1.
 *
 * @see docs/governance.md §4.1 (safety governor)
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { parseActionJson } from '@helmsman/autopilot';
import { ActionState, ConfigurationError } from '@helmsman/kernel';
import { FileCandidateInbox } from '@helmsman/runtime-host';
import { renderDecision, renderRecord } from '../output/format.js';
import { t } from '../output/theme.js';
import { fail, print, printJson, runtimeFor } from './shared.js';

function readSource(source: string): string {
  return source === '-' ? readFileSync(0, 'utf-8') : readFileSync(source, 'utf-8');
}

export const submitCommand = new Command('submit')
  .description('Submit an action (JSON file, or - for stdin) to the safety governor')
  .argument('<source>', "Path to an action JSON file, or '-' for stdin")
  .option('--enqueue', 'Append to the candidate inbox for the running loop instead of dispatching here')
  .option('--json', 'Output as JSON')
  .action(async (source: string, options: { enqueue?: boolean; json?: boolean }, command: Command) => {
    try {
      const text = readSource(source);
      const parsed = parseActionJson(text, new Date());
      if (!parsed.ok) throw new ConfigurationError(parsed.issues.map((issue) => `action: ${issue}`));

      const runtime = runtimeFor(command);
      if (options.enqueue === true) {
        new FileCandidateInbox(runtime.paths.inbox).append(JSON.stringify(parsed.action));
        print(`Queued ${parsed.action.id} for the next loop tick.`);
        return;
      }

      const submission = await runtime.pipeline.submit(parsed.action);
      if (options.json === true) {
        printJson(submission);
      } else {
        print(renderDecision(submission.decision));
        if (submission.kind !== 'denied') print('\n' + renderRecord(submission.record));
        if (submission.kind === 'escalated') {
          print(t.amber(`\nAwaiting approval: helmsman escalations approve ${submission.record.action_id}`));
        }
      }
      if (
        submission.kind === 'denied' ||
        (submission.kind === 'dispatched' && submission.record.state !== ActionState.Succeeded)
      ) {
        process.exitCode = 1;
      }
    } catch (err: unknown) {
      fail('submit', err);
    }
  });
