/**
 * helmsman escalations — Review escalated actions
 *
 * Subcommands:
 *   helmsman escalations list    [--json]
 *   helmsman escalations approve <id> [--actor <id>]
 *   helmsman escalations reject  <id> [--reason "<reason>"] [--actor <id>]
 *
 * <id> is a full action id or a unique prefix. The CLI approves as a
 * human-class actor; an approved action is re-evaluated by the governor
 * (halt, rate limit and blast radius still apply) and dispatched here.
 *
 * @see docs/governance.md §4.3 (action state machine)
 */

import { Command } from 'commander';
import type { Actor } from '@helmsman/autopilot';
import { ActionState } from '@helmsman/kernel';
import { renderDecision, renderEscalations, renderRecord } from '../output/format.js';
import { fail, print, printJson, runtimeFor } from './shared.js';

function cliActor(id: string): Actor {
  return { kind: 'cli', id };
}

const listCommand = new Command('list')
  .description('List escalations awaiting approval, oldest first')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    try {
      const pending = runtimeFor(command).escalations.list();
      if (options.json === true) {
        printJson(pending);
        return;
      }
      print(renderEscalations(pending));
    } catch (err: unknown) {
      fail('escalations', err);
    }
  });

const approveCommand = new Command('approve')
  .description('Approve an escalated action and dispatch it')
  .argument('<id>', 'Action id or unique prefix')
  .option('--actor <id>', 'Operator identity', 'operator')
  .action(async (id: string, options: { actor: string }, command: Command) => {
    try {
      const result = runtimeFor(command).escalations.approve(id, cliActor(options.actor));
      if (!result.ok) {
        if (result.decision !== null) print(renderDecision(result.decision));
        process.stderr.write(`[helmsman escalations] ${result.error}\n`);
        process.exit(1);
      }
      print(renderDecision(result.decision));
      const settled = await result.completion;
      if (settled.kind !== 'denied') {
        print('\n' + renderRecord(settled.record));
        if (settled.record.state !== ActionState.Succeeded) process.exitCode = 1;
      }
    } catch (err: unknown) {
      fail('escalations', err);
    }
  });

const rejectCommand = new Command('reject')
  .description('Reject an escalated action')
  .argument('<id>', 'Action id or unique prefix')
  .option('--reason <reason>', 'Reason recorded on the record', 'rejected by operator')
  .option('--actor <id>', 'Operator identity', 'operator')
  .action((id: string, options: { reason: string; actor: string }, command: Command) => {
    try {
      const result = runtimeFor(command).escalations.reject(id, cliActor(options.actor), options.reason);
      if (!result.ok) {
        process.stderr.write(`[helmsman escalations] ${result.error}\n`);
        process.exit(1);
      }
      print(renderRecord(result.record));
    } catch (err: unknown) {
      fail('escalations', err);
    }
  });

export const escalationsCommand = new Command('escalations')
  .description('Review actions escalated for operator approval')
  .addCommand(listCommand)
  .addCommand(approveCommand)
  .addCommand(rejectCommand);
