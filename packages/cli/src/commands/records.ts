/**
 * helmsman records — Action records and operator overrides
 *
 * Subcommands:
 *   helmsman records list     [--state <STATE>] [--json]
 *   helmsman records show     <id> [--json]
 *   helmsman records fail     <id> [--reason "<reason>"]
 *   helmsman records rollback <id>
 *
 * `fail` forces a PENDING, EXECUTING or ROLLING_BACK record to FAILED.
 * `rollback` rolls a FAILED record back through `params.rollback_type`.
 *
 * @see docs/governance.md §4.3 (action state machine)
 */

import { Command } from 'commander';
import { ActionState } from '@helmsman/kernel';
import type { ActionRecord } from '@helmsman/kernel';
import { renderRecord } from '../output/format.js';
import { CLI_ACTOR_KIND, fail, print, printJson, runtimeFor } from './shared.js';

const STATES: ReadonlyArray<string> = Object.values(ActionState);

function findRecord(records: ReadonlyArray<ActionRecord>, idOrPrefix: string): ActionRecord {
  const exact = records.find((r) => r.action_id === idOrPrefix);
  if (exact !== undefined) return exact;
  const matches = records.filter((r) => r.action_id.startsWith(idOrPrefix));
  if (matches.length === 1 && matches[0] !== undefined) return matches[0];
  throw new Error(matches.length === 0 ? `No record matches '${idOrPrefix}'` : `'${idOrPrefix}' is ambiguous`);
}

const listCommand = new Command('list')
  .description('List action records, newest first')
  .option('--state <state>', `Filter by state: ${STATES.join(', ')}`)
  .option('--json', 'Output as JSON')
  .action((options: { state?: string; json?: boolean }, command: Command) => {
    try {
      const wanted = options.state?.toUpperCase();
      if (wanted !== undefined && !STATES.includes(wanted)) {
        throw new Error(`Unknown state: ${options.state ?? ''}. Valid: ${STATES.join(', ')}`);
      }
      const records = runtimeFor(command)
        .pipeline.listRecords()
        .filter((r) => wanted === undefined || r.state === wanted)
        .slice()
        .sort((a, b) => (a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0));
      if (options.json === true) {
        printJson(records);
        return;
      }
      if (records.length === 0) {
        print('No records.');
        return;
      }
      print(records.map(renderRecord).join('\n\n'));
    } catch (err: unknown) {
      fail('records', err);
    }
  });

const showCommand = new Command('show')
  .description('Show one record with its attempts and history')
  .argument('<id>', 'Action id or unique prefix')
  .option('--json', 'Output as JSON')
  .action((id: string, options: { json?: boolean }, command: Command) => {
    try {
      const record = findRecord(runtimeFor(command).pipeline.listRecords(), id);
      if (options.json === true) {
        printJson(record);
        return;
      }
      print(renderRecord(record));
      for (const change of record.history) {
        print(`  ${change.at}  ${change.from ?? 'new'} → ${change.to}  ${change.event}${change.note === null ? '' : `  ${change.note}`}`);
      }
    } catch (err: unknown) {
      fail('records', err);
    }
  });

const failCommand = new Command('fail')
  .description('Force a record to FAILED')
  .argument('<id>', 'Action id or unique prefix')
  .option('--reason <reason>', 'Reason recorded on the record', 'failed by operator')
  .option('--actor <id>', 'Operator identity', 'operator')
  .action((id: string, options: { reason: string; actor: string }, command: Command) => {
    try {
      const { pipeline } = runtimeFor(command);
      const record = findRecord(pipeline.listRecords(), id);
      const result = pipeline.override(record.action_id, ActionState.Failed, `${CLI_ACTOR_KIND}:${options.actor}`, options.reason);
      if (result === null || !result.accepted) {
        throw new Error(`Record ${record.action_id} is ${record.state} and cannot be forced to FAILED`);
      }
      print(renderRecord(result.record));
    } catch (err: unknown) {
      fail('records', err);
    }
  });

const rollbackCommand = new Command('rollback')
  .description('Roll back a FAILED record')
  .argument('<id>', 'Action id or unique prefix')
  .option('--actor <id>', 'Operator identity', 'operator')
  .action(async (id: string, options: { actor: string }, command: Command) => {
    try {
      const { pipeline } = runtimeFor(command);
      const record = findRecord(pipeline.listRecords(), id);
      const result = await pipeline.rollback(record.action_id, `${CLI_ACTOR_KIND}:${options.actor}`);
      if (result === null || !result.accepted) {
        throw new Error(`Record ${record.action_id} is ${record.state} and cannot be rolled back`);
      }
      print(renderRecord(result.record));
      if (result.record.state !== ActionState.RolledBack) process.exitCode = 1;
    } catch (err: unknown) {
      fail('records', err);
    }
  });

export const recordsCommand = new Command('records')
  .description('Inspect action records and apply operator overrides')
  .addCommand(listCommand)
  .addCommand(showCommand)
  .addCommand(failCommand)
  .addCommand(rollbackCommand);
