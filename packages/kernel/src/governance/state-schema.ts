/**
 * Helmsman Kernel — Persisted State Validation
 *
 * records.json and halt.json are read back on every restart and before
 * every save. Their contents are validated against these schemas instead of
 * being trusted as the static type; what to do with an invalid file is the
 * store's decision.
 *
 * @see docs/governance.md §8 (persistence)
 */

import { z } from 'zod';
import { formatZodIssues } from '../configuration/governance.js';
import type { HaltState } from '../types/halt.js';
import { AttemptOutcome, DispatchOutcome } from '../types/execution.js';
import { ActionState } from '../types/record.js';
import type { ActionRecord, StateChange } from '../types/record.js';
import { ActionSchema } from './action-schema.js';

const timestamp = z.string().datetime({ offset: true });

export const HaltStateSchema = z.object({
  active: z.boolean(),
  reason: z.string().nullable(),
  tripped_at: timestamp.nullable(),
  tripped_by: z.string().nullable(),
  last_reset_at: timestamp.nullable(),
});

const ExecutionAttemptSchema = z.object({
  action_id: z.string(),
  path: z.string(),
  attempt: z.number().int().positive(),
  started_at: timestamp,
  finished_at: timestamp,
  outcome: z.nativeEnum(AttemptOutcome),
  error: z.string().nullable(),
  detail: z.string().nullable(),
});

const ExecutionResultSchema = z.object({
  action_id: z.string(),
  outcome: z.nativeEnum(DispatchOutcome),
  path: z.string().nullable(),
  attempts: z.array(ExecutionAttemptSchema),
});

const HISTORY_EVENTS = [
  'created',
  'dispatch_started',
  'attempt_recorded',
  'dispatch_finished',
  'rollback_started',
  'rollback_finished',
  'operator_override',
] as const satisfies ReadonlyArray<StateChange['event']>;

const StateChangeSchema = z.object({
  from: z.nativeEnum(ActionState).nullable(),
  to: z.nativeEnum(ActionState),
  event: z.enum(HISTORY_EVENTS),
  at: timestamp,
  note: z.string().nullable(),
});

export const ActionRecordSchema = z
  .object({
    action_id: z.string(),
    action: ActionSchema,
    state: z.nativeEnum(ActionState),
    attempts: z.array(ExecutionAttemptSchema),
    history: z.array(StateChangeSchema).min(1, { message: 'history must start with the creation entry' }),
    created_at: timestamp,
    updated_at: timestamp,
    admitted_at: timestamp.nullable(),
    escalated: z.boolean(),
    result: ExecutionResultSchema.nullable(),
    note: z.string().nullable(),
  })
  .refine((record) => record.action.id === record.action_id, {
    message: 'does not match action.id',
    path: ['action_id'],
  });

export type StateParse<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly issues: string[] };

export function parseHaltState(value: unknown): StateParse<HaltState> {
  const result = HaltStateSchema.safeParse(value);
  return result.success ? { ok: true, value: result.data } : { ok: false, issues: formatZodIssues(result.error) };
}

/** Issues are prefixed with the record's position, e.g. `2.state: ...`. */
export function parseActionRecords(value: unknown): StateParse<ActionRecord[]> {
  const result = z.array(ActionRecordSchema).safeParse(value);
  return result.success ? { ok: true, value: result.data } : { ok: false, issues: formatZodIssues(result.error) };
}
