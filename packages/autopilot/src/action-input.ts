/**
 * Helmsman Autopilot — Action Input Parsing
 *
 * Actions that arrive as JSON text (the candidate inbox, `helmsman submit`)
 * are validated with the kernel's ActionSchema before they become typed
 * Actions. `proposed_at` defaults to now when omitted.
 */

import { ActionSchema, formatZodIssues } from '@helmsman/kernel';
import type { Action } from '@helmsman/kernel';

export type ActionParseResult =
  | { readonly ok: true; readonly action: Action }
  | { readonly ok: false; readonly issues: ReadonlyArray<string> };

export function parseActionJson(text: string, now: Date): ActionParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    return { ok: false, issues: [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`] };
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, issues: ['action must be a JSON object'] };
  }

  const withDefaults = 'proposed_at' in raw ? raw : { ...raw, proposed_at: now.toISOString() };
  const result = ActionSchema.safeParse(withDefaults);
  if (!result.success) return { ok: false, issues: formatZodIssues(result.error) };
  return { ok: true, action: result.data };
}
