/**
 * Helmsman Kernel — Action Structure Validation
 *
 * Actions arrive from signal sources, the CLI and JSON inboxes, so the
 * governor validates structure at runtime rather than trusting the static
 * type. A structural failure is a DENY `invalid_action`, never a throw.
 */

import { z } from 'zod';
import { RiskTier } from '../types/action.js';

const nonBlank = z.string().refine((s) => s.trim() !== '', { message: 'must not be blank' });

export const ActionTargetSchema = z.union([
  nonBlank,
  z.object({
    service: nonBlank,
    environment: nonBlank.optional(),
    region: nonBlank.optional(),
  }),
]);

export const ActionSchema = z.object({
  id: nonBlank,
  type: nonBlank,
  targets: z.array(ActionTargetSchema).min(1, { message: 'at least one target is required' }),
  risk_tier: z.nativeEnum(RiskTier),
  confidence: z.number().min(0).max(1).nullable().optional(),
  proposed_at: z.string().datetime({ offset: true }),
  params: z.record(z.unknown()).optional(),
  source: z.string().optional(),
  rationale: z.string().optional(),
});

/** Structural problems with a proposed action; empty when well-formed. */
export function actionIssues(action: unknown): string[] {
  const result = ActionSchema.safeParse(action);
  if (result.success) return [];
  return result.error.issues.map((issue) => {
    const where = issue.path.join('.');
    return where === '' ? issue.message : `${where}: ${issue.message}`;
  });
}
