/**
 * Helmsman Autopilot — Remediation Rules
 *
 * Metric → remediation action mapping used by the AnomalySignalSource,
 * loaded from `data/remediation-rules.json` and validated with zod.
 *
 * Lookup order for a metric name (case-insensitive):
 *   1. exact metric key, first listed action
 *   2. longest metric key contained in the name (or containing it)
 *   3. critical readings only: `critical_fallback`
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, RiskTier, formatZodIssues } from '@helmsman/kernel';

export const RemediationRulesSchema = z
  .object({
    actions: z.record(z.object({ risk_tier: z.nativeEnum(RiskTier) }).strict()),
    metrics: z.record(z.array(z.string().min(1)).min(1)),
    critical_fallback: z.string().min(1),
  })
  .strict()
  .superRefine((rules, ctx) => {
    const known = new Set(Object.keys(rules.actions));
    for (const [metric, actions] of Object.entries(rules.metrics)) {
      for (const action of actions) {
        if (!known.has(action)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['metrics', metric],
            message: `unknown action '${action}'`,
          });
        }
      }
    }
    if (!known.has(rules.critical_fallback)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['critical_fallback'],
        message: `unknown action '${rules.critical_fallback}'`,
      });
    }
  });

export type RemediationRules = z.infer<typeof RemediationRulesSchema>;

export interface Remediation {
  readonly action_type: string;
  readonly risk_tier: RiskTier;
  /** The metric key that matched, or null for the critical fallback. */
  readonly matched: string | null;
}

const RULES_URL = new URL('../../data/remediation-rules.json', import.meta.url);

/** @throws ConfigurationError if the rules file is malformed */
export function parseRemediationRules(raw: unknown): RemediationRules {
  const result = RemediationRulesSchema.safeParse(raw);
  if (!result.success) throw new ConfigurationError(formatZodIssues(result.error));
  return result.data;
}

let bundled: RemediationRules | undefined;

/** The rules shipped with the package. */
export function defaultRemediationRules(): RemediationRules {
  if (bundled === undefined) {
    bundled = parseRemediationRules(JSON.parse(readFileSync(RULES_URL, 'utf-8')));
  }
  return bundled;
}

export function findRemediation(
  rules: RemediationRules,
  metric: string,
  critical: boolean,
): Remediation | null {
  const name = metric.trim().toLowerCase();
  if (name === '') return null;
  const exact = rules.metrics[name];
  let matched: string | null = exact === undefined ? null : name;

  if (matched === null) {
    for (const key of Object.keys(rules.metrics)) {
      if ((name.includes(key) || key.includes(name)) && (matched === null || key.length > matched.length)) {
        matched = key;
      }
    }
  }

  const actionType = matched !== null ? rules.metrics[matched]?.[0] : critical ? rules.critical_fallback : undefined;
  if (actionType === undefined) return null;
  const action = rules.actions[actionType];
  if (action === undefined) return null;
  return { action_type: actionType, risk_tier: action.risk_tier, matched };
}
