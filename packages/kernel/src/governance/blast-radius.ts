/**
 * Helmsman Kernel — Blast Radius Measure
 *
 * Maps an action's targets to the set of keys that count toward the blast
 * radius. Which attribute counts (service, environment, region) is an
 * operator decision, so the measure is configurable; callers may also inject
 * their own function.
 *
 * Returns null for a malformed target list so the governor can DENY
 * `invalid_action` instead of throwing.
 */

import type { BlastRadiusScope } from '../configuration/governance.js';

export type BlastRadiusMeasure = (targets: unknown) => ReadonlySet<string> | null;

export function blastRadiusMeasure(scope: BlastRadiusScope): BlastRadiusMeasure {
  return (targets) => {
    if (!Array.isArray(targets) || targets.length === 0) return null;
    const keys = new Set<string>();
    for (const ref of targets) {
      const key = targetKey(ref, scope);
      if (key === null) return null;
      keys.add(key);
    }
    return keys;
  };
}

/**
 * Key of one target under a scope. A target with no value for the scope's
 * attribute falls back to its service name, so it still counts.
 */
function targetKey(ref: unknown, scope: BlastRadiusScope): string | null {
  if (typeof ref === 'string') {
    return ref.trim() === '' ? null : `service:${ref}`;
  }
  if (typeof ref !== 'object' || ref === null || !('service' in ref)) return null;
  const service = ref.service;
  if (typeof service !== 'string' || service.trim() === '') return null;

  if (scope === 'service') return `service:${service}`;
  let value: unknown;
  if (scope === 'environment' && 'environment' in ref) value = ref.environment;
  if (scope === 'region' && 'region' in ref) value = ref.region;
  if (value === undefined || value === null) return `service:${service}`;
  if (typeof value !== 'string' || value.trim() === '') return null;
  return `${scope}:${value}`;
}
