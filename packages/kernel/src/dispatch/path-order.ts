/**
 * Helmsman Kernel — Path Ordering
 *
 * Dispatch order: ascending priority, then higher reliability_estimate, then
 * name. The name tiebreak makes the order total, so two dispatchers given the
 * same table always try paths in the same sequence.
 */

import type { PathConfig } from '../types/execution.js';

export function comparePaths(a: PathConfig, b: PathConfig): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.reliability_estimate !== b.reliability_estimate) {
    return b.reliability_estimate - a.reliability_estimate;
  }
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export function orderPaths(paths: ReadonlyArray<PathConfig>): ReadonlyArray<PathConfig> {
  return [...paths].sort(comparePaths);
}

/**
 * Structural problems in a path table, as human-readable strings.
 * Empty when the table is valid.
 */
export function pathTableIssues(paths: ReadonlyArray<PathConfig>): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();
  for (const p of paths) {
    if (seen.has(p.name)) issues.push(`paths: duplicate path name '${p.name}'`);
    seen.add(p.name);
  }

  const terminals = paths.filter((p) => p.terminal);
  if (terminals.length > 1) {
    issues.push(`paths: at most one terminal path allowed, found ${terminals.map((p) => p.name).join(', ')}`);
  }

  const ordered = orderPaths(paths);
  const last = ordered[ordered.length - 1];
  if (terminals.length === 1 && last !== undefined && !last.terminal) {
    issues.push(`paths: terminal path '${terminals[0]?.name ?? ''}' must sort after every other path`);
  }
  return issues;
}
