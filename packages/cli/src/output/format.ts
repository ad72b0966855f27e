/**
 * Helmsman CLI — Text Output
 *
 * Renderers return strings; commands print them. Colour comes from the
 * theme and disappears when stdout is not a terminal.
 */

import type { PipelineStatus } from '@helmsman/autopilot';
import type { ActionRecord, Decision, PathConfig, PathStats } from '@helmsman/kernel';
import { toActionTarget } from '@helmsman/kernel';
import type { LogEvent } from '@helmsman/runtime-host';
import { stateColor, t, tierColor, verdictColor } from './theme.js';

const RULE = '─────────────────────────────────────────────────────';

const labelW = 22;
const label = (s: string): string => t.muted(s + ' '.repeat(Math.max(1, labelW - s.length)));

function section(title: string): string {
  return t.muted(`─── ${title} ${'─'.repeat(Math.max(3, RULE.length - title.length - 5))}`);
}

function percent(value: number | null): string {
  return value === null ? '—' : `${Math.round(value * 100)}%`;
}

export function targetList(record: ActionRecord): string {
  return record.action.targets.map((ref) => {
    const target = toActionTarget(ref);
    return [target.service, target.environment, target.region].filter((p) => p !== undefined).join('/');
  }).join(', ');
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export function renderStatus(status: PipelineStatus): string {
  const lines: string[] = [''];
  lines.push('  ' + (status.halt.active ? t.red('■ ' + status.message) : t.green('◈ ' + status.message)));
  lines.push('');
  lines.push('  ' + label('autonomy level') + t.white(status.autonomy_level));
  lines.push(
    '  ' + label('rate budget') +
      t.white(String(status.rate_budget_remaining)) +
      t.dim(` / ${status.max_actions_per_hour} per hour`),
  );
  lines.push(
    '  ' + label('failures in window') +
      (status.failures_in_window > 0 ? t.amber : t.white)(String(status.failures_in_window)) +
      t.dim(` / ${status.cascading_threshold}`),
  );
  lines.push('  ' + label('in flight') + t.white(status.in_flight.length === 0 ? 'none' : status.in_flight.join(', ')));
  lines.push(
    '  ' + label('pending escalations') +
      (status.pending_escalations.length > 0 ? t.amber : t.white)(String(status.pending_escalations.length)),
  );

  lines.push('', '  ' + t.muted('paths'));
  for (const p of status.paths) {
    const lastOutcome = p.last_outcome === null ? t.dim('never tried') : t.text(p.last_outcome.toLowerCase());
    lines.push(
      '    ' + t.white(p.name.padEnd(20)) +
        t.dim('reliability ') + t.text(percent(p.observed_reliability).padEnd(6)) +
        t.dim('attempts ') + t.text(String(p.attempts).padEnd(5)) + lastOutcome,
    );
  }

  if (status.action_types.length > 0) {
    lines.push('', '  ' + t.muted('action types'));
    for (const s of status.action_types) {
      lines.push(
        '    ' + t.white(s.type.padEnd(20)) +
          t.dim('runs ') + t.text(String(s.executions).padEnd(5)) +
          t.dim('success ') + t.text(percent(s.success_rate).padEnd(6)) +
          t.dim('avg confidence ') + t.text(s.average_confidence.toFixed(2)),
      );
    }
  }
  lines.push('');
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Decisions and records
// ---------------------------------------------------------------------------

export function renderDecision(decision: Decision): string {
  const lines = [
    `${verdictColor(decision.verdict)(decision.verdict)}  ${t.white(decision.action_id)}  ${t.dim(decision.reasons.join(', '))}`,
  ];
  for (const check of decision.checks) {
    lines.push(`  ${check.passed ? t.green('✓') : t.red('✗')} ${t.muted(check.check.padEnd(13))}${t.text(check.detail)}`);
  }
  return lines.join('\n');
}

export function renderRecord(record: ActionRecord): string {
  const lines = [
    `${stateColor(record.state)(record.state.padEnd(13))}${t.white(record.action_id)}  ${t.text(record.action.type)}  ${tierColor(record.action.risk_tier)(record.action.risk_tier)}`,
    `  ${t.dim('targets')}  ${targetList(record)}`,
  ];
  for (const attempt of record.attempts) {
    const outcome = attempt.outcome === 'SUCCESS' ? t.green(attempt.outcome) : t.red(attempt.outcome);
    const detail = attempt.error ?? attempt.detail ?? '';
    lines.push(`  ${t.dim(`#${attempt.attempt}`)} ${t.text(attempt.path.padEnd(18))}${outcome}  ${t.dim(detail)}`);
  }
  if (record.note !== null) lines.push(`  ${t.dim('note')}  ${record.note}`);
  return lines.join('\n');
}

export function renderEscalations(records: ReadonlyArray<ActionRecord>): string {
  if (records.length === 0) return 'No pending escalations.';
  const lines = [section('Pending escalations')];
  for (const r of records) {
    const created = r.created_at.substring(0, 19).replace('T', ' ');
    const confidence = r.action.confidence === null || r.action.confidence === undefined
      ? 'none'
      : r.action.confidence.toFixed(2);
    lines.push(
      `  ${t.white(r.action_id)}  ${t.text(r.action.type)}  ${tierColor(r.action.risk_tier)(r.action.risk_tier)}  ` +
        t.dim(`${created}  confidence ${confidence}`),
    );
    lines.push(`      ${t.dim('targets')} ${targetList(r)}`);
    if (r.action.rationale !== undefined) lines.push(`      ${t.dim('why')}     ${r.action.rationale}`);
    if (r.note !== null) lines.push(`      ${t.dim('reason')}  ${r.note}`);
  }
  lines.push(t.muted(RULE));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function renderPaths(paths: ReadonlyArray<PathConfig>, stats: ReadonlyArray<PathStats>): string {
  const lines = [section('Execution paths')];
  for (const p of paths) {
    const dot = p.enabled ? t.green('●') : t.dim('○');
    const observed = stats.find((s) => s.name === p.name)?.observed_reliability ?? p.reliability_estimate;
    lines.push(
      `  ${dot} ${(p.enabled ? t.white : t.muted)(p.name.padEnd(20))}` +
        t.dim(`p${p.priority}  timeout ${p.timeout_ms}ms  reliability ${percent(observed)}`) +
        (p.terminal ? t.amber('  terminal') : '') +
        (p.enabled ? '' : t.dim('  disabled')),
    );
  }
  lines.push(t.muted(RULE));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Audit log
// ---------------------------------------------------------------------------

export function renderLogEvent(event: LogEvent): string {
  const at = (event.timestamp ?? '').substring(0, 19).replace('T', ' ');
  const kind = (event.event_type ?? 'event').padEnd(10);
  const action = event.action_id ?? '';
  let summary: string;
  switch (event.event_type) {
    case 'decision':
      summary = `${verdictColor(event.verdict ?? '')(event.verdict ?? '?')} ${t.dim(stringField(event, 'reason'))}`;
      break;
    case 'attempt':
      summary = `${stringField(event, 'path')} ${stringField(event, 'outcome')} ${t.dim(stringField(event, 'error'))}`;
      break;
    case 'transition': {
      const from = stringField(event, 'from') || 'new';
      const to = stringField(event, 'to');
      summary = `${from} → ${stateColor(to)(to)} ${t.dim(stringField(event, 'event'))}`;
      break;
    }
    default:
      summary = '';
  }
  return `${t.dim(at)}  ${t.muted(kind)} ${t.white(action)}  ${summary}`.trimEnd();
}

function stringField(event: LogEvent, key: string): string {
  const value = event[key];
  return typeof value === 'string' ? value : '';
}
