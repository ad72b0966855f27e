/**
 * Helmsman Autopilot — Anomaly Signal Source
 *
 * Turns anomaly readings from a detector collaborator into remediation
 * candidates. A reading becomes an action only when:
 *
 *   - its severity is at least `min_severity` and its score at least `min_score`
 *   - `confirmation_count` readings for the same service and metric arrived
 *     within `confirmation_window_ms`
 *   - the service/metric pair is outside its cooldown and under its hourly cap
 *   - the remediation rules map the metric to an action
 *
 * Candidates leave `confidence` unset; `params.detector_score` blends the
 * strongest reading's score with its severity for the loop's scorer.
 *
 * Statistics live in the detector; this source only consumes its output.
 */

import { ulid } from 'ulid';
import { HOUR_MS, MINUTE_MS, silentLogger, systemClock } from '@helmsman/kernel';
import type { Action, Clock, OperationalLogger } from '@helmsman/kernel';
import type { RemediationRules } from './remediation-rules.js';
import { defaultRemediationRules, findRemediation } from './remediation-rules.js';
import type { SignalSource } from './signal-source.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AnomalySeverity = 'info' | 'warning' | 'critical';

const SEVERITY_RANK: Readonly<Record<AnomalySeverity, number>> = { info: 0, warning: 1, critical: 2 };
const SEVERITY_SCORE: Readonly<Record<AnomalySeverity, number>> = { info: 0.3, warning: 0.6, critical: 0.9 };

export interface AnomalyReading {
  readonly metric: string;
  readonly service: string;
  readonly severity: AnomalySeverity;
  /** Detector certainty in [0, 1]. */
  readonly score: number;
  readonly observed_at: string;
  readonly environment?: string | undefined;
  readonly region?: string | undefined;
}

export interface AnomalyDetector {
  /** Readings since the previous call. */
  readAnomalies(signal: AbortSignal): Promise<ReadonlyArray<AnomalyReading>>;
}

export interface AnomalySourceOptions {
  readonly min_score?: number | undefined;
  readonly min_severity?: AnomalySeverity | undefined;
  readonly confirmation_window_ms?: number | undefined;
  readonly confirmation_count?: number | undefined;
  readonly cooldown_ms?: number | undefined;
  readonly max_actions_per_metric_per_hour?: number | undefined;
  readonly rules?: RemediationRules | undefined;
  readonly logger?: OperationalLogger | undefined;
  readonly clock?: Clock | undefined;
}

// ---------------------------------------------------------------------------
// AnomalySignalSource
// ---------------------------------------------------------------------------

export class AnomalySignalSource implements SignalSource {
  readonly name = 'anomaly';

  private readonly minScore: number;
  private readonly minSeverity: AnomalySeverity;
  private readonly windowMs: number;
  private readonly confirmations: number;
  private readonly cooldownMs: number;
  private readonly hourlyCap: number;
  private readonly rules: RemediationRules;
  private readonly logger: OperationalLogger;
  private readonly clock: Clock;

  /** `service|metric` → readings still inside the confirmation window. */
  private readonly pending = new Map<string, AnomalyReading[]>();
  /** `service|metric` → times (ms) actions were proposed. */
  private readonly proposed = new Map<string, number[]>();

  constructor(
    private readonly detector: AnomalyDetector,
    options: AnomalySourceOptions = {},
  ) {
    this.minScore = options.min_score ?? 0.6;
    this.minSeverity = options.min_severity ?? 'warning';
    this.windowMs = options.confirmation_window_ms ?? 5 * MINUTE_MS;
    this.confirmations = options.confirmation_count ?? 2;
    this.cooldownMs = options.cooldown_ms ?? 10 * MINUTE_MS;
    this.hourlyCap = options.max_actions_per_metric_per_hour ?? 3;
    this.rules = options.rules ?? defaultRemediationRules();
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  async getCandidateActions(signal: AbortSignal): Promise<ReadonlyArray<Action>> {
    const readings = await this.detector.readAnomalies(signal);
    const candidates: Action[] = [];
    for (const reading of readings) {
      const candidate = this.ingest(reading);
      if (candidate !== null) candidates.push(candidate);
    }
    return candidates;
  }

  private ingest(reading: AnomalyReading): Action | null {
    if (SEVERITY_RANK[reading.severity] < SEVERITY_RANK[this.minSeverity] || reading.score < this.minScore) {
      return null;
    }

    const now = this.clock();
    const nowMs = now.getTime();
    const key = `${reading.service}|${reading.metric}`;
    const window = (this.pending.get(key) ?? []).filter((r) => nowMs - Date.parse(r.observed_at) < this.windowMs);
    window.push(reading);
    this.pending.set(key, window);
    if (window.length < this.confirmations) return null;

    const history = (this.proposed.get(key) ?? []).filter((at) => nowMs - at < HOUR_MS);
    this.proposed.set(key, history);
    const last = history[history.length - 1];
    if (last !== undefined && nowMs - last < this.cooldownMs) {
      this.logger.debug({ service: reading.service, metric: reading.metric }, 'anomaly in cooldown; no action');
      return null;
    }
    if (history.length >= this.hourlyCap) {
      this.logger.warn(
        { service: reading.service, metric: reading.metric, cap: this.hourlyCap },
        'hourly remediation cap reached; no action',
      );
      return null;
    }

    const strongest = window.reduce((a, b) =>
      SEVERITY_RANK[b.severity] > SEVERITY_RANK[a.severity] ||
      (b.severity === a.severity && b.score > a.score)
        ? b
        : a,
    );
    const remediation = findRemediation(this.rules, reading.metric, strongest.severity === 'critical');
    if (remediation === null) {
      this.logger.info({ metric: reading.metric }, 'no remediation rule for metric');
      return null;
    }

    this.pending.delete(key);
    history.push(nowMs);

    const detectorScore = Math.round(((strongest.score + SEVERITY_SCORE[strongest.severity]) / 2) * 1000) / 1000;
    return {
      id: `anomaly-${ulid()}`,
      type: remediation.action_type,
      targets: [
        {
          service: reading.service,
          ...(reading.environment !== undefined ? { environment: reading.environment } : {}),
          ...(reading.region !== undefined ? { region: reading.region } : {}),
        },
      ],
      risk_tier: remediation.risk_tier,
      proposed_at: now.toISOString(),
      params: {
        metric: reading.metric,
        severity: strongest.severity,
        readings: window.length,
        detector_score: detectorScore,
      },
      source: this.name,
      rationale:
        `${window.length} ${strongest.severity} anomalies on ${reading.metric} ` +
        `for ${reading.service} within ${Math.round(this.windowMs / MINUTE_MS)}m`,
    };
  }
}
