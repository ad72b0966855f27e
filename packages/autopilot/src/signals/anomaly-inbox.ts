/**
 * Helmsman Autopilot — Inbox Anomaly Detector
 *
 * An AnomalyDetector over a JSONL inbox: an external detector appends one
 * reading per line to `<home>/inbox/anomalies.jsonl`. Lines that fail the
 * reading schema are logged and dropped.
 */

import { z } from 'zod';
import { formatZodIssues, silentLogger } from '@helmsman/kernel';
import type { OperationalLogger } from '@helmsman/kernel';
import type { CandidateInbox } from '@helmsman/runtime-host';
import type { AnomalyDetector, AnomalyReading } from './anomaly-source.js';

export const AnomalyReadingSchema = z.object({
  metric: z.string().min(1),
  service: z.string().min(1),
  severity: z.enum(['info', 'warning', 'critical']),
  score: z.number().min(0).max(1),
  observed_at: z.string().datetime({ offset: true }),
  environment: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
});

export class InboxAnomalyDetector implements AnomalyDetector {
  constructor(
    private readonly inbox: CandidateInbox,
    private readonly logger: OperationalLogger = silentLogger,
  ) {}

  readAnomalies(): Promise<ReadonlyArray<AnomalyReading>> {
    const readings: AnomalyReading[] = [];
    for (const line of this.inbox.drain()) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        this.logger.warn({ line: line.slice(0, 200) }, 'anomaly line is not JSON; dropped');
        continue;
      }
      const parsed = AnomalyReadingSchema.safeParse(raw);
      if (parsed.success) {
        readings.push(parsed.data);
      } else {
        this.logger.warn({ issues: formatZodIssues(parsed.error) }, 'anomaly line dropped');
      }
    }
    return Promise.resolve(readings);
  }
}
