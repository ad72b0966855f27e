/**
 * @helmsman/autopilot
 *
 * Orchestration over the kernel: the ActionPipeline submission interface,
 * escalation approvals, the operator's path table, signal sources,
 * confidence scoring and the observe-decide-act loop.
 */

export type {
  ActionPipelineOptions,
  RestoreReport,
  SubmissionHandle,
  SubmissionResult,
} from './pipeline.js';
export { ActionPipeline, unwrapSubmission } from './pipeline.js';

export type { RollbackOutcome, RollbackPlanner, RollbackPolicy } from './rollback-policy.js';
export { DispatchRollbackPolicy, NEVER_ROLLBACK, rollbackFromParams } from './rollback-policy.js';

export type { Actor, ActorKind, ApproveResult, RejectResult } from './escalation-queue.js';
export { EscalationQueue } from './escalation-queue.js';

export type { PathUpdate } from './path-registry.js';
export { PATHS_FILE, PathRegistry } from './path-registry.js';

export type { ActionTypeStats, PipelineStatus } from './status.js';
export { actionTypeStats, summarizeStatus } from './status.js';

export type { ActionParseResult } from './action-input.js';
export { parseActionJson } from './action-input.js';

export type { ConfidenceBreakdown, ConfidenceInputs, ConfidenceWeights, SystemHealth } from './orient/confidence.js';
export { ACTION_SAFETY, ConfidenceScorer, DEFAULT_WEIGHTS, healthFromStatus } from './orient/confidence.js';

export type { SignalSource } from './signals/signal-source.js';
export type {
  AnomalyDetector,
  AnomalyReading,
  AnomalySeverity,
  AnomalySourceOptions,
} from './signals/anomaly-source.js';
export { AnomalySignalSource } from './signals/anomaly-source.js';
export type { Remediation, RemediationRules } from './signals/remediation-rules.js';
export { defaultRemediationRules, findRemediation, parseRemediationRules } from './signals/remediation-rules.js';
export { InboxSignalSource } from './signals/inbox-source.js';
export { AnomalyReadingSchema, InboxAnomalyDetector } from './signals/anomaly-inbox.js';

export type { ObserveDecideActLoopOptions, TickReport } from './loop.js';
export { ObserveDecideActLoop } from './loop.js';
