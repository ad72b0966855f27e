/**
 * @helmsman/kernel
 *
 * Governance core: safety governor, autonomy ledger, path dispatcher,
 * action state machine, cascading failure monitor, configuration schema and
 * audit interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net or any other I/O API. node:crypto is used for
 * deterministic input hashing (pure computation, not I/O). Timers are used
 * only to bound path attempts.
 *
 * Concrete persistence and audit sinks live in @helmsman/runtime-host;
 * execution backends live in @helmsman/executors.
 *
 * @see docs/governance.md
 */

// Types
export type { Action, ActionTarget, TargetRef } from './types/action.js';
export { RISK_TIER_ORDER, RiskTier, toActionTarget } from './types/action.js';

export type { CheckName, Decision, DecisionReason, PolicyCheck } from './types/decision.js';
export { Verdict } from './types/decision.js';

export type { ExecutionAttempt, ExecutionResult, PathConfig, PathStats } from './types/execution.js';
export { AttemptOutcome, DispatchOutcome } from './types/execution.js';

export type {
  ActionRecord,
  LifecycleEvent,
  LifecycleEventKind,
  StateChange,
  TransitionEvent,
} from './types/record.js';
export { ActionState } from './types/record.js';

export type { HaltState } from './types/halt.js';
export { INITIAL_HALT_STATE, describeHalt } from './types/halt.js';

export type { Clock } from './clock.js';
export { HOUR_MS, MINUTE_MS, systemClock } from './clock.js';

// Errors
export {
  AdapterFailure,
  ConfigurationError,
  DispatchExhausted,
  HelmsmanError,
  PolicyViolation,
  StateTransitionError,
} from './errors.js';

// Configuration
export type {
  AutonomyLevel,
  BlastRadiusScope,
  ConfidenceGate,
  GovernanceConfig,
  GovernanceConfigInput,
} from './configuration/governance.js';
export {
  AUTONOMOUS_MAX_THRESHOLD,
  AUTONOMY_LEVELS,
  BLAST_RADIUS_SCOPES,
  DEFAULT_PATHS,
  GovernanceConfigSchema,
  PathConfigSchema,
  confidenceGate,
  confidenceThreshold,
  defaultGovernanceConfig,
  formatZodIssues,
  parseGovernanceConfig,
  parsePathTable,
} from './configuration/governance.js';

// Logging interfaces (implementations live in runtime-host)
export type { AuditSink } from './logging/audit-sink.js';
export type { OperationalLogger } from './logging/operational-logger.js';
export { silentLogger } from './logging/operational-logger.js';
export type { DecisionQuery } from './logging/decision-log.js';
export { DecisionLogger } from './logging/decision-log.js';

// Governance
export type { Admission, AdmissionLimits, AdmissionOutcome, AdmissionRefusal } from './governance/autonomy-ledger.js';
export { AutonomyLedger } from './governance/autonomy-ledger.js';
export type { BlastRadiusMeasure } from './governance/blast-radius.js';
export { blastRadiusMeasure } from './governance/blast-radius.js';
export { ActionSchema, actionIssues } from './governance/action-schema.js';
export type { StateParse } from './governance/state-schema.js';
export { ActionRecordSchema, HaltStateSchema, parseActionRecords, parseHaltState } from './governance/state-schema.js';
export type { GovernanceStore } from './governance/governance-store.js';
export type { SafetyGovernorOptions } from './governance/governor.js';
export { SafetyGovernor, computeInputHash } from './governance/governor.js';

// Lifecycle
export type { FireResult } from './lifecycle/state-machine.js';
export { ActionStateMachine, createRecord, isSettled, isTerminal, transition } from './lifecycle/state-machine.js';

// Monitoring
export { CASCADING_FAILURE_REASON, CascadingFailureMonitor } from './monitoring/cascade-monitor.js';

// Dispatch
export type { ActionExecutor, ExecuteContext, ExecutorOutcome } from './dispatch/executor.js';
export type { DispatchObserver, PathDispatcherOptions } from './dispatch/dispatcher.js';
export { PathDispatcher } from './dispatch/dispatcher.js';
export { comparePaths, orderPaths, pathTableIssues } from './dispatch/path-order.js';
