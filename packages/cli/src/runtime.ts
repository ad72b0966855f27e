/**
 * Helmsman CLI — Runtime
 *
 * Assembles the governance core for one CLI invocation:
 *
 *   home → config.json → executors.json → persisted path table →
 *   ActionPipeline (file audit sink, file governance store, pino) → restore
 *
 * Every command builds its own runtime; state is shared between
 * invocations through the home directory only.
 */

import { ActionPipeline, DispatchRollbackPolicy, EscalationQueue, PathRegistry } from '@helmsman/autopilot';
import type { RestoreReport } from '@helmsman/autopilot';
import type { GovernanceConfig, OperationalLogger } from '@helmsman/kernel';
import type { FetchFn, ManualTicketExecutor } from '@helmsman/executors';
import {
  FileAuditSink,
  FileGovernanceStore,
  FileStateIO,
  createLogger,
  helmsmanPaths,
  loadGovernanceConfig,
  resolveHelmsmanHome,
} from '@helmsman/runtime-host';
import type { HelmsmanPaths, LogLevel, StateIO } from '@helmsman/runtime-host';
import { buildExecutors, loadExecutorSettings } from './executor-settings.js';
import { FileTicketSink } from './file-ticket-sink.js';

export interface RuntimeOptions {
  readonly home?: string | undefined;
  readonly logLevel?: LogLevel | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly fetchFn?: FetchFn | undefined;
  readonly logger?: OperationalLogger | undefined;
}

export interface Runtime {
  readonly paths: HelmsmanPaths;
  readonly config: GovernanceConfig;
  readonly stateIO: StateIO;
  readonly logger: OperationalLogger;
  readonly pipeline: ActionPipeline;
  readonly escalations: EscalationQueue;
  readonly registry: PathRegistry;
  readonly manual: ManualTicketExecutor;
  readonly restored: RestoreReport;
}

/** @throws ConfigurationError when config.json, executors.json, paths.json or state/records.json is invalid */
export function buildRuntime(options: RuntimeOptions = {}): Runtime {
  const paths = helmsmanPaths(resolveHelmsmanHome({ home: options.home }));
  const config = loadGovernanceConfig(paths.home);
  const settings = loadExecutorSettings(paths.home);
  const logger = options.logger ?? createLogger({ level: options.logLevel, name: 'cli', destination: process.stderr });
  const stateIO = new FileStateIO(paths.home);

  const executors = buildExecutors(settings, {
    env: options.env ?? process.env,
    logger,
    fallbackTicketSink: new FileTicketSink(stateIO),
    fetchFn: options.fetchFn,
  });

  const pipeline = new ActionPipeline({
    config,
    executors: executors.all,
    paths: PathRegistry.loadPersisted(stateIO) ?? undefined,
    store: new FileGovernanceStore(stateIO),
    sink: new FileAuditSink(stateIO),
    logger,
  });
  pipeline.setRollbackPolicy(new DispatchRollbackPolicy(pipeline.dispatcher));

  const restored = pipeline.restore();
  if (restored.interrupted > 0) {
    logger.warn({ interrupted: restored.interrupted }, 'records interrupted by a previous exit marked FAILED');
  }

  return {
    paths,
    config,
    stateIO,
    logger,
    pipeline,
    escalations: new EscalationQueue(pipeline),
    registry: new PathRegistry(stateIO, pipeline.dispatcher, logger),
    manual: executors.manual,
    restored,
  };
}
