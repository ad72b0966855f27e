/**
 * @helmsman/runtime-host
 *
 * Everything with a side effect: home resolution, configuration loading,
 * JSON state and JSONL audit files, the candidate inbox, and the pino
 * operational logger.
 */

export type { HelmsmanPaths, ResolveHelmsmanHomeOptions } from './home.js';
export { helmsmanPaths, resolveHelmsmanHome } from './home.js';

export { loadGovernanceConfig } from './config/config-loader.js';

export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';
export {
  FileGovernanceStore,
  HALT_FILE,
  HALT_UNREADABLE_REASON,
  NullGovernanceStore,
  RECORDS_ARCHIVE_LOG,
  RECORDS_FILE,
} from './state/governance-store.js';

export { ATTEMPTS_LOG, DECISIONS_LOG, FileAuditSink, TRANSITIONS_LOG } from './logging/file-audit-sink.js';
export type { LogEvent, LogFilter, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { filterLogEvents, readLog } from './logging/log-reader.js';
export type { CreateLoggerOptions, LogLevel } from './logging/logger.js';
export { LOG_LEVELS, createLogger, resolveLogLevel } from './logging/logger.js';

export type { CandidateInbox } from './inbox/candidate-inbox.js';
export { FileCandidateInbox, MemoryCandidateInbox } from './inbox/candidate-inbox.js';
