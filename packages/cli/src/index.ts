/**
 * @helmsman/cli
 *
 * The `helmsman` operator command and the runtime it assembles. The
 * executable lives in src/bin/helmsman.ts; this entry exposes the pieces
 * for embedding and tests.
 *
 * Usage:
 *   helmsman status
 *   helmsman halt [reason] | helmsman resume
 *   helmsman submit <file|->  [--enqueue]
 *   helmsman escalations list | approve <id> | reject <id>
 *   helmsman records list | show <id> | fail <id> | rollback <id>
 *   helmsman paths list | enable <name> | disable <name> | set <name>
 *   helmsman log [--type <log>] [--verdict <v>] [--action <id>] [--since] [--until]
 *   helmsman run [--interval <seconds>] [--once]
 */

export { program } from './commands/index.js';
export { queryLogs } from './commands/log.js';
export type { LogQuery, LogQueryResult } from './commands/log.js';
export { buildRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export {
  EXECUTORS_FILE,
  ExecutorSettingsSchema,
  buildExecutors,
  loadExecutorSettings,
} from './executor-settings.js';
export type { BuildExecutorsOptions, BuiltExecutors, ExecutorSettings } from './executor-settings.js';
export { FileTicketSink, TICKETS_LOG } from './file-ticket-sink.js';
export { renderDecision, renderEscalations, renderLogEvent, renderPaths, renderRecord, renderStatus } from './output/format.js';
