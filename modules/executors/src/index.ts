/**
 * Helmsman Executors — public API
 *
 * One ActionExecutor per execution path. Names match the default path
 * table: local, remote-service, webhook, workflow-dispatch, manual.
 */

export { postJson, bearer, excerpt, joinUrl } from './http.js';
export type { FetchFn, HttpResponse, PostJsonOptions } from './http.js';

export { LocalExecutor } from './local.js';
export type { LocalHandler } from './local.js';

export { RemoteServiceExecutor, DEFAULT_RPC_ENDPOINTS } from './remote-service.js';
export type { RemoteServiceOptions } from './remote-service.js';

export { WebhookExecutor } from './webhook.js';
export type { WebhookOptions } from './webhook.js';

export { WorkflowDispatchExecutor, DEFAULT_API_BASE } from './workflow-dispatch.js';
export type { WorkflowDispatchOptions } from './workflow-dispatch.js';

export { ManualTicketExecutor, IssueTrackerTicketSink, buildTicket, filingBudget, TICKET_LABELS } from './manual-ticket.js';
export type { Ticket, TicketSink, IssueTrackerOptions } from './manual-ticket.js';
