/**
 * Helmsman Executors — Manual Ticket
 *
 * The terminal path. Files a tracking ticket asking an operator to carry
 * the action out by hand. It never fails: when the TicketSink is
 * unavailable the ticket stays in an in-memory backlog and the attempt's
 * detail says so.
 *
 * @see docs/governance.md §4.2 (path dispatcher: terminal paths)
 */

import { toActionTarget } from '@helmsman/kernel';
import type { Action, ActionExecutor, ExecuteContext, ExecutorOutcome } from '@helmsman/kernel';
import { excerpt, postJson } from './http.js';
import type { FetchFn } from './http.js';
import { DEFAULT_API_BASE } from './workflow-dispatch.js';

export interface Ticket {
  readonly action_id: string;
  readonly title: string;
  readonly body: string;
  readonly labels: ReadonlyArray<string>;
}

export interface TicketSink {
  /** Resolves a reference to the filed ticket (URL, number, file line). */
  file(ticket: Ticket, signal: AbortSignal): Promise<string>;
}

export const TICKET_LABELS: ReadonlyArray<string> = ['automation', 'manual-required'];

export function buildTicket(action: Action): Ticket {
  const targets = action.targets.map((t) => toActionTarget(t).service).join(', ');
  const body = [
    '## Manual action required',
    '',
    `Every automated execution path failed for action \`${action.id}\` (${action.type}).`,
    '',
    `- Targets: ${targets}`,
    `- Risk tier: ${action.risk_tier}`,
    ...(action.rationale === undefined ? [] : [`- Rationale: ${action.rationale}`]),
    '',
    '### Parameters',
    '```json',
    JSON.stringify(action.params ?? {}, null, 2),
    '```',
  ].join('\n');
  return { action_id: action.id, title: `[Manual Required] ${action.type}: ${targets}`, body, labels: TICKET_LABELS };
}

export class ManualTicketExecutor implements ActionExecutor {
  readonly name = 'manual';
  private readonly pending: Ticket[] = [];

  constructor(private readonly sink: TicketSink | null = null) {}

  /** Tickets that could not be filed. */
  backlog(): ReadonlyArray<Ticket> {
    return this.pending;
  }

  async execute(action: Action, context: ExecuteContext): Promise<ExecutorOutcome> {
    const ticket = buildTicket(action);
    const sink = this.sink;
    if (sink === null) return this.hold(ticket, 'no ticket sink configured');

    const budget = filingBudget(context.timeoutMs);
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), budget);
    const onAbort = (): void => deadline.abort();
    context.signal.addEventListener('abort', onAbort, { once: true });
    try {
      const filing = Promise.resolve()
        .then(() => sink.file(ticket, deadline.signal))
        .then(
          (ref): Filing => ({ kind: 'filed', ref }),
          (err: unknown): Filing => ({ kind: 'failed', error: err instanceof Error ? err.message : String(err) }),
        );
      const settled = await Promise.race([filing, abandoned(deadline.signal)]);
      switch (settled.kind) {
        case 'filed':
          return { ok: true, detail: `ticket filed: ${settled.ref}`, data: { ref: settled.ref } };
        case 'failed':
          return this.hold(ticket, `ticket sink failed (${settled.error})`);
        case 'abandoned':
          return this.hold(ticket, `ticket sink did not answer within ${budget}ms`);
      }
    } finally {
      clearTimeout(timer);
      context.signal.removeEventListener('abort', onAbort);
    }
  }

  private hold(ticket: Ticket, why: string): ExecutorOutcome {
    this.pending.push(ticket);
    return { ok: true, detail: `${why}; ticket held in backlog`, data: ticket };
  }
}

type Filing =
  | { readonly kind: 'filed'; readonly ref: string }
  | { readonly kind: 'failed'; readonly error: string }
  | { readonly kind: 'abandoned' };

/** Longest a terminal filing may take before falling back to the backlog. */
const MAX_FILING_MARGIN_MS = 250;

/**
 * Time the sink gets: the attempt timeout less a margin, so the executor
 * settles before the dispatcher records a TIMEOUT.
 */
export function filingBudget(timeoutMs: number): number {
  return Math.max(0, timeoutMs - Math.min(MAX_FILING_MARGIN_MS, Math.ceil(timeoutMs / 10)));
}

function abandoned(signal: AbortSignal): Promise<Filing> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve({ kind: 'abandoned' });
      return;
    }
    signal.addEventListener('abort', () => resolve({ kind: 'abandoned' }), { once: true });
  });
}

// ---------------------------------------------------------------------------
// Issue tracker sink
// ---------------------------------------------------------------------------

export interface IssueTrackerOptions {
  readonly repository: string;
  readonly token: string;
  readonly apiBase?: string | undefined;
  readonly fetchFn?: FetchFn | undefined;
}

/** Files tickets as source-control issues; 201 with an `html_url` succeeds. */
export class IssueTrackerTicketSink implements TicketSink {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: IssueTrackerOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async file(ticket: Ticket, signal: AbortSignal): Promise<string> {
    const response = await postJson(
      this.fetchFn,
      `${this.options.apiBase ?? DEFAULT_API_BASE}/repos/${this.options.repository}/issues`,
      { title: ticket.title, body: ticket.body, labels: ticket.labels },
      {
        headers: {
          Accept: 'application/vnd.github+json',
          Authorization: `Bearer ${this.options.token}`,
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal,
      },
    );
    if (response.status !== 201) {
      throw new Error(`issue creation failed: HTTP ${response.status}: ${excerpt(response.text)}`);
    }
    const issue: unknown = JSON.parse(response.text);
    if (typeof issue === 'object' && issue !== null && 'html_url' in issue && typeof issue.html_url === 'string') {
      return issue.html_url;
    }
    throw new Error('issue creation returned no html_url');
  }
}
