/**
 * Helmsman Executors — Webhook
 *
 * Triggers a workflow-automation webhook at `<base>/<action type>` with
 * `{ action, params }`. 200, 201 and 202 count as success.
 */

import type { Action, ActionExecutor, ExecuteContext, ExecutorOutcome } from '@helmsman/kernel';
import { bearer, excerpt, joinUrl, postJson } from './http.js';
import type { FetchFn } from './http.js';

const ACCEPTED = new Set([200, 201, 202]);

export interface WebhookOptions {
  readonly baseUrl?: string | undefined;
  readonly token?: string | undefined;
  readonly fetchFn?: FetchFn | undefined;
}

export class WebhookExecutor implements ActionExecutor {
  readonly name = 'webhook';
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: WebhookOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async execute(action: Action, context: ExecuteContext): Promise<ExecutorOutcome> {
    const baseUrl = this.options.baseUrl;
    if (baseUrl === undefined || baseUrl === '') {
      return { ok: false, error: 'webhook URL not configured' };
    }
    const response = await postJson(
      this.fetchFn,
      joinUrl(baseUrl, action.type),
      { action: action.type, action_id: action.id, targets: action.targets, params: action.params ?? {} },
      { headers: bearer(this.options.token), signal: context.signal },
    );
    if (!ACCEPTED.has(response.status)) {
      return { ok: false, error: `HTTP ${response.status}: ${excerpt(response.text)}` };
    }
    return { ok: true, detail: `webhook HTTP ${response.status}`, data: excerpt(response.text, 500) };
  }
}
