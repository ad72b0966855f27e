/**
 * Helmsman Executors — Workflow Dispatch
 *
 * Starts a source-control CI workflow through the `workflow_dispatch` REST
 * endpoint. Only action types with a workflow mapping can use this path.
 * The API answers 204 with no run id, so success means "queued".
 */

import type { Action, ActionExecutor, ExecuteContext, ExecutorOutcome } from '@helmsman/kernel';
import { excerpt, postJson } from './http.js';
import type { FetchFn } from './http.js';

export const DEFAULT_API_BASE = 'https://api.github.com';

export interface WorkflowDispatchOptions {
  /** `owner/name` of the repository hosting the workflows. */
  readonly repository?: string | undefined;
  readonly token?: string | undefined;
  /** Action type → workflow file name. */
  readonly workflows: Readonly<Record<string, string>>;
  readonly ref?: string | undefined;
  readonly apiBase?: string | undefined;
  readonly fetchFn?: FetchFn | undefined;
}

export class WorkflowDispatchExecutor implements ActionExecutor {
  readonly name = 'workflow-dispatch';
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: WorkflowDispatchOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async execute(action: Action, context: ExecuteContext): Promise<ExecutorOutcome> {
    const { repository, token } = this.options;
    if (repository === undefined || repository === '' || token === undefined || token === '') {
      return { ok: false, error: 'workflow repository or token not configured' };
    }
    const workflow = this.options.workflows[action.type];
    if (workflow === undefined) {
      return { ok: false, error: `no workflow mapping for action type '${action.type}'` };
    }

    const url = `${this.options.apiBase ?? DEFAULT_API_BASE}/repos/${repository}/actions/workflows/${workflow}/dispatches`;
    const response = await postJson(
      this.fetchFn,
      url,
      { ref: this.options.ref ?? 'main', inputs: workflowInputs(action) },
      {
        headers: {
          Accept: 'application/vnd.github+json',
          Authorization: `Bearer ${token}`,
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: context.signal,
      },
    );
    if (response.status !== 204) {
      return { ok: false, error: `HTTP ${response.status}: ${excerpt(response.text)}` };
    }
    return { ok: true, detail: `workflow ${workflow} queued`, data: { workflow } };
  }
}

/** Workflow inputs are strings; everything else is JSON-encoded. */
function workflowInputs(action: Action): Record<string, string> {
  const inputs: Record<string, string> = { action_id: action.id };
  for (const [key, value] of Object.entries(action.params ?? {})) {
    inputs[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return inputs;
}
