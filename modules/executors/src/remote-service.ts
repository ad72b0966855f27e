/**
 * Helmsman Executors — Remote Service
 *
 * Calls a remote automation service with a JSON-RPC 2.0 request. Services
 * mount their RPC handler at different paths, so the endpoint list is tried
 * in order and the first HTTP 200 carrying a JSON-RPC result wins. A
 * JSON-RPC error object from an endpoint fails the attempt outright.
 */

import type { Action, ActionExecutor, ExecuteContext, ExecutorOutcome } from '@helmsman/kernel';
import { bearer, excerpt, joinUrl, postJson } from './http.js';
import type { FetchFn } from './http.js';

export const DEFAULT_RPC_ENDPOINTS: ReadonlyArray<string> = ['/mcp', '/'];

export interface RemoteServiceOptions {
  /** Base URL of the service; unset leaves the path unconfigured. */
  readonly baseUrl?: string | undefined;
  readonly token?: string | undefined;
  readonly endpoints?: ReadonlyArray<string> | undefined;
  /** JSON-RPC method; defaults to the action type. */
  readonly method?: ((action: Action) => string) | undefined;
  readonly fetchFn?: FetchFn | undefined;
}

interface RpcReply {
  readonly result: unknown;
  /** Message of the JSON-RPC error object, or null on success. */
  readonly error: string | null;
}

export class RemoteServiceExecutor implements ActionExecutor {
  readonly name = 'remote-service';
  private readonly endpoints: ReadonlyArray<string>;
  private readonly fetchFn: FetchFn;
  private requestId = 0;

  constructor(private readonly options: RemoteServiceOptions) {
    this.endpoints = options.endpoints ?? DEFAULT_RPC_ENDPOINTS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async execute(action: Action, context: ExecuteContext): Promise<ExecutorOutcome> {
    const baseUrl = this.options.baseUrl;
    if (baseUrl === undefined || baseUrl === '') {
      return { ok: false, error: 'remote service URL not configured' };
    }

    const request = {
      jsonrpc: '2.0',
      id: ++this.requestId,
      method: this.options.method?.(action) ?? action.type,
      params: { action_id: action.id, targets: action.targets, ...action.params },
    };

    const failures: string[] = [];
    for (const endpoint of this.endpoints) {
      const response = await postJson(this.fetchFn, joinUrl(baseUrl, endpoint), request, {
        headers: bearer(this.options.token),
        signal: context.signal,
      });
      if (response.status !== 200) {
        failures.push(`${endpoint} HTTP ${response.status}`);
        continue;
      }
      const reply = parseReply(response.text);
      if (reply === null) {
        failures.push(`${endpoint} returned a non-JSON-RPC body`);
        continue;
      }
      if (reply.error !== null) {
        return { ok: false, error: `JSON-RPC error from ${endpoint}: ${excerpt(reply.error)}` };
      }
      return { ok: true, detail: `remote service ${endpoint}`, data: reply.result };
    }
    return { ok: false, error: `no endpoint responded successfully (${failures.join('; ')})` };
  }
}

function parseReply(text: string): RpcReply | null {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof body !== 'object' || body === null || !('jsonrpc' in body)) return null;
  if ('error' in body && typeof body.error === 'object' && body.error !== null) {
    const message = 'message' in body.error ? body.error.message : undefined;
    return { result: undefined, error: typeof message === 'string' ? message : 'unknown error' };
  }
  return { result: 'result' in body ? body.result : undefined, error: null };
}
