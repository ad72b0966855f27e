/**
 * In-process `fetch` stand-in: records each request and answers from a
 * script keyed by URL.
 */

import type { FetchFn } from '../src/http.js';

export interface RecordedRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
}

export interface ScriptedReply {
  readonly status: number;
  readonly body?: unknown;
}

export class FakeFetch {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly replies: Readonly<Record<string, ScriptedReply>>) {}

  readonly fetch: FetchFn = (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const raw = init?.body;
    this.requests.push({ url, headers, body: typeof raw === 'string' ? JSON.parse(raw) : null });

    const reply = this.replies[url] ?? { status: 404, body: 'not found' };
    const text =
      reply.status === 204 || reply.body === undefined
        ? null
        : typeof reply.body === 'string'
          ? reply.body
          : JSON.stringify(reply.body);
    return Promise.resolve(new Response(text, { status: reply.status }));
  };
}

export const context = { timeoutMs: 1000, signal: new AbortController().signal };
