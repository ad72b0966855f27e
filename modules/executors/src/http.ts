/**
 * Helmsman Executors — HTTP helpers
 *
 * Every HTTP backend posts JSON through an injectable `fetch`, so tests run
 * against an in-process stand-in and never reach the network.
 */

export type FetchFn = typeof fetch;

export interface HttpResponse {
  readonly status: number;
  readonly text: string;
}

export interface PostJsonOptions {
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly signal: AbortSignal;
}

export async function postJson(
  fetchFn: FetchFn,
  url: string,
  body: unknown,
  options: PostJsonOptions,
): Promise<HttpResponse> {
  const response = await fetchFn(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...options.headers },
    body: JSON.stringify(body),
    signal: options.signal,
  });
  return { status: response.status, text: await response.text() };
}

export function bearer(token: string | undefined): Record<string, string> {
  return token === undefined || token === '' ? {} : { Authorization: `Bearer ${token}` };
}

/** Trim a response body for an attempt's error or detail. */
export function excerpt(text: string, max = 200): string {
  return text.length <= max ? text : `${text.slice(0, max)}…`;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
