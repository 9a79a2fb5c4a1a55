// Central JSON fetch for the dashboard. One attempt per call; the next poll
// tick is the only retry.

// Longest a single request may take before it is aborted and counted as a failed poll
export const REQUEST_TIMEOUT_MS = 8000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchJsonOptions<T> {
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
  timeoutMs?: number;
  validate: (data: unknown) => T; // throw if invalid
}

export class HttpError extends Error {
  constructor(readonly status: number, statusText: string) {
    super(`HTTP ${status} ${statusText}`.trim());
    this.name = 'HttpError';
  }
}

const globalFetch: FetchLike = (input, init) => fetch(input, init);

export async function fetchJson<T>(url: string, opts: FetchJsonOptions<T>): Promise<T> {
  const { fetchImpl = globalFetch, signal, timeoutMs = REQUEST_TIMEOUT_MS, validate } = opts;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });
  const timeout = setTimeout(onAbort, timeoutMs);
  try {
    const res = await fetchImpl(url, { method: 'GET', headers: { Accept: 'application/json' }, signal: controller.signal });
    if (!res.ok) throw new HttpError(res.status, res.statusText);
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new Error('invalid_json', { cause: err });
    }
    return validate(json);
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', onAbort);
  }
}
