// Fetch with retry/backoff and a metrics hook
import fetch, { type RequestInit, type Response } from 'node-fetch';
import { logger } from './logger.js';
import { recordFetchMetric } from './metrics.js';

export type FetchRetryOptions = {
  retries?: number;          // total attempts including first (default 3)
  backoffMs?: number;        // initial backoff (default 500)
  backoffFactor?: number;    // multiplier (default 2)
  maxBackoffMs?: number;     // cap (default 5000)
  retryOn?: number[];        // status codes to retry (default [429,502,503,504])
  timeoutMs?: number;        // per attempt timeout
  label?: string;            // metrics label
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Resolves with the first response that is ok or not retryable.
 * Non-ok responses are returned to the caller; only network errors and
 * exhausted retries reject.
 */
export async function fetchWithRetry(url: string, init: RequestInit = {}, opts: FetchRetryOptions = {}): Promise<Response> {
  const {
    retries = 3,
    backoffMs = 500,
    backoffFactor = 2,
    maxBackoffMs = 5000,
    retryOn = [429, 502, 503, 504],
    timeoutMs,
    label = 'generic'
  } = opts;
  const attempts = Math.max(1, retries);
  const started = Date.now();
  let delay = backoffMs;
  let lastErr: unknown = null;

  for (let attempt = 0; attempt < attempts; attempt++) {
    const aStart = Date.now();
    const last = attempt === attempts - 1;
    const controller = timeoutMs ? new AbortController() : null;
    const timer = controller && timeoutMs ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
    try {
      const res = await fetch(url, { ...init, signal: controller?.signal ?? init.signal });
      const ms = Date.now() - aStart;
      if (retryOn.includes(res.status) && !last) {
        logger.warn({ url: redact(url), status: res.status, attempt }, 'fetch_retry_status');
        recordFetchMetric(label, 'retry', ms);
      } else {
        recordFetchMetric(label, res.ok ? 'ok' : 'error', ms);
        return res;
      }
    } catch (err) {
      lastErr = err;
      const ms = Date.now() - aStart;
      if (last) {
        recordFetchMetric(label, 'error', ms);
        break;
      }
      recordFetchMetric(label, 'retry', ms);
      logger.warn({ url: redact(url), err: errorMessage(err), attempt }, 'fetch_retry_err');
    } finally {
      if (timer) clearTimeout(timer);
    }
    await sleep(delay);
    delay = Math.min(maxBackoffMs, delay * backoffFactor);
  }

  logger.error({ url: redact(url), attempts, totalMs: Date.now() - started, err: errorMessage(lastErr) }, 'fetch_failed_exhausted');
  throw lastErr instanceof Error ? lastErr : new Error('fetch_failed');
}

// Keeps API tokens out of log lines
export function redact(url: string): string {
  return url.replace(/([?&](?:token|apikey|api_key)=)[^&]*/gi, '$1***');
}
