// In-memory counters for upstream fetches, keyed by label.
// Reset on process restart.

export type FetchMetricKind = 'ok' | 'error' | 'retry';

interface FetchStats {
  ok: number;
  error: number;
  retry: number;
  count: number;
  sumMs: number;
  minMs: number;
  maxMs: number;
}

export interface FetchStatsSnapshot {
  ok: number;
  error: number;
  retry: number;
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

const stats = new Map<string, FetchStats>();

function ensure(label: string): FetchStats {
  let s = stats.get(label);
  if (!s) {
    s = { ok: 0, error: 0, retry: 0, count: 0, sumMs: 0, minMs: Number.POSITIVE_INFINITY, maxMs: 0 };
    stats.set(label, s);
  }
  return s;
}

export function recordFetchMetric(label: string, kind: FetchMetricKind, ms: number) {
  const s = ensure(label);
  s[kind]++;
  s.count++;
  s.sumMs += ms;
  if (ms < s.minMs) s.minMs = ms;
  if (ms > s.maxMs) s.maxMs = ms;
}

export function getMetricsSnapshot(): Record<string, FetchStatsSnapshot> {
  const out: Record<string, FetchStatsSnapshot> = {};
  for (const [label, s] of stats) {
    out[label] = {
      ok: s.ok,
      error: s.error,
      retry: s.retry,
      count: s.count,
      avgMs: s.count ? Number((s.sumMs / s.count).toFixed(1)) : 0,
      minMs: Number.isFinite(s.minMs) ? s.minMs : 0,
      maxMs: s.maxMs
    };
  }
  return out;
}

export function resetMetrics() {
  stats.clear();
}
