import fs from 'fs';
import { JSDOM } from 'jsdom';
import type { Cancel, Scheduler } from '../src/lib/scheduler.js';
import type { FetchLike } from '../src/modules/fetch.js';
import type { DashboardSnapshot, DashboardStateStore } from '../src/state/store.js';
import type { StockQuote } from '../src/types/stock.types.js';

const INDEX_HTML = fs.readFileSync(new URL('../src/index.html', import.meta.url), 'utf8');

// Scripts and external resources are not loaded: only the markup matters here
export function loadPage(): JSDOM {
  return new JSDOM(INDEX_HTML, { url: 'http://localhost:5000/' });
}

export class ManualScheduler implements Scheduler {
  private tasks: Array<{ ms: number; fn: () => void; active: boolean }> = [];

  every(ms: number, fn: () => void): Cancel {
    const task = { ms, fn, active: true };
    this.tasks.push(task);
    return () => { task.active = false; };
  }

  fire(ms: number) {
    for (const t of this.tasks) if (t.active && t.ms === ms) t.fn();
  }

  activeIntervals(): number[] {
    return this.tasks.filter((t) => t.active).map((t) => t.ms).sort((a, b) => a - b);
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export interface FetchCall { url: string; init?: RequestInit }

export function fetchReturning(...responses: Array<() => Promise<Response>>): { fetchImpl: FetchLike; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchImpl: FetchLike = (url, init) => {
    calls.push({ url, init });
    const next = responses[Math.min(calls.length, responses.length) - 1];
    return next();
  };
  return { fetchImpl, calls };
}

export interface Deferred<T> { promise: Promise<T>; resolve(v: T): void; reject(err: unknown): void }

export function deferred<T>(): Deferred<T> {
  let resolve: (v: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
  return { promise, resolve, reject };
}

/** Resolves with the snapshot after the next poll outcome reaches the view. */
export function nextOutcome(state: DashboardStateStore): Promise<DashboardSnapshot> {
  return new Promise((resolve) => {
    const off = state.subscribe((snap, change) => {
      if (change.generation !== undefined) { off(); resolve(snap); }
    });
  });
}

export function quote(symbol: string, overrides: Partial<StockQuote> = {}): StockQuote {
  return {
    symbol,
    company_name: `${symbol} Holdings`,
    logo: `https://logos.test/${symbol}.png`,
    current_price: '101',
    prev_close_price: '100',
    open_price: '100.5',
    high_price: '102.3456',
    low_price: '99',
    timestamp: Date.UTC(2026, 9, 18, 14, 30, 5),
    ...overrides
  };
}

export function renderedSymbols(container: Element): Array<string | undefined> {
  return Array.from(container.querySelectorAll<HTMLElement>('[data-symbol]')).map((el) => el.dataset.symbol);
}
