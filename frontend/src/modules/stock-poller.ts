import { createStockCard } from '../cards/stock-card.js';
import { intervalScheduler, type Cancel, type Scheduler } from '../lib/scheduler.js';
import { createMessage } from '../shared/utils/dom-utils.js';
import type { DashboardStateStore } from '../state/store.js';
import type { StockQuote, StockQuoteMap } from '../types/stock.types.js';
import { fetchJson, type FetchLike } from './fetch.js';

export const STOCKS_ENDPOINT = '/api/stocks';
export const POLL_INTERVAL_MS = 10_000;
export const EMPTY_MESSAGE = 'No stock data available yet. Data will appear after the next update.';
export const ERROR_MESSAGE = 'Failed to load stock data. Please try again later.';

export type PollOutcome = 'rendered' | 'empty' | 'error' | 'stale' | 'aborted';

export interface StockPollerOptions {
  container: HTMLElement;
  state: DashboardStateStore;
  fetchImpl?: FetchLike;
  scheduler?: Scheduler;
  endpoint?: string;
  intervalMs?: number;
  now?: () => number;
  log?: (message: string, err: unknown) => void;
}

const PRICE_KEYS = ['current_price', 'prev_close_price', 'open_price', 'high_price', 'low_price'] as const;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isQuote(v: unknown): v is StockQuote {
  if (!isRecord(v)) return false;
  if (typeof v.company_name !== 'string' || typeof v.logo !== 'string') return false;
  if (typeof v.timestamp !== 'number' && typeof v.timestamp !== 'string') return false;
  return PRICE_KEYS.every((k) => typeof v[k] === 'string' || typeof v[k] === 'number');
}

/** Accepts a symbol -> quote object; anything else fails the poll. */
export function parseQuoteMap(raw: unknown): StockQuoteMap {
  if (!isRecord(raw)) throw new TypeError('Expected an object keyed by symbol');
  const entries = Object.entries(raw).map(([symbol, quote]): [string, StockQuote] => {
    if (!isQuote(quote)) throw new TypeError(`Malformed quote for ${symbol}`);
    return [symbol, quote];
  });
  // fromEntries keeps a "__proto__" key as an own property
  return Object.fromEntries(entries);
}

/**
 * Polls the quote endpoint on a fixed interval and rebuilds the card grid
 * from each response. Requests may overlap; a response older than the one
 * already on screen is dropped.
 */
export class StockPoller {
  private cancel: Cancel | null = null;
  private issued = 0;
  private applied = 0;
  private inflight = new Set<AbortController>();
  private readonly doc: Document;

  constructor(private readonly opts: StockPollerOptions) {
    this.doc = opts.container.ownerDocument;
  }

  get running(): boolean {
    return this.cancel !== null;
  }

  start() {
    if (this.cancel) return;
    const scheduler = this.opts.scheduler ?? intervalScheduler;
    this.cancel = scheduler.every(this.opts.intervalMs ?? POLL_INTERVAL_MS, () => { void this.pollOnce(); });
    void this.pollOnce();
  }

  stop() {
    this.cancel?.();
    this.cancel = null;
    for (const c of this.inflight) c.abort();
    this.inflight.clear();
    this.opts.state.resetPolls();
  }

  async pollOnce(): Promise<PollOutcome> {
    const generation = ++this.issued;
    const controller = new AbortController();
    this.inflight.add(controller);
    this.opts.state.beginPoll();
    try {
      const quotes = await fetchJson(this.opts.endpoint ?? STOCKS_ENDPOINT, {
        fetchImpl: this.opts.fetchImpl,
        signal: controller.signal,
        validate: parseQuoteMap
      });
      if (controller.signal.aborted) return 'aborted';
      if (generation < this.applied) return this.drop();
      return this.commit(generation, () => this.render(quotes));
    } catch (err) {
      if (controller.signal.aborted) return 'aborted';
      if (generation < this.applied) return this.drop();
      (this.opts.log ?? console.error)('Error fetching stock data:', err);
      return this.commit(generation, () => this.showError());
    } finally {
      this.inflight.delete(controller);
    }
  }

  private drop(): 'stale' {
    this.opts.state.dropPoll();
    return 'stale';
  }

  private commit(generation: number, paint: () => 'rendered' | 'empty' | 'error'): 'rendered' | 'empty' | 'error' {
    let outcome: 'rendered' | 'empty' | 'error';
    try {
      outcome = paint();
    } catch (err) {
      (this.opts.log ?? console.error)('Error rendering stock data:', err);
      outcome = this.showError();
    }
    this.applied = generation;
    const cards = outcome === 'rendered' ? this.opts.container.children.length : 0;
    this.opts.state.finishPoll(generation, outcome, cards, (this.opts.now ?? Date.now)());
    return outcome;
  }

  // Cards are built off-document and swapped in at once, so a throw leaves no partial grid
  private render(quotes: StockQuoteMap): 'rendered' | 'empty' {
    const symbols = Object.keys(quotes).sort();
    if (!symbols.length) {
      this.opts.container.replaceChildren(createMessage(this.doc, 'loading-message', EMPTY_MESSAGE));
      return 'empty';
    }
    const fragment = this.doc.createDocumentFragment();
    for (const symbol of symbols) fragment.appendChild(createStockCard(this.doc, symbol, quotes[symbol]));
    this.opts.container.replaceChildren(fragment);
    return 'rendered';
  }

  private showError(): 'error' {
    this.opts.container.replaceChildren(createMessage(this.doc, 'error-message', ERROR_MESSAGE));
    return 'error';
  }
}
