import cron, { type ScheduledTask } from 'node-cron';
import { buildStockQuote } from '../providers/finnhub.js';
import type { QuoteSource } from '../providers/provider.interface.js';
import { logger } from '../utils/logger.js';
import type { QuoteStore } from './quoteStore.js';

export interface RefreshError { symbol: string; error: string }

export interface RefreshResult {
  skipped: boolean;
  startedAt: string;
  finishedAt: string;
  updated: string[];
  unavailable: string[];
  errors: RefreshError[];
}

export interface QuoteUpdaterOptions {
  source: QuoteSource | null;
  store: QuoteStore;
  symbols: string[];
  cronExpr: string;
  rateLimiter?: { waitFor(cost?: number): Promise<void> };
  now?: () => number;
}

// Each symbol costs one /quote and one /stock/profile2 request
const REQUESTS_PER_SYMBOL = 2;

export class QuoteUpdater {
  private task: ScheduledTask | null = null;
  private running = false;
  private lastRunAt: string | null = null;
  private lastResult: RefreshResult | null = null;
  private readonly now: () => number;

  constructor(private readonly opts: QuoteUpdaterOptions) {
    this.now = opts.now ?? Date.now;
  }

  /** Runs one refresh right away, then on every cron tick. No-op without a quote source. */
  start() {
    if (this.task) return;
    if (!this.opts.source) {
      logger.warn('quote_updater_disabled_no_api_key');
      return;
    }
    this.task = cron.schedule(this.opts.cronExpr, () => { void this.tick(); }, { scheduled: true });
    logger.info({ cron: this.opts.cronExpr, symbols: this.opts.symbols.length }, 'quote_updater_scheduled');
    void this.tick();
  }

  stop() {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info('quote_updater_stopped');
  }

  status() {
    return {
      scheduled: this.task !== null,
      running: this.running,
      lastRunAt: this.lastRunAt,
      lastResult: this.lastResult
    };
  }

  async runOnce(): Promise<RefreshResult> {
    const startedAt = new Date(this.now()).toISOString();
    const result: RefreshResult = { skipped: false, startedAt, finishedAt: startedAt, updated: [], unavailable: [], errors: [] };
    if (this.running) {
      logger.warn('quote_refresh_overlap_skipped');
      return { ...result, skipped: true };
    }
    const source = this.opts.source;
    if (!source) return { ...result, skipped: true };

    this.running = true;
    try {
      for (const symbol of this.opts.symbols) {
        try {
          if (this.opts.rateLimiter) await this.opts.rateLimiter.waitFor(REQUESTS_PER_SYMBOL);
          const quote = await source.getQuote(symbol);
          const profile = await source.getProfile(symbol);
          const stock = buildStockQuote(symbol, quote, profile, this.now());
          if (!stock) {
            logger.warn({ symbol }, 'quote_unavailable');
            result.unavailable.push(symbol);
            continue;
          }
          this.opts.store.set(stock);
          result.updated.push(symbol);
          logger.debug({ symbol, company: stock.company_name }, 'quote_refreshed');
        } catch (err) {
          logger.warn({ symbol, err }, 'quote_refresh_failed');
          result.errors.push({ symbol, error: err instanceof Error ? err.message : String(err) });
        }
      }
    } finally {
      this.running = false;
    }
    result.finishedAt = new Date(this.now()).toISOString();
    this.lastRunAt = result.finishedAt;
    this.lastResult = result;
    logger.info({ updated: result.updated.length, unavailable: result.unavailable.length, errors: result.errors.length }, 'quote_refresh_done');
    return result;
  }

  private async tick() {
    try {
      await this.runOnce();
    } catch (err) {
      logger.error({ err }, 'quote_refresh_crashed');
    }
  }
}
