import { describe, it } from 'node:test';
import assert from 'node:assert';
import { QuoteStore } from '../src/services/quoteStore.js';
import { QuoteUpdater } from '../src/services/quoteUpdater.js';
import { FinnhubError } from '../src/providers/finnhub.js';
import type { FinnhubProfile, FinnhubQuote, QuoteSource } from '../src/providers/provider.interface.js';

process.env.LOG_LEVEL = 'silent';

class FakeSource implements QuoteSource {
  readonly name = 'fake';
  calls: string[] = [];
  gate: Promise<void> = Promise.resolve();

  constructor(private quotes: Record<string, FinnhubQuote | Error>) {}

  async getQuote(symbol: string): Promise<FinnhubQuote> {
    this.calls.push(`quote:${symbol}`);
    await this.gate;
    const q = this.quotes[symbol];
    if (q instanceof Error) throw q;
    return q;
  }

  async getProfile(symbol: string): Promise<FinnhubProfile> {
    this.calls.push(`profile:${symbol}`);
    return { name: `${symbol} Inc`, logo: '' };
  }
}

const NOW = Date.UTC(2026, 9, 18, 14, 30, 0);
const q = (c: number | null, pc: number): FinnhubQuote => ({ c, h: 10, l: 5, o: 7, pc });

describe('QuoteUpdater.runOnce', () => {
  it('stores a quote for every symbol that has a price', async () => {
    const store = new QuoteStore();
    const source = new FakeSource({ AAPL: q(150, 148), MSFT: q(400, 400) });
    const updater = new QuoteUpdater({ source, store, symbols: ['AAPL', 'MSFT'], cronExpr: '*/30 * * * * *', now: () => NOW });

    const result = await updater.runOnce();

    assert.deepStrictEqual(result.updated, ['AAPL', 'MSFT']);
    assert.deepStrictEqual(source.calls, ['quote:AAPL', 'profile:AAPL', 'quote:MSFT', 'profile:MSFT']);
    assert.strictEqual(store.get('AAPL')?.change, '2.00');
    assert.strictEqual(store.get('MSFT')?.company_name, 'MSFT Inc');
    assert.strictEqual(store.get('MSFT')?.timestamp, NOW);
    assert.strictEqual(updater.status().lastRunAt, '2026-10-18T14:30:00.000Z');
  });

  it('skips symbols without a current price', async () => {
    const store = new QuoteStore();
    const source = new FakeSource({ DEAD: q(null, 0), KO: q(60, 59) });
    const updater = new QuoteUpdater({ source, store, symbols: ['DEAD', 'KO'], cronExpr: '*/30 * * * * *' });

    const result = await updater.runOnce();

    assert.deepStrictEqual(result.unavailable, ['DEAD']);
    assert.deepStrictEqual(Object.keys(store.snapshot()), ['KO']);
  });

  it('keeps going after a failing symbol and keeps its previous quote', async () => {
    const store = new QuoteStore();
    const quotes: Record<string, FinnhubQuote | Error> = { IBM: q(180, 170), PEP: q(170, 171) };
    const updater = new QuoteUpdater({ source: new FakeSource(quotes), store, symbols: ['IBM', 'PEP'], cronExpr: '*/30 * * * * *' });
    await updater.runOnce();
    const before = store.get('IBM');

    quotes.IBM = new FinnhubError('Finnhub /quote error: 429 Too Many Requests', 429, 'IBM');
    quotes.PEP = q(172, 171);
    const result = await updater.runOnce();

    assert.deepStrictEqual(result.errors, [{ symbol: 'IBM', error: 'Finnhub /quote error: 429 Too Many Requests' }]);
    assert.deepStrictEqual(result.updated, ['PEP']);
    assert.deepStrictEqual(store.get('IBM'), before);
    assert.strictEqual(store.get('PEP')?.current_price, '172.00');
  });

  it('skips a run that starts while another is in flight', async () => {
    const store = new QuoteStore();
    const source = new FakeSource({ T: q(17, 17) });
    let release = () => {};
    source.gate = new Promise<void>((resolve) => { release = resolve; });
    const updater = new QuoteUpdater({ source, store, symbols: ['T'], cronExpr: '*/30 * * * * *' });

    const first = updater.runOnce();
    const second = await updater.runOnce();
    assert.strictEqual(second.skipped, true);
    assert.strictEqual(updater.status().running, true);

    release();
    assert.deepStrictEqual((await first).updated, ['T']);
    assert.strictEqual(updater.status().running, false);
  });

  it('does nothing without a quote source', async () => {
    const store = new QuoteStore();
    const updater = new QuoteUpdater({ source: null, store, symbols: ['AAPL'], cronExpr: '*/30 * * * * *' });
    updater.start();
    assert.strictEqual(updater.status().scheduled, false);
    assert.strictEqual((await updater.runOnce()).skipped, true);
    assert.strictEqual(store.size, 0);
  });

  it('waits on the rate limiter for each symbol', async () => {
    const costs: number[] = [];
    const store = new QuoteStore();
    const updater = new QuoteUpdater({
      source: new FakeSource({ V: q(250, 249), MA: q(450, 451) }),
      store,
      symbols: ['V', 'MA'],
      cronExpr: '*/30 * * * * *',
      rateLimiter: { waitFor: async (cost = 1) => { costs.push(cost); } }
    });
    await updater.runOnce();
    assert.deepStrictEqual(costs, [2, 2]);
  });
});
