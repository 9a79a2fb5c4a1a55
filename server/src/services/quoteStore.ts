import type { StockQuote } from '../providers/provider.interface.js';

// Latest quote per symbol; each write replaces the previous entry wholesale.
export class QuoteStore {
  private quotes = new Map<string, StockQuote>();

  set(quote: StockQuote) {
    this.quotes.set(quote.symbol, quote);
  }

  get(symbol: string): StockQuote | undefined {
    return this.quotes.get(symbol.toUpperCase());
  }

  get size(): number {
    return this.quotes.size;
  }

  snapshot(): Record<string, StockQuote> {
    const out: Record<string, StockQuote> = {};
    for (const [symbol, quote] of this.quotes) out[symbol] = { ...quote };
    return out;
  }
}
