export interface ProviderConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
}

/** Raw Finnhub `/quote` payload. Unknown symbols come back as zeros or nulls. */
export interface FinnhubQuote {
  c: number | null;   // current
  h: number | null;   // high of day
  l: number | null;   // low of day
  o: number | null;   // open
  pc: number | null;  // previous close
  t?: number | null;
}

/** Subset of Finnhub `/stock/profile2` used for display. Empty object for unknown symbols. */
export interface FinnhubProfile {
  name?: string;
  logo?: string;
}

export interface QuoteSource {
  readonly name: string;
  getQuote(symbol: string): Promise<FinnhubQuote>;
  getProfile(symbol: string): Promise<FinnhubProfile>;
}

/**
 * Shape served by `GET /api/stocks`, keyed by symbol.
 * Prices are 2-decimal strings; `timestamp` is epoch milliseconds.
 */
export interface StockQuote {
  symbol: string;
  company_name: string;
  logo: string;
  current_price: string;
  high_price: string;
  low_price: string;
  open_price: string;
  prev_close_price: string;
  change: string;
  percentage_change: string;
  timestamp: number;
}
