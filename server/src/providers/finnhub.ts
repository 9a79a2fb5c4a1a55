import { z } from 'zod';
import { fetchWithRetry, redact } from '../utils/fetchRetry.js';
import { logger } from '../utils/logger.js';
import type { FinnhubProfile, FinnhubQuote, ProviderConfig, StockQuote } from './provider.interface.js';

export class FinnhubError extends Error {
  constructor(message: string, readonly status: number, readonly symbol?: string) {
    super(message);
    this.name = 'FinnhubError';
  }
}

const price = z.number().nullable().optional().transform((v) => v ?? null);

const QuoteSchema = z.object({
  c: price,
  h: price,
  l: price,
  o: price,
  pc: price,
  t: price
});

const ProfileSchema = z.object({
  name: z.string().optional(),
  logo: z.string().optional()
}).passthrough();

async function getJson(cfg: ProviderConfig, endpoint: string, symbol: string): Promise<unknown> {
  const url = `${cfg.baseUrl}${endpoint}?symbol=${encodeURIComponent(symbol)}&token=${encodeURIComponent(cfg.apiKey)}`;
  logger.debug({ symbol, url: redact(url) }, 'finnhub_fetch');
  const res = await fetchWithRetry(url, { headers: { Accept: 'application/json' } }, {
    label: 'finnhub',
    retries: cfg.retries,
    backoffMs: cfg.backoffMs,
    timeoutMs: cfg.timeoutMs ?? 10000
  });
  if (!res.ok) {
    throw new FinnhubError(`Finnhub ${endpoint} error: ${res.status} ${res.statusText}`.trim(), res.status, symbol);
  }
  try {
    return await res.json();
  } catch {
    throw new FinnhubError(`Finnhub ${endpoint} returned invalid JSON`, 502, symbol);
  }
}

export async function fetchQuote(cfg: ProviderConfig, symbol: string): Promise<FinnhubQuote> {
  const parsed = QuoteSchema.safeParse(await getJson(cfg, '/quote', symbol));
  if (!parsed.success) throw new FinnhubError('Finnhub /quote payload has unexpected shape', 502, symbol);
  return parsed.data;
}

export async function fetchProfile(cfg: ProviderConfig, symbol: string): Promise<FinnhubProfile> {
  const parsed = ProfileSchema.safeParse(await getJson(cfg, '/stock/profile2', symbol));
  if (!parsed.success) throw new FinnhubError('Finnhub /stock/profile2 payload has unexpected shape', 502, symbol);
  return { name: parsed.data.name, logo: parsed.data.logo };
}

const fixed2 = (n: number | null) => (n ?? 0).toFixed(2);

/**
 * Merges a quote and a profile into the served shape.
 * Returns null when Finnhub has no current price for the symbol.
 */
export function buildStockQuote(symbol: string, quote: FinnhubQuote, profile: FinnhubProfile, now = Date.now()): StockQuote | null {
  if (quote.c === null) return null;
  const current = quote.c;
  const prevClose = quote.pc ?? 0;
  const change = current - prevClose;
  const percentageChange = prevClose ? (change / prevClose) * 100 : 0;
  return {
    symbol,
    company_name: profile.name || symbol,
    logo: profile.logo || '',
    current_price: fixed2(current),
    high_price: fixed2(quote.h),
    low_price: fixed2(quote.l),
    open_price: fixed2(quote.o),
    prev_close_price: fixed2(prevClose),
    change: change.toFixed(2),
    percentage_change: percentageChange.toFixed(2),
    timestamp: now
  };
}
