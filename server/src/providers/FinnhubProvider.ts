import { fetchProfile, fetchQuote } from './finnhub.js';
import type { FinnhubProfile, FinnhubQuote, ProviderConfig, QuoteSource } from './provider.interface.js';

export class FinnhubProvider implements QuoteSource {
  readonly name = 'finnhub';

  constructor(private readonly cfg: ProviderConfig) {}

  getQuote(symbol: string): Promise<FinnhubQuote> {
    return fetchQuote(this.cfg, symbol);
  }

  getProfile(symbol: string): Promise<FinnhubProfile> {
    return fetchProfile(this.cfg, symbol);
  }
}
