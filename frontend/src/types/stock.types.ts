// Shapes received from GET /api/stocks

/** Prices arrive as numeric strings and are parsed at render time. */
export type PriceValue = string | number;

export interface StockQuote {
  symbol: string;
  company_name: string;
  logo: string;
  current_price: PriceValue;
  prev_close_price: PriceValue;
  open_price: PriceValue;
  high_price: PriceValue;
  low_price: PriceValue;
  timestamp: number | string;
  change?: PriceValue;
  percentage_change?: PriceValue;
}

export type StockQuoteMap = Record<string, StockQuote>;

export type Polarity = 'positive' | 'negative';

export interface QuoteChange {
  change: number;
  pctChange: number;
  polarity: Polarity;
  arrow: '▲' | '▼';
}
