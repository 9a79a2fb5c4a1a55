import type { QuoteChange } from '../types/stock.types.js';

/** Absolute and percentage change against the previous close; zero change counts as positive. */
export function computeChange(current: number, prevClose: number): QuoteChange {
  const change = current - prevClose;
  const pctChange = prevClose !== 0 ? (change / prevClose) * 100 : 0;
  const up = change >= 0;
  return {
    change,
    pctChange,
    polarity: up ? 'positive' : 'negative',
    arrow: up ? '▲' : '▼'
  };
}
