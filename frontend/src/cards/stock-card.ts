import { computeChange } from '../lib/quote.js';
import { escapeHtml, fmtNum, fmtTime, toNumber } from '../lib/format.js';
import { createElement, isImage } from '../shared/utils/dom-utils.js';
import type { StockQuote } from '../types/stock.types.js';

// Grey rounded square shown when a logo is missing or fails to load
export const FALLBACK_LOGO =
  "data:image/svg+xml;charset=utf-8,%3Csvg xmlns='http://www.w3.org/2000/svg' width='40' height='40'%3E" +
  "%3Crect width='40' height='40' rx='8' fill='%23ced4da'/%3E%3C/svg%3E";

const SECONDARY_FIELDS = [
  ['Open', 'open_price'],
  ['High', 'high_price'],
  ['Low', 'low_price'],
  ['Prev Close', 'prev_close_price']
] as const;

export function createStockCard(doc: Document, symbol: string, quote: StockQuote): HTMLElement {
  const current = toNumber(quote.current_price);
  const { change, pctChange, polarity, arrow } = computeChange(current, toNumber(quote.prev_close_price));
  const name = quote.company_name || symbol;

  const col = createElement(doc, 'div', 'col-sm-6 col-lg-4 col-xl-3 mb-4');
  col.dataset.symbol = symbol;
  col.innerHTML = `
    <div class="card stock-card h-100 shadow-sm">
      <div class="card-body">
        <div class="d-flex align-items-center mb-3">
          <img class="stock-logo me-2" width="40" height="40" alt="${escapeHtml(name)} logo" src="${escapeHtml(quote.logo || FALLBACK_LOGO)}">
          <div>
            <h5 class="card-title mb-0 company-name">${escapeHtml(name)}</h5>
            <span class="text-muted stock-symbol">${escapeHtml(symbol)}</span>
          </div>
        </div>
        <div class="stock-price">$${fmtNum(current)}</div>
        <div class="stock-change ${polarity}">${arrow} ${fmtNum(change)} (${fmtNum(pctChange)}%)</div>
        <div class="row secondary-prices mt-2">
          ${SECONDARY_FIELDS.map(([label, key]) => `
          <div class="col-6"><small class="text-muted">${label}:</small> <span data-field="${key}">${fmtNum(quote[key])}</span></div>`).join('')}
        </div>
      </div>
      <div class="card-footer last-update"><small class="text-muted">Last updated: ${escapeHtml(fmtTime(quote.timestamp))}</small></div>
    </div>`;

  const logo = col.querySelector('.stock-logo');
  if (isImage(logo)) {
    logo.addEventListener('error', () => { logo.src = FALLBACK_LOGO; }, { once: true });
  }
  return col;
}
