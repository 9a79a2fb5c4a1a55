// Shared lightweight formatting helpers
export function escapeHtml(s: unknown): string {
  if (s === undefined || s === null) return '';
  return String(s)
    .replace(/&/g,'&amp;')
    .replace(/</g,'&lt;')
    .replace(/>/g,'&gt;')
    .replace(/"/g,'&quot;')
    .replace(/'/g,'&#39;');
}

export function toNumber(x: unknown): number {
  if (typeof x === 'number') return x;
  if (typeof x === 'string' && x.trim() !== '') return Number.parseFloat(x);
  return Number.NaN;
}

export function fmtNum(x: unknown, d=2): string {
  const n = toNumber(x);
  return Number.isFinite(n) ? n.toFixed(d) : '—';
}

const CLOCK_FORMAT: Intl.DateTimeFormatOptions = {
  weekday: 'short',
  year: 'numeric',
  month: 'short',
  day: 'numeric',
  hour: 'numeric',
  minute: '2-digit',
  second: '2-digit',
  hour12: true
};

// e.g. "Sun, Oct 18, 2026, 3:04:05 PM"
export function fmtClock(date: Date, locale = 'en-US'): string {
  return date.toLocaleString(locale, CLOCK_FORMAT);
}

// Accepts epoch ms or anything Date can parse
export function fmtTime(ts: unknown, locale = 'en-US'): string {
  const n = typeof ts === 'string' && /^\d+$/.test(ts.trim()) ? Number(ts) : ts;
  const date = typeof n === 'number' ? new Date(n) : typeof n === 'string' ? new Date(n) : null;
  if (!date || Number.isNaN(date.getTime())) return '—';
  return date.toLocaleTimeString(locale);
}
