import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

function resolveStocklistPath(explicit?: string): string | null {
  if (explicit) return path.resolve(explicit);
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(process.cwd(), 'stocklist.json'),
    path.resolve(process.cwd(), 'server', 'stocklist.json'),
    path.resolve(here, '..', '..', 'stocklist.json')
  ];
  for (const p of candidates) { if (fs.existsSync(p)) return p; }
  return null;
}

// Uppercases, trims and de-duplicates while keeping first-seen order
export function normalizeSymbols(input: Iterable<string>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const raw of input) {
    const sym = raw.trim().toUpperCase();
    if (!sym || seen.has(sym)) continue;
    seen.add(sym);
    out.push(sym);
  }
  return out;
}

/** Reads `explicit` when given (a missing file then throws), else the bundled stocklist.json. */
export function loadStocklist(explicit?: string): string[] {
  const p = resolveStocklistPath(explicit);
  if (!p) return [];
  const json: unknown = JSON.parse(fs.readFileSync(p, 'utf8'));
  if (!Array.isArray(json)) throw new Error(`${p} must contain an array of symbols`);
  return normalizeSymbols(json.filter((s): s is string => typeof s === 'string'));
}
