import fs from 'fs';
import path from 'path';
import cron from 'node-cron';
import { z } from 'zod';
import { loadStocklist, normalizeSymbols } from '../utils/stocklist.js';

export interface AppConfig {
  port: number;
  finnhub: {
    apiKey: string | null;
    baseUrl: string;
    rateLimitRpm: number;
  };
  symbols: string[];
  refreshCron: string;
  staticDir: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(5000)),
  FINNHUB_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  FINNHUB_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default('https://finnhub.io/api/v1')),
  FINNHUB_RPM: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(60)),
  STOCK_SYMBOLS: z.preprocess(blankToUndefined, z.string().optional()),
  STOCKLIST_PATH: z.preprocess(blankToUndefined, z.string().optional()),
  REFRESH_CRON: z.preprocess(
    blankToUndefined,
    z.string().default('*/30 * * * * *').refine((expr) => cron.validate(expr), 'not a valid cron expression')
  ),
  STATIC_DIR: z.preprocess(blankToUndefined, z.string().optional())
});

function resolveStaticDir(explicit?: string): string {
  if (explicit) return path.resolve(explicit);
  const candidates = [
    path.resolve(process.cwd(), 'frontend', 'dist'),
    path.resolve(process.cwd(), '..', 'frontend', 'dist')
  ];
  return candidates.find((p) => fs.existsSync(p)) ?? candidates[0];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  const symbols = e.STOCK_SYMBOLS ? normalizeSymbols(e.STOCK_SYMBOLS.split(',')) : loadStocklist(e.STOCKLIST_PATH);
  return {
    port: e.PORT,
    finnhub: {
      apiKey: e.FINNHUB_API_KEY || null,
      baseUrl: e.FINNHUB_BASE_URL.replace(/\/+$/, ''),
      rateLimitRpm: e.FINNHUB_RPM
    },
    symbols,
    refreshCron: e.REFRESH_CRON,
    staticDir: resolveStaticDir(e.STATIC_DIR)
  };
}
