import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { FinnhubProvider } from './providers/FinnhubProvider.js';
import { RateLimiter } from './providers/RateLimiter.js';
import { QuoteStore } from './services/quoteStore.js';
import { QuoteUpdater } from './services/quoteUpdater.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'unhandled_rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaught_exception');
});

function listen(app: ReturnType<typeof createApp>, port: number) {
  return new Promise<Server>((resolve, reject) => {
    const srv = app.listen(port, () => resolve(srv));
    srv.on('error', reject);
  });
}

async function main() {
  const config = loadConfig();
  const store = new QuoteStore();
  const source = config.finnhub.apiKey
    ? new FinnhubProvider({ baseUrl: config.finnhub.baseUrl, apiKey: config.finnhub.apiKey })
    : null;
  const updater = new QuoteUpdater({
    source,
    store,
    symbols: config.symbols,
    cronExpr: config.refreshCron,
    rateLimiter: new RateLimiter(config.finnhub.rateLimitRpm)
  });
  const app = createApp({ store, updater, staticDir: config.staticDir });

  const srv = await listen(app, config.port);
  logger.info({ port: config.port, staticDir: config.staticDir, symbols: config.symbols.length }, 'server_listening');
  updater.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutdown');
    updater.stop();
    srv.close((err) => {
      if (err) logger.error({ err }, 'server_close_failed');
      process.exit(err ? 1 : 0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  logger.error({ err }, 'server_start_failed');
  process.exit(1);
});
