import express from 'express';
import cors from 'cors';
import { createStocksRouter } from './routes/stocks.js';
import { createHealthRouter } from './routes/health.js';
import { notFoundHandler, errorHandler } from './middleware/errorHandler.js';
import { logger } from './utils/logger.js';
import type { QuoteStore } from './services/quoteStore.js';
import type { QuoteUpdater } from './services/quoteUpdater.js';

export interface AppDeps {
  store: QuoteStore;
  updater: QuoteUpdater;
  staticDir?: string;
}

export function createApp({ store, updater, staticDir }: AppDeps) {
  const app = express();
  app.disable('x-powered-by');
  app.use(cors());
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({ method: req.method, url: req.originalUrl, status: res.statusCode, ms: Date.now() - start }, 'http_request');
    });
    next();
  });

  app.use(createHealthRouter(store, updater));
  app.use('/api', createStocksRouter(store));
  // extensions lets /calculator resolve to calculator.html
  if (staticDir) app.use(express.static(staticDir, { extensions: ['html'] }));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
