import { Router } from 'express';
import { asyncHandler } from '../utils/asyncHandler.js';
import { getMetricsSnapshot } from '../utils/metrics.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import type { QuoteStore } from '../services/quoteStore.js';
import type { QuoteUpdater } from '../services/quoteUpdater.js';

export function createHealthRouter(store: QuoteStore, updater: QuoteUpdater) {
  const router = Router();

  router.get('/health', asyncHandler(async (_req, res) => {
    const { scheduled, running, lastRunAt } = updater.status();
    res.json(ResponseUtils.success({ symbols: store.size, scheduled, running, lastRunAt }));
  }));

  router.get('/health/fetch', asyncHandler(async (_req, res) => {
    res.json(ResponseUtils.success({ lastResult: updater.status().lastResult, fetch: getMetricsSnapshot() }));
  }));

  return router;
}
