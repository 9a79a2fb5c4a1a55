import { Router } from 'express';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { QuoteStore } from '../services/quoteStore.js';

export function createStocksRouter(store: QuoteStore) {
  const router = Router();

  // Raw symbol -> quote mapping, no envelope: the dashboard iterates the keys directly.
  router.get('/stocks', asyncHandler(async (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json(store.snapshot());
  }));

  return router;
}
