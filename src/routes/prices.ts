import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { z } from 'zod';
import { getPriceHistory, updatePrice } from '../lib/ledger';
import { asyncHandler } from '../middleware/error-handler';
import { parseWith } from './params';

const router: RouterType = Router();

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

// POST /api/prices - manual price update, bypasses the crawler
router.post(
  '/',
  asyncHandler(async (req, res) => {
    const result = await updatePrice(req.body ?? {});
    res.status(201).json(result);
  })
);

router.get(
  '/:sku',
  asyncHandler(async (req, res) => {
    const { limit } = parseWith(historyQuerySchema, req.query, 'Invalid query');
    res.json(await getPriceHistory(req.params.sku, limit));
  })
);

export { router as pricesRouter };
