import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { z } from 'zod';
import { crawlQueue, type CrawlRequest } from '../lib/queue';
import { getAllRecentRuns, getRunsForVariation, parseRunLogs } from '../lib/db/queries/crawl-runs';
import { getSettingNumber } from '../lib/db/queries/settings';
import { asyncHandler } from '../middleware/error-handler';
import { parseWith } from './params';

const router: RouterType = Router();

const crawlRequestSchema = z
  .object({
    variationIds: z.array(z.number().int().positive()).optional(),
    categoryId: z.number().int().positive().optional(),
    limit: z.number().int().positive().optional()
  })
  .refine((body) => (body.variationIds === undefined) !== (body.categoryId === undefined), {
    message: 'Provide either variationIds or categoryId'
  });

const runsQuerySchema = z.object({
  variationId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(500).optional()
});

// POST /api/crawl - run a batch through the crawl queue and return its summary
router.post(
  '/',
  asyncHandler(async (req, res) => {
    const body = parseWith(crawlRequestSchema, req.body, 'Invalid crawl request');

    const request: CrawlRequest =
      body.categoryId !== undefined
        ? { kind: 'category', categoryId: body.categoryId, limit: body.limit }
        : { kind: 'variations', variationIds: body.variationIds ?? [] };

    const summary = await crawlQueue.add(request);
    res.json(summary);
  })
);

router.get(
  '/runs',
  asyncHandler(async (req, res) => {
    const query = parseWith(runsQuerySchema, req.query, 'Invalid query');
    const limit = query.limit ?? getSettingNumber('crawl_runs_history_limit', 50);

    const runs =
      query.variationId !== undefined
        ? await getRunsForVariation(query.variationId, limit)
        : await getAllRecentRuns(limit);

    res.json(runs.map((run) => ({ ...run, logs: parseRunLogs(run) })));
  })
);

router.get('/queue', (_req, res) => {
  res.json(crawlQueue.getState());
});

export { router as crawlRouter };
