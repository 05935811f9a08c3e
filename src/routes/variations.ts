import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { z } from 'zod';
import {
  createVariation,
  getVariationById,
  getVariationBySku,
  getVariations
} from '../lib/db/queries/variations';
import { getProductById } from '../lib/db/queries/products';
import {
  crawlStatus,
  disableCrawling,
  enableCrawling,
  resetErrors,
  shouldCrawl
} from '../lib/crawler/health';
import { NotFoundError, ValidationError } from '../lib/errors';
import type { PriceEntry, ProductVariation } from '../lib/db/schema';
import { asyncHandler } from '../middleware/error-handler';
import { parseId, parseWith } from './params';

const router: RouterType = Router();

const createVariationSchema = z.object({
  productId: z.number().int().positive(),
  name: z.string().trim().min(1).max(200),
  sku: z.string().trim().min(1).max(100),
  url: z.string().trim().url().nullish(),
  isCrawlingEnabled: z.boolean().optional()
});

const crawlingActionSchema = z.object({
  ids: z.array(z.number().int().positive()).min(1, 'At least one id is required'),
  action: z.enum(['enable', 'disable', 'reset_errors'])
});

type CrawlingAction = z.infer<typeof crawlingActionSchema>['action'];

const crawlingActions: Record<CrawlingAction, (ids: number[]) => Promise<number>> = {
  enable: enableCrawling,
  disable: disableCrawling,
  reset_errors: resetErrors
};

// priceEntries holds at most the newest entry
function toView<T extends ProductVariation & { priceEntries: PriceEntry[] }>(variation: T) {
  const { priceEntries, ...rest } = variation;
  return {
    ...rest,
    currentPrice: priceEntries[0]?.price ?? null,
    shouldCrawl: shouldCrawl(variation),
    crawlStatus: crawlStatus(variation)
  };
}

router.get(
  '/',
  asyncHandler(async (_req, res) => {
    const variations = await getVariations();
    res.json(variations.map(toView));
  })
);

router.get(
  '/:id',
  asyncHandler(async (req, res) => {
    const id = parseId(req.params.id);
    const variation = await getVariationById(id);
    if (!variation) {
      throw new NotFoundError(`Variation ${id} not found`);
    }
    res.json(toView(variation));
  })
);

router.post(
  '/',
  asyncHandler(async (req, res) => {
    const data = parseWith(createVariationSchema, req.body, 'Invalid variation');

    if (!(await getProductById(data.productId))) {
      throw new NotFoundError(`Product ${data.productId} not found`);
    }
    if (await getVariationBySku(data.sku)) {
      throw new ValidationError(`SKU '${data.sku}' already exists`);
    }

    const variation = await createVariation({
      productId: data.productId,
      name: data.name,
      sku: data.sku,
      url: data.url ?? null,
      isCrawlingEnabled: data.isCrawlingEnabled ?? true
    });
    res.status(201).json(variation);
  })
);

// POST /api/variations/crawling - bulk enable, disable or reset errors
router.post(
  '/crawling',
  asyncHandler(async (req, res) => {
    const { ids, action } = parseWith(crawlingActionSchema, req.body, 'Invalid crawling action');

    const updated = await crawlingActions[action](ids);

    console.log(`[Crawler] ${action} applied to ${updated} variations`);
    res.json({ action, updated });
  })
);

export { router as variationsRouter };
