import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { z } from 'zod';
import {
  createCategory,
  getCategoriesWithCrawlableCounts,
  getCategoryById
} from '../lib/db/queries/categories';
import { NotFoundError } from '../lib/errors';
import { asyncHandler } from '../middleware/error-handler';
import { parseWith } from './params';

const router: RouterType = Router();

const createCategorySchema = z.object({
  name: z.string().trim().min(1).max(120),
  slug: z.string().trim().min(1).max(100).optional(),
  parentId: z.number().int().positive().nullish()
});

router.get(
  '/',
  asyncHandler(async (_req, res) => {
    res.json(await getCategoriesWithCrawlableCounts());
  })
);

router.post(
  '/',
  asyncHandler(async (req, res) => {
    const data = parseWith(createCategorySchema, req.body, 'Invalid category');

    if (data.parentId != null && !(await getCategoryById(data.parentId))) {
      throw new NotFoundError(`Category ${data.parentId} not found`);
    }

    const category = await createCategory({
      name: data.name,
      slug: data.slug,
      parentId: data.parentId ?? null
    });
    res.status(201).json(category);
  })
);

export { router as categoriesRouter };
