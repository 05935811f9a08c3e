import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { z } from 'zod';
import { createProduct, getProductById, getProducts } from '../lib/db/queries/products';
import { getCategoryById } from '../lib/db/queries/categories';
import { NotFoundError } from '../lib/errors';
import { asyncHandler } from '../middleware/error-handler';
import { parseId, parseWith } from './params';

const router: RouterType = Router();

const createProductSchema = z.object({
  name: z.string().trim().min(1).max(200),
  slug: z.string().trim().min(1).max(100).optional(),
  description: z.string().max(5000).optional(),
  categoryIds: z.array(z.number().int().positive()).default([])
});

router.get(
  '/',
  asyncHandler(async (_req, res) => {
    res.json(await getProducts());
  })
);

router.get(
  '/:id',
  asyncHandler(async (req, res) => {
    const id = parseId(req.params.id);
    const product = await getProductById(id);
    if (!product) {
      throw new NotFoundError(`Product ${id} not found`);
    }
    res.json(product);
  })
);

router.post(
  '/',
  asyncHandler(async (req, res) => {
    const data = parseWith(createProductSchema, req.body, 'Invalid product');

    for (const categoryId of data.categoryIds) {
      if (!(await getCategoryById(categoryId))) {
        throw new NotFoundError(`Category ${categoryId} not found`);
      }
    }

    const product = await createProduct(
      { name: data.name, slug: data.slug, description: data.description ?? '' },
      data.categoryIds
    );
    res.status(201).json(product);
  })
);

export { router as productsRouter };
