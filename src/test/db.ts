import { sql } from 'drizzle-orm';
import { db, runMigrations } from '../lib/db';
import { createCategory } from '../lib/db/queries/categories';
import { createProduct } from '../lib/db/queries/products';
import { createVariation } from '../lib/db/queries/variations';
import type { NewProductVariation } from '../lib/db/schema';

// Children before parents so foreign keys never block the delete
const TABLES = [
  'crawl_runs',
  'price_history',
  'product_categories',
  'product_variations',
  'products',
  'categories',
  'app_settings',
  'sqlite_sequence'
];

/**
 * Create the schema in the in-memory database and empty every table.
 */
export function resetDatabase() {
  runMigrations();
  for (const table of TABLES) {
    db.run(sql.raw(`DELETE FROM ${table}`));
  }
}

let skuCounter = 0;

export async function makeProduct(name = 'Test Product', categoryIds: number[] = []) {
  return createProduct({ name }, categoryIds);
}

export async function makeCategory(name = 'Test Category') {
  return createCategory({ name });
}

export async function makeVariation(overrides: Partial<NewProductVariation> = {}) {
  const productId = overrides.productId ?? (await makeProduct()).id;
  skuCounter++;
  return createVariation({
    name: `Variant ${skuCounter}`,
    sku: `SKU-TEST-${skuCounter}`,
    url: `https://shop.example.com/item-${skuCounter}`,
    ...overrides,
    productId
  });
}
