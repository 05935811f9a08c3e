import { asc, desc, eq, inArray, sql } from 'drizzle-orm';
import { db, productVariations, priceHistory } from '../index';
import type { NewProductVariation, ProductVariation } from '../schema';
import { truncateCrawlError } from '../../crawler/policy';

export async function getVariations() {
  return db.query.productVariations.findMany({
    orderBy: [asc(productVariations.id)],
    with: {
      product: true,
      priceEntries: {
        orderBy: [desc(priceHistory.dateTime), desc(priceHistory.id)],
        limit: 1
      }
    }
  });
}

export async function getVariationById(id: number) {
  return db.query.productVariations.findFirst({
    where: eq(productVariations.id, id),
    with: {
      product: true,
      priceEntries: {
        orderBy: [desc(priceHistory.dateTime), desc(priceHistory.id)],
        limit: 1
      }
    }
  });
}

export async function getVariationBySku(sku: string) {
  return db.query.productVariations.findFirst({
    where: eq(productVariations.sku, sku),
    with: {
      product: true
    }
  });
}

// Returned in the order the ids were given; unknown ids are left out
export async function getVariationsByIds(ids: number[]): Promise<ProductVariation[]> {
  if (ids.length === 0) return [];

  const rows = await db.query.productVariations.findMany({
    where: inArray(productVariations.id, ids)
  });
  const byId = new Map(rows.map((row) => [row.id, row]));

  const ordered: ProductVariation[] = [];
  for (const id of ids) {
    const row = byId.get(id);
    if (row) ordered.push(row);
  }
  return ordered;
}

export async function createVariation(data: NewProductVariation) {
  const result = db.insert(productVariations).values(data).returning();
  return result.get();
}

export async function markCrawlSuccess(id: number, crawledAt: Date) {
  return db
    .update(productVariations)
    .set({
      lastCrawledAt: crawledAt,
      crawlErrorCount: 0,
      lastCrawlError: null
    })
    .where(eq(productVariations.id, id))
    .returning()
    .get();
}

// Increment happens in SQL so concurrent writers cannot lose a failure
export async function markCrawlFailure(id: number, message: string) {
  return db
    .update(productVariations)
    .set({
      crawlErrorCount: sql`${productVariations.crawlErrorCount} + 1`,
      lastCrawlError: truncateCrawlError(message)
    })
    .where(eq(productVariations.id, id))
    .returning()
    .get();
}

export async function setCrawlingEnabled(ids: number[], enabled: boolean): Promise<number> {
  if (ids.length === 0) return 0;
  const result = db
    .update(productVariations)
    .set({ isCrawlingEnabled: enabled })
    .where(inArray(productVariations.id, ids))
    .run();
  return result.changes;
}

export async function resetCrawlErrors(ids: number[]): Promise<number> {
  if (ids.length === 0) return 0;
  const result = db
    .update(productVariations)
    .set({ crawlErrorCount: 0, lastCrawlError: null })
    .where(inArray(productVariations.id, ids))
    .run();
  return result.changes;
}
