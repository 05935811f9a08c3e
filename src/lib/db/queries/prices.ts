import { asc, desc, eq } from 'drizzle-orm';
import { db, priceHistory, productVariations } from '../index';
import type { PriceEntry } from '../schema';

export async function addPriceEntry(
  variationId: number,
  price: number,
  options: { at?: Date; notes?: string | null } = {}
): Promise<PriceEntry> {
  const result = db
    .insert(priceHistory)
    .values({
      variationId,
      price,
      dateTime: options.at ?? new Date(),
      notes: options.notes ?? null
    })
    .returning();
  return result.get();
}

/**
 * Append a crawled price and clear the variation's error state in one
 * transaction. Either both writes land or neither does.
 */
export async function recordCrawledPrice(
  variationId: number,
  price: number,
  options: { at: Date; notes: string }
): Promise<PriceEntry> {
  return db.transaction((tx) => {
    const entry = tx
      .insert(priceHistory)
      .values({ variationId, price, dateTime: options.at, notes: options.notes })
      .returning()
      .get();

    tx.update(productVariations)
      .set({ lastCrawledAt: options.at, crawlErrorCount: 0, lastCrawlError: null })
      .where(eq(productVariations.id, variationId))
      .run();

    return entry;
  });
}

// Newest first; equal timestamps fall back to insertion order (last write first)
export async function getPriceEntriesForVariation(variationId: number, limit?: number) {
  return db.query.priceHistory.findMany({
    where: eq(priceHistory.variationId, variationId),
    orderBy: [desc(priceHistory.dateTime), desc(priceHistory.id)],
    limit
  });
}

export async function getCurrentPriceEntry(variationId: number): Promise<PriceEntry | undefined> {
  const [latest] = await getPriceEntriesForVariation(variationId, 1);
  return latest;
}

// Every variation with its product and full ledger, for the analysis engine
export async function getVariationsWithPriceHistory() {
  return db.query.productVariations.findMany({
    orderBy: [asc(productVariations.id)],
    with: {
      product: true,
      priceEntries: {
        orderBy: [desc(priceHistory.dateTime), desc(priceHistory.id)]
      }
    }
  });
}
