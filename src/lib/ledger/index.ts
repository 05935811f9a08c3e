import { z } from 'zod';
import { addPriceEntry, getPriceEntriesForVariation } from '../db/queries/prices';
import { getVariationBySku } from '../db/queries/variations';
import { NotFoundError, fromZodError } from '../errors';

export const MAX_NOTES_LENGTH = 200;

interface LedgerEntry {
  id: number;
  price: number;
  dateTime: Date;
}

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Newest first. Equal timestamps keep the later-appended entry (higher id) first.
 */
export function sortNewestFirst<T extends LedgerEntry>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => {
    const byTime = b.dateTime.getTime() - a.dateTime.getTime();
    return byTime !== 0 ? byTime : b.id - a.id;
  });
}

export function currentPriceEntry<T extends LedgerEntry>(entries: readonly T[]): T | undefined {
  let current: T | undefined;
  for (const entry of entries) {
    if (
      !current ||
      entry.dateTime.getTime() > current.dateTime.getTime() ||
      (entry.dateTime.getTime() === current.dateTime.getTime() && entry.id > current.id)
    ) {
      current = entry;
    }
  }
  return current;
}

const updatePriceSchema = z.object({
  sku: z.string().trim().min(1, 'SKU is required'),
  // Only numbers and non-blank strings; coercion alone turns null or '' into 0
  price: z
    .union([z.number(), z.string().trim().min(1, 'Price must be a number')], {
      errorMap: () => ({ message: 'Price must be a number' })
    })
    .pipe(
      z.coerce
        .number({ invalid_type_error: 'Price must be a number' })
        .finite('Price must be a finite number')
        .nonnegative('Price cannot be negative')
    ),
  notes: z
    .string()
    .max(MAX_NOTES_LENGTH, `Notes cannot exceed ${MAX_NOTES_LENGTH} characters`)
    .nullish()
});

// Prices from form posts may arrive as strings
export interface UpdatePriceInput {
  sku: string;
  price: number | string;
  notes?: string | null;
}

export interface UpdatePriceResult {
  sku: string;
  newPrice: number;
  notes: string | null;
  updatedAt: Date;
}

/**
 * Manual ledger append that bypasses the crawler.
 */
export async function updatePrice(input: UpdatePriceInput): Promise<UpdatePriceResult> {
  const parsed = updatePriceSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid price update');
  }
  const { sku, price, notes } = parsed.data;

  const variation = await getVariationBySku(sku);
  if (!variation) {
    throw new NotFoundError(`Variation with SKU '${sku}' not found`);
  }

  const entry = await addPriceEntry(variation.id, roundPrice(price), {
    notes: notes || 'Manual price update'
  });

  return {
    sku: variation.sku,
    newPrice: entry.price,
    notes: entry.notes,
    updatedAt: entry.dateTime
  };
}

export async function getPriceHistory(sku: string, limit?: number) {
  const variation = await getVariationBySku(sku);
  if (!variation) {
    throw new NotFoundError(`Variation with SKU '${sku}' not found`);
  }

  const entries = await getPriceEntriesForVariation(variation.id, limit);
  return {
    sku: variation.sku,
    productName: variation.product.name,
    variationName: variation.name,
    currentPrice: entries[0]?.price ?? null,
    entries
  };
}
