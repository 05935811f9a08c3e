import { beforeEach, describe, expect, it } from 'vitest';
import { sql } from 'drizzle-orm';
import { currentPriceEntry, getPriceHistory, sortNewestFirst, updatePrice } from '..';
import { db, priceHistory } from '../../db';
import { addPriceEntry, getCurrentPriceEntry } from '../../db/queries/prices';
import { NotFoundError, ValidationError } from '../../errors';
import { makeVariation, resetDatabase } from '../../../test/db';

const T0 = new Date(Date.UTC(2024, 2, 1, 8, 0, 0));
const later = (ms: number) => new Date(T0.getTime() + ms);

function countPriceEntries(): number {
  return db.select({ count: sql<number>`count(*)` }).from(priceHistory).get()?.count ?? 0;
}

describe('current price', () => {
  const entries = [
    { id: 1, price: 10, dateTime: T0 },
    { id: 2, price: 12, dateTime: later(60_000) },
    { id: 3, price: 11, dateTime: later(60_000) },
    { id: 4, price: 9, dateTime: later(-60_000) }
  ];

  it('is the latest entry, with ties going to the last appended', () => {
    expect(currentPriceEntry(entries)?.price).toBe(11);
    expect(currentPriceEntry([])).toBeUndefined();
  });

  it('orders history newest first using the same tie-break', () => {
    expect(sortNewestFirst(entries).map((e) => e.id)).toEqual([3, 2, 1, 4]);
  });
});

describe('price ledger', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('returns a just-appended entry as the current price', async () => {
    const variation = await makeVariation();
    await addPriceEntry(variation.id, 1200, { at: T0 });
    await addPriceEntry(variation.id, 1150, { at: later(1000) });

    expect((await getCurrentPriceEntry(variation.id))?.price).toBe(1150);
  });

  it('lets the last write win when timestamps are equal', async () => {
    const variation = await makeVariation();
    await addPriceEntry(variation.id, 500, { at: T0 });
    await addPriceEntry(variation.id, 450, { at: T0 });

    expect((await getCurrentPriceEntry(variation.id))?.price).toBe(450);
  });

  it('updates a price manually with a default note', async () => {
    const variation = await makeVariation({ sku: 'SKU-MANUAL' });

    const result = await updatePrice({ sku: 'SKU-MANUAL', price: 19.999 });

    expect(result).toMatchObject({ sku: 'SKU-MANUAL', newPrice: 20, notes: 'Manual price update' });
    expect(result.updatedAt).toBeInstanceOf(Date);
    expect((await getCurrentPriceEntry(variation.id))?.price).toBe(20);
  });

  it('keeps a given note and accepts numeric strings', async () => {
    await makeVariation({ sku: 'SKU-NOTE' });

    const result = await updatePrice({ sku: 'SKU-NOTE', price: '15.5', notes: 'supplier change' });

    expect(result).toMatchObject({ newPrice: 15.5, notes: 'supplier change' });
  });

  it('rejects an unknown SKU without appending anything', async () => {
    await makeVariation({ sku: 'SKU-OTHER' });

    await expect(updatePrice({ sku: 'SKU-1', price: 19.99 })).rejects.toThrow(NotFoundError);
    expect(countPriceEntries()).toBe(0);
  });

  it('rejects negative prices and long notes', async () => {
    await makeVariation({ sku: 'SKU-VALID' });

    await expect(updatePrice({ sku: 'SKU-VALID', price: -1 })).rejects.toThrow(ValidationError);
    await expect(updatePrice({ sku: 'SKU-VALID', price: 'abc' })).rejects.toThrow(ValidationError);
    await expect(
      updatePrice({ sku: 'SKU-VALID', price: 10, notes: 'n'.repeat(201) })
    ).rejects.toThrow(ValidationError);
    expect(countPriceEntries()).toBe(0);
  });

  it('rejects blank prices instead of reading them as zero', async () => {
    await makeVariation({ sku: 'SKU-BLANK' });

    await expect(updatePrice({ sku: 'SKU-BLANK', price: '' })).rejects.toThrow(ValidationError);
    await expect(updatePrice({ sku: 'SKU-BLANK', price: '   ' })).rejects.toThrow(ValidationError);
    expect(countPriceEntries()).toBe(0);

    const zero = await updatePrice({ sku: 'SKU-BLANK', price: '0' });
    expect(zero.newPrice).toBe(0);
  });

  it('lists history newest first', async () => {
    const variation = await makeVariation({ sku: 'SKU-HIST', name: 'Blue' });
    await addPriceEntry(variation.id, 100, { at: T0 });
    await addPriceEntry(variation.id, 90, { at: later(2000) });
    await addPriceEntry(variation.id, 95, { at: later(1000) });

    const history = await getPriceHistory('SKU-HIST');

    expect(history.variationName).toBe('Blue');
    expect(history.currentPrice).toBe(90);
    expect(history.entries.map((e) => e.price)).toEqual([90, 95, 100]);
    await expect(getPriceHistory('SKU-NONE')).rejects.toThrow(NotFoundError);
  });
});
