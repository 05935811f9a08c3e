import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CrawlQueue } from '..';
import { NotFoundError } from '../../errors';
import { makeVariation, resetDatabase } from '../../../test/db';

describe('CrawlQueue', () => {
  beforeEach(() => {
    resetDatabase();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('runs one batch at a time', async () => {
    let active = 0;
    let maxActive = 0;
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return new Response('<meta property="og:price:amount" content="10">', { status: 200 });
      })
    );

    const a = await makeVariation();
    const b = await makeVariation();
    const c = await makeVariation();
    const queue = new CrawlQueue();

    const [first, second] = await Promise.all([
      queue.add({ kind: 'variations', variationIds: [a.id, b.id] }),
      queue.add({ kind: 'variations', variationIds: [c.id] })
    ]);

    await queue.onIdle();

    expect(maxActive).toBe(1);
    expect(first.succeeded).toBe(2);
    expect(second.succeeded).toBe(1);
    expect(queue.getState()).toMatchObject({ processedCount: 2, pending: 0, size: 0, isProcessing: false });
  });

  it('rejects with the batch error and marks the item failed', async () => {
    const queue = new CrawlQueue();

    await expect(queue.add({ kind: 'variations', variationIds: [424242] })).rejects.toThrow(NotFoundError);

    const [item] = queue.getState().items;
    expect(item).toMatchObject({ status: 'error', error: 'Variations not found: 424242' });
  });
});
