import {
  markCrawlFailure,
  markCrawlSuccess,
  resetCrawlErrors,
  setCrawlingEnabled
} from '../db/queries/variations';
import { recordCrawledPrice as appendCrawledPrice } from '../db/queries/prices';
import type { PriceEntry, ProductVariation } from '../db/schema';

export * from './policy';

/**
 * Clear the error counter and stamp the crawl time.
 */
export async function recordSuccess(variationId: number, at: Date = new Date()) {
  return markCrawlSuccess(variationId, at);
}

/**
 * Success path of a crawl: the price entry and the cleared counter commit together.
 */
export async function recordCrawledPrice(
  variationId: number,
  price: number,
  options: { at: Date; extractor: string }
): Promise<PriceEntry> {
  return appendCrawledPrice(variationId, price, {
    at: options.at,
    notes: `Crawled using ${options.extractor}`
  });
}

/**
 * Count one failed attempt. A storage failure is logged and reported as
 * undefined; this never throws into the crawl loop.
 */
export async function recordFailure(
  variationId: number,
  message: string
): Promise<ProductVariation | undefined> {
  try {
    return await markCrawlFailure(variationId, message);
  } catch (error) {
    console.error(`[Crawler] Failed to record crawl failure for variation ${variationId}:`, error);
    return undefined;
  }
}

export async function enableCrawling(ids: number[]): Promise<number> {
  return setCrawlingEnabled(ids, true);
}

export async function disableCrawling(ids: number[]): Promise<number> {
  return setCrawlingEnabled(ids, false);
}

// Only way back from the failed state
export async function resetErrors(ids: number[]): Promise<number> {
  return resetCrawlErrors(ids);
}
