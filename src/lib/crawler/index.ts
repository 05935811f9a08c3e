import { z } from 'zod';
import { extractorRegistry, runExtractor, type ExtractorRegistry } from '../extractors';
import { fetchPage, DEFAULT_FETCH_TIMEOUT_MS } from './fetch';
import { recordCrawledPrice, recordFailure, shouldCrawl } from './health';
import { createCrawlRun } from '../db/queries/crawl-runs';
import { getVariationsByIds } from '../db/queries/variations';
import { getCategoryById, getCrawlableVariationsForCategory } from '../db/queries/categories';
import { DEFAULT_USER_AGENT, getSettingNumber, getSettingString } from '../db/queries/settings';
import { roundPrice } from '../ledger';
import {
  ExtractionError,
  FetchError,
  NotFoundError,
  ValidationError,
  errorMessage,
  fromZodError
} from '../errors';
import type { CrawlFailureKind, ProductVariation } from '../db/schema';

export const NO_PRICE_MESSAGE = 'Could not extract price from URL';
export const DEFAULT_CATEGORY_LIMIT = 20;

export type LogCallback = (message: string) => void;

export interface CrawlOptions {
  timeoutMs?: number;
  userAgent?: string;
  registry?: ExtractorRegistry;
  onLog?: LogCallback;
}

interface ResolvedCrawlOptions {
  timeoutMs: number;
  userAgent: string;
  registry: ExtractorRegistry;
  onLog?: LogCallback;
}

export type CrawlOutcomeStatus = 'success' | 'failed' | 'skipped';

export interface CrawlOutcome {
  variationId: number;
  sku: string;
  status: CrawlOutcomeStatus;
  price?: number;
  extractor?: string;
  failureKind?: CrawlFailureKind;
  error?: string;
  runId?: number;
}

export interface CrawlSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  outcomes: CrawlOutcome[];
}

function failureKindOf(error: unknown): CrawlFailureKind {
  if (error instanceof FetchError) return 'fetch';
  if (error instanceof ExtractionError) return 'extraction_error';
  return 'unexpected';
}

/**
 * Crawl settings from app_settings, overridden by anything passed explicitly.
 */
export function resolveCrawlOptions(options: CrawlOptions = {}): ResolvedCrawlOptions {
  return {
    timeoutMs: options.timeoutMs ?? getSettingNumber('crawl_timeout_ms', DEFAULT_FETCH_TIMEOUT_MS),
    userAgent: options.userAgent ?? getSettingString('crawl_user_agent', DEFAULT_USER_AGENT),
    registry: options.registry ?? extractorRegistry,
    onLog: options.onLog
  };
}

/**
 * One crawl attempt. Errors are recorded against the variation's health and
 * reported in the outcome; nothing is thrown.
 */
export async function crawlVariation(
  variation: ProductVariation,
  options: CrawlOptions = {}
): Promise<CrawlOutcome> {
  const { timeoutMs, userAgent, registry, onLog } = resolveCrawlOptions(options);

  const logs: string[] = [];
  const log = (msg: string) => {
    console.log(msg);
    logs.push(msg);
    onLog?.(msg);
  };

  const startTime = Date.now();
  const url = (variation.url ?? '').trim();
  const extractor = registry.getExtractor(url);

  let price: number | null = null;
  let failureKind: CrawlFailureKind | null = null;
  let failureMessage: string | undefined;

  try {
    log(`[Crawler] Crawling variation ${variation.id} (${variation.sku})`);
    log(`[Crawler] URL: ${url}`);
    log(`[Crawler] Extractor: ${extractor.name}`);

    const body = await fetchPage(url, { timeoutMs, userAgent });
    log(`[Crawler] Fetched ${body.length} bytes`);

    price = runExtractor(extractor, url, body);

    if (price === null) {
      failureKind = 'no_price';
      failureMessage = NO_PRICE_MESSAGE;
      log(`[Crawler] Warning: no price found`);
    } else {
      price = roundPrice(price);
      await recordCrawledPrice(variation.id, price, { at: new Date(), extractor: extractor.name });
      log(`[Crawler] Price: ${price}`);
    }
  } catch (error) {
    price = null;
    failureKind = failureKindOf(error);
    failureMessage = `Crawling failed: ${errorMessage(error)}`;
    log(`[Crawler] Error: ${errorMessage(error)}`);
  }

  if (failureMessage !== undefined) {
    await recordFailure(variation.id, failureMessage);
  }

  let runId: number | undefined;
  try {
    const run = await createCrawlRun({
      variationId: variation.id,
      status: failureMessage === undefined ? 'success' : 'error',
      failureKind,
      extractor: extractor.name,
      price,
      errorMessage: failureMessage ?? null,
      logs: JSON.stringify(logs),
      durationMs: Date.now() - startTime
    });
    runId = run.id;
  } catch (error) {
    console.error(`[Crawler] Failed to save crawl run for variation ${variation.id}:`, error);
  }

  if (failureMessage !== undefined) {
    return {
      variationId: variation.id,
      sku: variation.sku,
      status: 'failed',
      extractor: extractor.name,
      failureKind: failureKind ?? 'unexpected',
      error: failureMessage,
      runId
    };
  }

  return {
    variationId: variation.id,
    sku: variation.sku,
    status: 'success',
    price: price ?? undefined,
    extractor: extractor.name,
    runId
  };
}

/**
 * Crawl a batch in order. Ineligible variations are skipped untouched and a
 * failing variation never stops the rest of the batch.
 */
export async function crawlVariations(
  variations: readonly ProductVariation[],
  options: CrawlOptions = {}
): Promise<CrawlSummary> {
  const resolved = resolveCrawlOptions(options);
  const summary: CrawlSummary = { attempted: 0, succeeded: 0, failed: 0, skipped: 0, outcomes: [] };

  for (const variation of variations) {
    if (!shouldCrawl(variation)) {
      summary.skipped++;
      summary.outcomes.push({ variationId: variation.id, sku: variation.sku, status: 'skipped' });
      continue;
    }

    summary.attempted++;
    const outcome = await crawlVariation(variation, resolved);
    if (outcome.status === 'success') summary.succeeded++;
    else summary.failed++;
    summary.outcomes.push(outcome);
  }

  console.log(
    `[Crawler] Batch complete: ${summary.attempted} attempted, ${summary.succeeded} succeeded, ` +
      `${summary.failed} failed, ${summary.skipped} skipped`
  );
  return summary;
}

const variationIdsSchema = z
  .array(z.number().int().positive())
  .min(1, 'At least one variation id is required');

export async function crawlVariationIds(ids: number[], options: CrawlOptions = {}): Promise<CrawlSummary> {
  const parsed = variationIdsSchema.safeParse(ids);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid variation ids');
  }

  const uniqueIds = [...new Set(parsed.data)];
  const variations = await getVariationsByIds(uniqueIds);
  if (variations.length !== uniqueIds.length) {
    const found = new Set(variations.map((v) => v.id));
    const missingIds = uniqueIds.filter((id) => !found.has(id));
    throw new NotFoundError(`Variations not found: ${missingIds.join(', ')}`, {
      details: { missingIds }
    });
  }

  return crawlVariations(variations, options);
}

export async function crawlCategory(
  categoryId: number,
  limit?: number,
  options: CrawlOptions = {}
): Promise<CrawlSummary> {
  const cap = limit ?? getSettingNumber('crawl_category_limit', DEFAULT_CATEGORY_LIMIT);
  if (!Number.isInteger(cap) || cap < 1) {
    throw new ValidationError('Limit must be a positive integer', { details: { limit: cap } });
  }

  const category = await getCategoryById(categoryId);
  if (!category) {
    throw new NotFoundError(`Category ${categoryId} not found`);
  }

  const variations = await getCrawlableVariationsForCategory(categoryId, cap);
  console.log(`[Crawler] Category ${category.name}: ${variations.length} variations to crawl`);
  return crawlVariations(variations, options);
}
