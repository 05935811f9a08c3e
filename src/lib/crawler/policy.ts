// Crawl eligibility rules. Pure functions over a variation's crawl state.

export const MAX_CONSECUTIVE_CRAWL_ERRORS = 5;
export const MAX_CRAWL_ERROR_LENGTH = 500;

export interface CrawlState {
  url: string | null;
  isCrawlingEnabled: boolean;
  crawlErrorCount: number;
  lastCrawlError: string | null;
  lastCrawledAt: Date | null;
}

export function hasCrawlUrl(variation: Pick<CrawlState, 'url'>): boolean {
  return typeof variation.url === 'string' && variation.url.trim().length > 0;
}

/**
 * Whether a crawl attempt should be made. Past the error threshold this stays
 * false until the error count is explicitly reset.
 */
export function shouldCrawl(
  variation: Pick<CrawlState, 'url' | 'isCrawlingEnabled' | 'crawlErrorCount'>
): boolean {
  if (!variation.isCrawlingEnabled || !hasCrawlUrl(variation)) return false;
  return variation.crawlErrorCount < MAX_CONSECUTIVE_CRAWL_ERRORS;
}

export function truncateCrawlError(message: string): string {
  return message.slice(0, MAX_CRAWL_ERROR_LENGTH);
}

function formatUtcMinute(date: Date): string {
  // "2024-05-01T09:30:12.000Z" -> "2024-05-01 09:30"
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function crawlStatus(variation: CrawlState): string {
  if (!hasCrawlUrl(variation)) return 'No URL';
  if (!variation.isCrawlingEnabled) return 'Disabled';
  if (variation.crawlErrorCount >= MAX_CONSECUTIVE_CRAWL_ERRORS) {
    return `Failed (${variation.crawlErrorCount} errors)`;
  }
  if (variation.lastCrawledAt) {
    return `Last crawled: ${formatUtcMinute(variation.lastCrawledAt)}`;
  }
  return 'Never crawled';
}
