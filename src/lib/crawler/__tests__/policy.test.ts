import { describe, expect, it } from 'vitest';
import {
  MAX_CONSECUTIVE_CRAWL_ERRORS,
  crawlStatus,
  hasCrawlUrl,
  shouldCrawl,
  truncateCrawlError,
  type CrawlState
} from '../policy';

function state(overrides: Partial<CrawlState> = {}): CrawlState {
  return {
    url: 'https://shop.example.com/item',
    isCrawlingEnabled: true,
    crawlErrorCount: 0,
    lastCrawlError: null,
    lastCrawledAt: null,
    ...overrides
  };
}

describe('hasCrawlUrl', () => {
  it('treats null, empty and whitespace-only urls as missing', () => {
    expect(hasCrawlUrl({ url: null })).toBe(false);
    expect(hasCrawlUrl({ url: '' })).toBe(false);
    expect(hasCrawlUrl({ url: '   ' })).toBe(false);
    expect(hasCrawlUrl({ url: 'https://shop.example.com' })).toBe(true);
  });
});

describe('shouldCrawl', () => {
  it('is true for an enabled variation with a url and few errors', () => {
    expect(shouldCrawl(state({ crawlErrorCount: 4 }))).toBe(true);
  });

  it('is false when disabled or without a url', () => {
    expect(shouldCrawl(state({ isCrawlingEnabled: false }))).toBe(false);
    expect(shouldCrawl(state({ url: ' ' }))).toBe(false);
  });

  it('is false once the error threshold is reached, whatever else holds', () => {
    expect(MAX_CONSECUTIVE_CRAWL_ERRORS).toBe(5);
    expect(shouldCrawl(state({ crawlErrorCount: 5 }))).toBe(false);
    expect(shouldCrawl(state({ crawlErrorCount: 12 }))).toBe(false);
  });
});

describe('truncateCrawlError', () => {
  it('keeps at most 500 characters', () => {
    expect(truncateCrawlError('x'.repeat(800))).toHaveLength(500);
    expect(truncateCrawlError('short')).toBe('short');
  });
});

describe('crawlStatus', () => {
  it('reports a missing url before anything else', () => {
    expect(crawlStatus(state({ url: null, isCrawlingEnabled: false, crawlErrorCount: 9 }))).toBe('No URL');
  });

  it('reports disabled before failures', () => {
    expect(crawlStatus(state({ isCrawlingEnabled: false, crawlErrorCount: 9 }))).toBe('Disabled');
  });

  it('reports the failed state with the error count', () => {
    expect(crawlStatus(state({ crawlErrorCount: 6 }))).toBe('Failed (6 errors)');
  });

  it('formats the last crawl time in UTC to the minute', () => {
    const lastCrawledAt = new Date(Date.UTC(2024, 4, 1, 9, 30, 12));
    expect(crawlStatus(state({ lastCrawledAt }))).toBe('Last crawled: 2024-05-01 09:30');
  });

  it('reports never crawled otherwise', () => {
    expect(crawlStatus(state())).toBe('Never crawled');
  });
});
