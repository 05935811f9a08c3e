import * as cheerio from 'cheerio';
import type { PriceExtractor } from './types';
import { findCurrencyAmount, parsePriceText, toPrice } from './price-text';

// Common price containers, most specific first
const PRICE_SELECTORS = [
  '[itemprop="price"]',
  '.product-price',
  '.price',
  '#price',
  '[class*="price"]'
];

const PRICE_META_SELECTORS = [
  'meta[property="product:price:amount"]',
  'meta[property="og:price:amount"]',
  'meta[itemprop="price"]'
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively search JSON-LD data for an offer price
 */
export function findJsonLdPrice(obj: unknown): number | null {
  // Recursively check arrays
  if (Array.isArray(obj)) {
    for (const item of obj) {
      const price = findJsonLdPrice(item);
      if (price !== null) return price;
    }
    return null;
  }

  if (!isRecord(obj)) return null;

  if ('price' in obj) {
    const price = toPrice(obj.price);
    if (price !== null) return price;
  }

  // AggregateOffer
  if ('lowPrice' in obj) {
    const price = toPrice(obj.lowPrice);
    if (price !== null) return price;
  }

  for (const key of ['offers', '@graph', 'mainEntity']) {
    if (key in obj) {
      const price = findJsonLdPrice(obj[key]);
      if (price !== null) return price;
    }
  }

  return null;
}

export function extractJsonLdPrice($: cheerio.CheerioAPI): number | null {
  for (const el of $('script[type="application/ld+json"]').toArray()) {
    try {
      const json: unknown = JSON.parse($(el).html() || '');
      const price = findJsonLdPrice(json);
      if (price !== null) return price;
    } catch {
      // Broken JSON-LD blocks are common; try the next one
      continue;
    }
  }
  return null;
}

export function extractMetaPrice($: cheerio.CheerioAPI): number | null {
  for (const selector of PRICE_META_SELECTORS) {
    const price = toPrice($(selector).first().attr('content'));
    if (price !== null) return price;
  }
  return null;
}

/**
 * Best-effort heuristic used when no site-specific extractor matches the URL.
 */
export class GenericExtractor implements PriceExtractor {
  name = 'generic';
  domains: readonly string[] = [];

  extractPrice(_url: string, body: string): number | null {
    if (!body.trim()) return null;

    const $ = cheerio.load(body);

    // Method 1: structured data
    const jsonLdPrice = extractJsonLdPrice($);
    if (jsonLdPrice !== null) return jsonLdPrice;

    // Method 2: price meta tags
    const metaPrice = extractMetaPrice($);
    if (metaPrice !== null) return metaPrice;

    // Method 3: common price containers
    for (const selector of PRICE_SELECTORS) {
      for (const elem of $(selector).toArray()) {
        const $elem = $(elem);
        const price = toPrice($elem.attr('content')) ?? parsePriceText($elem.text());
        if (price !== null) return price;
      }
    }

    // Method 4: first currency-marked amount in the visible text
    $('script, style, noscript').remove();
    return findCurrencyAmount($('body').text() || $.root().text());
  }
}

export const genericExtractor = new GenericExtractor();
