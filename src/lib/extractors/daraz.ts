import * as cheerio from 'cheerio';
import type { PriceExtractor } from './types';
import { parsePriceText, toPrice } from './price-text';

export class DarazExtractor implements PriceExtractor {
  name = 'daraz';
  domains = ['daraz.com.bd', 'daraz.pk', 'daraz.lk', 'daraz.com.np'] as const;

  extractPrice(_url: string, body: string): number | null {
    // Method 1: the product module embeds the sale price as JSON, e.g.
    // "salePrice":{"text":"৳ 1,250","value":1250}
    const salePriceMatch = body.match(/"salePrice"\s*:\s*\{[^{}]*?"value"\s*:\s*"?([\d.]+)"?/);
    if (salePriceMatch) {
      const price = toPrice(salePriceMatch[1]);
      if (price !== null) return price;
    }

    // Method 2: rendered price label
    const $ = cheerio.load(body);
    const priceText = $('.pdp-price_type_normal').first().text().trim();
    return parsePriceText(priceText);
  }
}

export const darazExtractor = new DarazExtractor();
