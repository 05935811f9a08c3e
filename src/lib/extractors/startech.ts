import * as cheerio from 'cheerio';
import type { PriceExtractor } from './types';
import { parsePriceText, toPrice } from './price-text';

export class StarTechExtractor implements PriceExtractor {
  name = 'startech';
  domains = ['startech.com.bd'] as const;

  extractPrice(_url: string, body: string): number | null {
    const $ = cheerio.load(body);

    // Discounted items show the old price in <del> and the current one in <ins>
    const special = parsePriceText($('.product-price ins').first().text());
    if (special !== null) return special;

    // Regular price cell, e.g. <td class="product-info-data product-price">1,250৳</td>
    const $regular = $('.product-price').first().clone();
    $regular.find('del').remove();
    const regular = parsePriceText($regular.text());
    if (regular !== null) return regular;

    return toPrice($('[itemprop="price"]').first().attr('content'));
  }
}

export const startechExtractor = new StarTechExtractor();
