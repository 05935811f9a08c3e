import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { PriceExtractor } from './types';
import { toPrice } from './price-text';

const variantSchema = z.object({
  id: z.union([z.number(), z.string()]),
  price: z.union([z.number(), z.string()])
});

const productSchema = z.object({
  variants: z.array(variantSchema).min(1)
});

// Theme scripts hold either the product itself or { product: {...} }
const productJsonSchema = z.union([productSchema, z.object({ product: productSchema })]);

type ShopifyProduct = z.infer<typeof productSchema>;
type ShopifyVariant = z.infer<typeof variantSchema>;

/**
 * Return the balanced {...} literal starting at `start`, or null when unbalanced.
 */
export function sliceJsonObject(text: string, start: number): string | null {
  if (text[start] !== '{') return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function parseProduct(raw: string): ShopifyProduct | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = productJsonSchema.safeParse(json);
  if (!parsed.success) return null;
  return 'product' in parsed.data ? parsed.data.product : parsed.data;
}

// Product JSON prices are in minor units (cents/paisa) unless written as a decimal string
function variantPrice(variant: ShopifyVariant): number | null {
  if (typeof variant.price === 'string' && variant.price.includes('.')) {
    return toPrice(variant.price);
  }
  const minor = typeof variant.price === 'number' ? variant.price : Number(variant.price);
  if (!Number.isFinite(minor)) return null;
  return toPrice(minor / 100);
}

function selectedVariantId(url: string): string | null {
  try {
    return new URL(url).searchParams.get('variant');
  } catch {
    return null;
  }
}

export class ShopifyExtractor implements PriceExtractor {
  name = 'shopify';
  domains = ['myshopify.com'] as const;

  extractPrice(url: string, body: string): number | null {
    const product = this.findProduct(body);
    if (!product) return null;

    const wanted = selectedVariantId(url);
    const variant =
      (wanted !== null && product.variants.find((v) => String(v.id) === wanted)) ||
      product.variants[0];

    return variantPrice(variant);
  }

  private findProduct(body: string): ShopifyProduct | null {
    const $ = cheerio.load(body);

    const scripts = $(
      'script[data-product-json], script[type="application/json"][id^="ProductJson"]'
    ).toArray();
    for (const el of scripts) {
      const product = parseProduct($(el).html() || '');
      if (product) return product;
    }

    // Fallback: the analytics blob `var meta = {"product":{...}}`
    const metaIndex = body.search(/var\s+meta\s*=\s*\{/);
    if (metaIndex >= 0) {
      const raw = sliceJsonObject(body, body.indexOf('{', metaIndex));
      if (raw) return parseProduct(raw);
    }

    return null;
  }
}

export const shopifyExtractor = new ShopifyExtractor();
