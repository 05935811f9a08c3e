import { describe, expect, it } from 'vitest';
import { genericExtractor } from '../generic';
import { darazExtractor } from '../daraz';
import { startechExtractor } from '../startech';
import { shopifyExtractor, sliceJsonObject } from '../shopify';

const PAGE_URL = 'https://shop.example.com/item';

describe('generic extractor', () => {
  it('reads the offer price from JSON-LD', () => {
    const body = `<html><head><script type="application/ld+json">
      {"@context":"https://schema.org","@type":"Product","name":"Mouse",
       "offers":{"@type":"Offer","price":"1250.00","priceCurrency":"BDT"}}
    </script></head><body></body></html>`;

    expect(genericExtractor.extractPrice(PAGE_URL, body)).toBe(1250);
  });

  it('walks @graph and offer arrays, skipping zero prices', () => {
    const body = `<script type="application/ld+json">
      {"@graph":[{"@type":"WebPage"},{"@type":"Product","offers":[{"price":0},{"price":899}]}]}
    </script>`;

    expect(genericExtractor.extractPrice(PAGE_URL, body)).toBe(899);
  });

  it('falls back to price meta tags when JSON-LD is broken', () => {
    const body = `<head><script type="application/ld+json">{broken</script>
      <meta property="product:price:amount" content="1,499.00"></head>`;

    expect(genericExtractor.extractPrice(PAGE_URL, body)).toBe(1499);
  });

  it('reads common price containers', () => {
    const body = '<body><div class="product-price">Tk 3,200</div></body>';

    expect(genericExtractor.extractPrice(PAGE_URL, body)).toBe(3200);
  });

  it('finds a currency-marked amount in the page text, ignoring scripts', () => {
    const body = `<html><body><script>var x = "$999";</script>
      <p>Special offer: only ৳ 750 while supplies last</p></body></html>`;

    expect(genericExtractor.extractPrice(PAGE_URL, body)).toBe(750);
  });

  it('returns null when the page has no price', () => {
    expect(genericExtractor.extractPrice(PAGE_URL, '<html><body><h1>About us</h1></body></html>')).toBeNull();
    expect(genericExtractor.extractPrice(PAGE_URL, '')).toBeNull();
  });
});

describe('daraz extractor', () => {
  const PAGE = 'https://www.daraz.com.bd/products/demo-i1.html';

  it('reads the sale price from the embedded product data', () => {
    const body = `<script>app.run({"data":{"root":{"fields":{"skuInfos":{"0":
      {"price":{"salePrice":{"text":"৳ 1,150","value":1150}}}}}}}})</script>`;

    expect(darazExtractor.extractPrice(PAGE, body)).toBe(1150);
  });

  it('falls back to the rendered price label', () => {
    const body = '<span class="pdp-price pdp-price_type_normal">৳ 2,399</span>';

    expect(darazExtractor.extractPrice(PAGE, body)).toBe(2399);
  });

  it('returns null without either', () => {
    expect(darazExtractor.extractPrice(PAGE, '<div>Item unavailable</div>')).toBeNull();
  });
});

describe('startech extractor', () => {
  const PAGE = 'https://www.startech.com.bd/demo-ssd';

  it('prefers the discounted price', () => {
    const body = '<table><tr><td class="product-info-data product-price"><del>1,500৳</del><ins>1,250৳</ins></td></tr></table>';

    expect(startechExtractor.extractPrice(PAGE, body)).toBe(1250);
  });

  it('reads the regular price cell', () => {
    const body = '<table><tr><td class="product-info-data product-price">1,850৳</td></tr></table>';

    expect(startechExtractor.extractPrice(PAGE, body)).toBe(1850);
  });

  it('falls back to the itemprop price', () => {
    expect(startechExtractor.extractPrice(PAGE, '<meta itemprop="price" content="990">')).toBe(990);
  });
});

describe('shopify extractor', () => {
  const PRODUCT_JSON = `<script type="application/json" data-product-json>
    {"id":1,"variants":[{"id":111,"price":125000},{"id":222,"price":99900}]}
  </script>`;

  it('converts the first variant price from minor units', () => {
    expect(shopifyExtractor.extractPrice('https://demo.myshopify.com/products/mug', PRODUCT_JSON)).toBe(1250);
  });

  it('uses the variant selected in the url', () => {
    expect(
      shopifyExtractor.extractPrice('https://demo.myshopify.com/products/mug?variant=222', PRODUCT_JSON)
    ).toBe(999);
  });

  it('reads decimal price strings as-is from a wrapped product', () => {
    const body = `<script type="application/json" id="ProductJson-main">
      {"product":{"variants":[{"id":"333","price":"45.50"}]}}
    </script>`;

    expect(shopifyExtractor.extractPrice('https://demo.myshopify.com/products/cup', body)).toBe(45.5);
  });

  it('falls back to the analytics meta object', () => {
    const body = `<script>var meta = {"product":{"id":9,"variants":[{"id":7,"price":2500,"name":"Mug {large}"}]},"page":{"pageType":"product"}};</script>`;

    expect(shopifyExtractor.extractPrice('https://demo.myshopify.com/products/mug', body)).toBe(25);
  });

  it('returns null for malformed product json', () => {
    const body = '<script type="application/json" data-product-json>{not json</script>';

    expect(shopifyExtractor.extractPrice('https://demo.myshopify.com/products/mug', body)).toBeNull();
  });
});

describe('sliceJsonObject', () => {
  it('ignores braces inside strings', () => {
    const text = 'x = {"a":"}{","b":{"c":1}}; rest';

    expect(sliceJsonObject(text, 4)).toBe('{"a":"}{","b":{"c":1}}');
  });

  it('returns null for an unbalanced object', () => {
    expect(sliceJsonObject('{"a":{', 0)).toBeNull();
  });
});
