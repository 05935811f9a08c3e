import { ExtractorRegistry } from './registry';
import { genericExtractor } from './generic';
import { darazExtractor } from './daraz';
import { startechExtractor } from './startech';
import { shopifyExtractor } from './shopify';

// Registry of available extractors; the generic one handles every other site
export const extractorRegistry = new ExtractorRegistry(genericExtractor)
  .register(darazExtractor)
  .register(startechExtractor)
  .register(shopifyExtractor);

export { ExtractorRegistry, runExtractor } from './registry';
export type { PriceExtractor } from './types';
