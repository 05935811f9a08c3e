/**
 * Extractor Registry
 *
 * Maps a page URL to the extractor for its site. Sites are added by
 * registering a new extractor; lookups that match no domain get the default.
 */

import type { PriceExtractor } from './types';
import { ExtractionError, errorMessage } from '../errors';

export function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/^www\./, '').replace(/\.$/, '');
}

export class ExtractorRegistry {
  private readonly extractors = new Map<string, PriceExtractor>();
  private readonly domainToExtractor = new Map<string, PriceExtractor>();

  constructor(private readonly fallback: PriceExtractor) {}

  /**
   * Register an extractor.
   * @throws Error if an extractor with the same name or one of its domains is already registered
   */
  register(extractor: PriceExtractor): this {
    if (this.extractors.has(extractor.name) || extractor.name === this.fallback.name) {
      throw new Error(`Extractor '${extractor.name}' is already registered`);
    }

    const domains = extractor.domains.map(normalizeHost);
    for (const domain of domains) {
      const existing = this.domainToExtractor.get(domain);
      if (existing) {
        throw new Error(`Domain '${domain}' is already handled by extractor '${existing.name}'`);
      }
    }

    this.extractors.set(extractor.name, extractor);
    for (const domain of domains) {
      this.domainToExtractor.set(domain, extractor);
    }
    return this;
  }

  /**
   * Resolve the extractor for a URL. Subdomains match their parent domain and
   * the longest registered domain wins; unparsable URLs get the default.
   */
  getExtractor(url: string): PriceExtractor {
    let host: string;
    try {
      host = normalizeHost(new URL(url).hostname);
    } catch {
      return this.fallback;
    }

    // shop.example.co.uk -> example.co.uk -> co.uk -> uk
    const labels = host.split('.');
    for (let i = 0; i < labels.length; i++) {
      const extractor = this.domainToExtractor.get(labels.slice(i).join('.'));
      if (extractor) return extractor;
    }

    return this.fallback;
  }

  list(): string[] {
    return [...this.extractors.keys(), this.fallback.name];
  }
}

/**
 * Run an extractor. Anything it throws is reported as an ExtractionError.
 */
export function runExtractor(extractor: PriceExtractor, url: string, body: string): number | null {
  try {
    return extractor.extractPrice(url, body);
  } catch (error) {
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError(
      extractor.name,
      `Extractor '${extractor.name}' failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
