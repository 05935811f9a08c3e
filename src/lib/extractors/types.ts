export interface PriceExtractor {
  /** Registry key, also written into the note of crawled price entries. */
  name: string;
  /** Hosts handled by this extractor; subdomains match too. Empty for the fallback. */
  domains: readonly string[];
  /**
   * Parse a fetched page. Returns null when no usable price is present;
   * malformed markup is not an error.
   */
  extractPrice(url: string, body: string): number | null;
}
