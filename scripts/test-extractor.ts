/**
 * Fetch a page and run the extractor its domain resolves to
 * Run: npx tsx scripts/test-extractor.ts <url>
 */

import { extractorRegistry, runExtractor } from '../src/lib/extractors';
import { fetchPage } from '../src/lib/crawler/fetch';
import { errorMessage } from '../src/lib/errors';

const TEST_URL = process.argv[2];

if (!TEST_URL) {
  console.error('Usage: test-extractor.ts <url>');
  process.exit(1);
}

async function testExtractor(url: string) {
  const extractor = extractorRegistry.getExtractor(url);

  console.log('='.repeat(80));
  console.log('Extractor Test');
  console.log('='.repeat(80));
  console.log(`URL: ${url}`);
  console.log(`Extractor: ${extractor.name}`);
  console.log(`Registered: ${extractorRegistry.list().join(', ')}`);
  console.log('');

  const startTime = Date.now();
  const body = await fetchPage(url);
  const price = runExtractor(extractor, url, body);
  const elapsed = Date.now() - startTime;

  console.log(`Fetched: ${body.length} bytes in ${elapsed}ms`);
  console.log(price === null ? 'Price: not found' : `Price: ${price}`);
}

testExtractor(TEST_URL).catch((error) => {
  console.error(`ERROR: ${errorMessage(error)}`);
  process.exit(1);
});
