/**
 * Crawl variations from the command line
 * Run: npx tsx scripts/crawl.ts --ids 1,2,3
 *      npx tsx scripts/crawl.ts --category 4 [--limit 10]
 */

import { parseArgs } from 'node:util';
import { initializeServer } from '../src/lib/server-init';
import { crawlCategory, crawlVariationIds, type CrawlSummary } from '../src/lib/crawler';
import { errorMessage } from '../src/lib/errors';

const { values } = parseArgs({
  options: {
    ids: { type: 'string' },
    category: { type: 'string' },
    limit: { type: 'string' }
  }
});

function printSummary(summary: CrawlSummary) {
  console.log('\n' + '='.repeat(80));
  console.log('RESULT');
  console.log('='.repeat(80));
  console.log(`Attempted: ${summary.attempted}`);
  console.log(`Succeeded: ${summary.succeeded}`);
  console.log(`Failed:    ${summary.failed}`);
  console.log(`Skipped:   ${summary.skipped}`);

  for (const outcome of summary.outcomes) {
    const detail =
      outcome.status === 'success'
        ? `${outcome.price} (${outcome.extractor})`
        : outcome.error ?? '';
    console.log(`  - [${outcome.status}] ${outcome.sku} ${detail}`);
  }
}

async function main() {
  initializeServer();

  if (values.ids) {
    const ids = values.ids.split(',').map((id) => Number(id.trim()));
    printSummary(await crawlVariationIds(ids));
  } else if (values.category) {
    const limit = values.limit ? Number(values.limit) : undefined;
    printSummary(await crawlCategory(Number(values.category), limit));
  } else {
    console.error('Usage: crawl.ts --ids 1,2,3 | --category <id> [--limit N]');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(`ERROR: ${errorMessage(error)}`);
  process.exit(1);
});
