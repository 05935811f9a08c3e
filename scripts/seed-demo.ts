/**
 * Create a demo category with two products, their variations and a
 * synthetic 30-day price history
 * Run: npx tsx scripts/seed-demo.ts
 */

import { initializeServer } from '../src/lib/server-init';
import { createCategory } from '../src/lib/db/queries/categories';
import { createProduct } from '../src/lib/db/queries/products';
import { createVariation, getVariationBySku } from '../src/lib/db/queries/variations';
import { addPriceEntry } from '../src/lib/db/queries/prices';
import { errorMessage } from '../src/lib/errors';

const DAY_MS = 24 * 60 * 60 * 1000;

interface DemoVariation {
  name: string;
  sku: string;
  url: string | null;
  prices: number[]; // oldest first, one per step
}

const DEMO_PRODUCTS: { name: string; variations: DemoVariation[] }[] = [
  {
    name: 'Demo Wireless Mouse',
    variations: [
      { name: 'Black', sku: 'DEMO-MOUSE-BLK', url: 'https://www.daraz.com.bd/products/demo-mouse-black.html', prices: [1450, 1450, 1390, 1290] },
      { name: 'White', sku: 'DEMO-MOUSE-WHT', url: 'https://www.daraz.com.bd/products/demo-mouse-white.html', prices: [1450, 1500] }
    ]
  },
  {
    name: 'Demo 1TB SSD',
    variations: [
      { name: 'SATA', sku: 'DEMO-SSD-SATA', url: 'https://www.startech.com.bd/demo-ssd-sata', prices: [6800, 7400, 6500, 7100, 6900] },
      { name: 'NVMe', sku: 'DEMO-SSD-NVME', url: null, prices: [] }
    ]
  }
];

async function seedDemo() {
  initializeServer();

  if (await getVariationBySku(DEMO_PRODUCTS[0].variations[0].sku)) {
    console.log('[Seed] Demo data already present, nothing to do');
    return;
  }

  const category = await createCategory({ name: 'Demo Electronics' });
  console.log(`[Seed] Category ${category.id}: ${category.name}`);

  const now = Date.now();
  for (const demo of DEMO_PRODUCTS) {
    const product = await createProduct({ name: demo.name }, [category.id]);
    console.log(`[Seed] Product ${product.id}: ${product.name}`);

    for (const v of demo.variations) {
      const variation = await createVariation({
        productId: product.id,
        name: v.name,
        sku: v.sku,
        url: v.url
      });

      // Spread the history evenly over the last 30 days
      const step = v.prices.length > 1 ? Math.floor(30 / (v.prices.length - 1)) : 0;
      for (const [i, price] of v.prices.entries()) {
        const daysAgo = (v.prices.length - 1 - i) * step;
        await addPriceEntry(variation.id, price, {
          at: new Date(now - daysAgo * DAY_MS),
          notes: 'Demo data'
        });
      }
      console.log(`[Seed]   Variation ${variation.id}: ${v.sku} (${v.prices.length} prices)`);
    }
  }
}

seedDemo().catch((error) => {
  console.error(`ERROR: ${errorMessage(error)}`);
  process.exit(1);
});
