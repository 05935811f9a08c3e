import { and, asc, eq, isNotNull, lt, ne, sql } from 'drizzle-orm';
import { db, categories, productCategories, productVariations } from '../index';
import type { NewCategory, ProductVariation } from '../schema';
import { MAX_CONSECUTIVE_CRAWL_ERRORS } from '../../crawler/policy';
import { uniqueSlug } from '../../slug';

// Variations a category batch is allowed to pick up
function crawlEligibleInCategory(categoryId: number) {
  return and(
    eq(productCategories.categoryId, categoryId),
    eq(productVariations.isCrawlingEnabled, true),
    isNotNull(productVariations.url),
    ne(sql`trim(${productVariations.url})`, ''),
    lt(productVariations.crawlErrorCount, MAX_CONSECUTIVE_CRAWL_ERRORS)
  );
}

export async function getCategories() {
  return db.query.categories.findMany({
    orderBy: [asc(categories.name)]
  });
}

export async function getCategoryById(id: number) {
  return db.query.categories.findFirst({
    where: eq(categories.id, id)
  });
}

export async function createCategory(data: Omit<NewCategory, 'slug'> & { slug?: string }) {
  const slug =
    data.slug ||
    (await uniqueSlug(data.name, async (candidate) => {
      const existing = await db.query.categories.findFirst({
        where: eq(categories.slug, candidate)
      });
      return existing !== undefined;
    }, 'category'));

  const result = db.insert(categories).values({ ...data, slug }).returning();
  return result.get();
}

export async function getCrawlableVariationsForCategory(
  categoryId: number,
  limit: number
): Promise<ProductVariation[]> {
  const rows = db
    .select({ variation: productVariations })
    .from(productVariations)
    .innerJoin(productCategories, eq(productCategories.productId, productVariations.productId))
    .where(crawlEligibleInCategory(categoryId))
    .orderBy(asc(productVariations.id))
    .limit(limit)
    .all();

  return rows.map((row) => row.variation);
}

export async function countCrawlableVariations(categoryId: number): Promise<number> {
  const row = db
    .select({ count: sql<number>`count(*)` })
    .from(productVariations)
    .innerJoin(productCategories, eq(productCategories.productId, productVariations.productId))
    .where(crawlEligibleInCategory(categoryId))
    .get();

  return row?.count ?? 0;
}

// Categories with the number of variations a category crawl would pick up
export async function getCategoriesWithCrawlableCounts() {
  const list = await getCategories();
  const result = [];
  for (const category of list) {
    result.push({
      ...category,
      crawlableVariations: await countCrawlableVariations(category.id)
    });
  }
  return result;
}
