import {
  sqliteTable,
  text,
  integer,
  real,
  primaryKey,
  check,
  index,
  type AnySQLiteColumn
} from 'drizzle-orm/sqlite-core';
import { relations, sql } from 'drizzle-orm';

// Tables are created from schema.sql; keep the two in step

// Categories table - catalog tree (parentId = null for top level)
export const categories = sqliteTable('categories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  slug: text('slug').notNull().unique(),
  parentId: integer('parent_id').references((): AnySQLiteColumn => categories.id, {
    onDelete: 'set null'
  }),
  createdAt: integer('created_at', { mode: 'timestamp' })
    .notNull()
    .$defaultFn(() => new Date())
});

// Products table - a product groups purchasable variations
export const products = sqliteTable('products', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  slug: text('slug').notNull().unique(),
  description: text('description').notNull().default(''),
  createdAt: integer('created_at', { mode: 'timestamp' })
    .notNull()
    .$defaultFn(() => new Date())
});

// ProductCategories table - many-to-many link between products and categories
export const productCategories = sqliteTable(
  'product_categories',
  {
    productId: integer('product_id')
      .notNull()
      .references(() => products.id, { onDelete: 'cascade' }),
    categoryId: integer('category_id')
      .notNull()
      .references(() => categories.id, { onDelete: 'cascade' })
  },
  (table) => ({
    pk: primaryKey({ columns: [table.productId, table.categoryId] })
  })
);

// ProductVariations table - SKU-level variants with their crawl state
export const productVariations = sqliteTable('product_variations', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  productId: integer('product_id')
    .notNull()
    .references(() => products.id, { onDelete: 'cascade' }),
  name: text('name').notNull(), // e.g. "Red / Large"
  sku: text('sku').notNull().unique(),
  url: text('url'), // Page the price is crawled from
  isCrawlingEnabled: integer('is_crawling_enabled', { mode: 'boolean' }).notNull().default(true),
  lastCrawledAt: integer('last_crawled_at', { mode: 'timestamp_ms' }), // Last successful crawl
  crawlErrorCount: integer('crawl_error_count').notNull().default(0), // Consecutive failures
  lastCrawlError: text('last_crawl_error'),
  createdAt: integer('created_at', { mode: 'timestamp' })
    .notNull()
    .$defaultFn(() => new Date())
});

// PriceHistory table - append-only price ledger
export const priceHistory = sqliteTable(
  'price_history',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    variationId: integer('variation_id')
      .notNull()
      .references(() => productVariations.id, { onDelete: 'cascade' }),
    price: real('price').notNull(),
    dateTime: integer('date_time', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
    notes: text('notes') // e.g. "sale", "supplier change", "Crawled using daraz"
  },
  (table) => ({
    priceNonNegative: check('price_history_price_check', sql`${table.price} >= 0`),
    variationTimeIdx: index('price_history_variation_time_idx').on(
      table.variationId,
      sql`${table.dateTime} desc`,
      sql`${table.id} desc`
    )
  })
);

// CrawlRuns table - historical log of crawl attempts
export const crawlRuns = sqliteTable('crawl_runs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  variationId: integer('variation_id')
    .notNull()
    .references(() => productVariations.id, { onDelete: 'cascade' }),
  status: text('status').$type<'success' | 'error'>().notNull(),
  failureKind: text('failure_kind').$type<CrawlFailureKind>(), // null on success
  extractor: text('extractor'),
  price: real('price'),
  errorMessage: text('error_message'),
  logs: text('logs'), // JSON array of log entries
  durationMs: integer('duration_ms'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date())
});

// AppSettings table - runtime policy editable over the API
export const appSettings = sqliteTable('app_settings', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  key: text('key').notNull().unique(),
  value: text('value').notNull(),
  type: text('type').$type<'number' | 'string' | 'boolean'>().notNull().default('string'),
  label: text('label').notNull(),
  description: text('description'),
  category: text('category').notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp' })
    .notNull()
    .$defaultFn(() => new Date())
});

export type CrawlFailureKind = 'fetch' | 'no_price' | 'extraction_error' | 'unexpected';

// Relations
export const categoriesRelations = relations(categories, ({ one, many }) => ({
  parent: one(categories, {
    fields: [categories.parentId],
    references: [categories.id],
    relationName: 'category_parent'
  }),
  children: many(categories, { relationName: 'category_parent' }),
  productCategories: many(productCategories)
}));

export const productsRelations = relations(products, ({ many }) => ({
  variations: many(productVariations),
  productCategories: many(productCategories)
}));

export const productCategoriesRelations = relations(productCategories, ({ one }) => ({
  product: one(products, {
    fields: [productCategories.productId],
    references: [products.id]
  }),
  category: one(categories, {
    fields: [productCategories.categoryId],
    references: [categories.id]
  })
}));

export const productVariationsRelations = relations(productVariations, ({ one, many }) => ({
  product: one(products, {
    fields: [productVariations.productId],
    references: [products.id]
  }),
  priceEntries: many(priceHistory),
  crawlRuns: many(crawlRuns)
}));

export const priceHistoryRelations = relations(priceHistory, ({ one }) => ({
  variation: one(productVariations, {
    fields: [priceHistory.variationId],
    references: [productVariations.id]
  })
}));

export const crawlRunsRelations = relations(crawlRuns, ({ one }) => ({
  variation: one(productVariations, {
    fields: [crawlRuns.variationId],
    references: [productVariations.id]
  })
}));

// Types
export type Category = typeof categories.$inferSelect;
export type NewCategory = typeof categories.$inferInsert;
export type Product = typeof products.$inferSelect;
export type NewProduct = typeof products.$inferInsert;
export type ProductVariation = typeof productVariations.$inferSelect;
export type NewProductVariation = typeof productVariations.$inferInsert;
export type PriceEntry = typeof priceHistory.$inferSelect;
export type NewPriceEntry = typeof priceHistory.$inferInsert;
export type CrawlRun = typeof crawlRuns.$inferSelect;
export type NewCrawlRun = typeof crawlRuns.$inferInsert;
export type AppSetting = typeof appSettings.$inferSelect;
export type NewAppSetting = typeof appSettings.$inferInsert;
