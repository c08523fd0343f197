/**
 * Catalog schema (SQLite).
 *
 * `average_rating` and `review_count` are derived columns; only
 * ProductStatsStore writes them. DDL lives in sql/schema.sql.
 */

import { index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// ── Products ────────────────────────────────────────────────────

export const products = sqliteTable(
  'products',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name', { length: 255 }).notNull(),
    description: text('description').notNull().default(''),
    category: text('category', { length: 100 }).notNull(),
    price: real('price').notNull(),
    imageUrl: text('image_url', { length: 500 }),
    averageRating: real('average_rating').notNull().default(0),
    reviewCount: integer('review_count').notNull().default(0),
  },
  (t) => ({
    categoryIdx: index('products_category_idx').on(t.category),
  }),
);

// ── Reviews ─────────────────────────────────────────────────────

export const reviews = sqliteTable(
  'reviews',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    productId: integer('product_id')
      .notNull()
      .references(() => products.id),
    reviewerName: text('reviewer_name', { length: 100 }).notNull().default('Anonymous'),
    comment: text('comment').notNull(),
    rating: integer('rating').notNull(),
    helpfulCount: integer('helpful_count').notNull().default(0),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (t) => ({
    productIdIdx: index('reviews_product_id_idx').on(t.productId),
    productRatingIdx: index('reviews_product_rating_idx').on(t.productId, t.rating),
    productCreatedAtIdx: index('reviews_product_created_at_idx').on(t.productId, t.createdAt),
  }),
);

export type ProductRecord = typeof products.$inferSelect;
export type NewProductRecord = typeof products.$inferInsert;
export type ReviewRecord = typeof reviews.$inferSelect;
export type NewReviewRecord = typeof reviews.$inferInsert;
