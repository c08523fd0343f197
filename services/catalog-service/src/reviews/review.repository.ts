import { Injectable } from '@nestjs/common';
import { and, asc, count, eq, sql } from 'drizzle-orm';
import { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import { CatalogExecutor, DatabaseService } from '../database/database.service';
import { toOrderBy } from '../database/ordering';
import { ReviewRecord, reviews } from '../database/schema';
import { Page, PageRequest } from '../common/interfaces/page.interface';
import { buildPage } from '../common/utils/pagination.util';

export const REVIEW_SORT_PROPERTIES = ['id', 'createdAt', 'rating', 'helpfulCount'] as const;

export type ReviewSortProperty = (typeof REVIEW_SORT_PROPERTIES)[number];

const SORT_COLUMNS: Record<ReviewSortProperty, AnySQLiteColumn> = {
  id: reviews.id,
  createdAt: reviews.createdAt,
  rating: reviews.rating,
  helpfulCount: reviews.helpfulCount,
};

export interface NewReview {
  productId: number;
  reviewerName: string;
  comment: string;
  rating: number;
}

export interface RatingCount {
  rating: number;
  count: number;
}

@Injectable()
export class ReviewRepository {
  constructor(private readonly database: DatabaseService) {}

  findById(id: number, executor: CatalogExecutor = this.database.db): ReviewRecord | undefined {
    return executor.select().from(reviews).where(eq(reviews.id, id)).get();
  }

  /** Every review of the product, in insertion order. */
  findByProduct(productId: number, executor: CatalogExecutor = this.database.db): ReviewRecord[] {
    return executor
      .select()
      .from(reviews)
      .where(eq(reviews.productId, productId))
      .orderBy(asc(reviews.id))
      .all();
  }

  findByProductPaged(
    productId: number,
    ratingFilter: number | undefined,
    request: PageRequest<ReviewSortProperty>,
    executor: CatalogExecutor = this.database.db,
  ): Page<ReviewRecord> {
    const where = and(
      eq(reviews.productId, productId),
      ratingFilter === undefined ? undefined : eq(reviews.rating, ratingFilter),
    );

    const content = executor
      .select()
      .from(reviews)
      .where(where)
      .orderBy(...toOrderBy(request.sort, SORT_COLUMNS, reviews.id))
      .limit(request.size)
      .offset(request.page * request.size)
      .all();

    const total = executor.select({ value: count() }).from(reviews).where(where).get();

    return buildPage(content, request, total?.value ?? 0);
  }

  /** One entry per rating value present; ratings with no reviews are omitted. */
  countByRatingForProduct(
    productId: number,
    executor: CatalogExecutor = this.database.db,
  ): RatingCount[] {
    return executor
      .select({ rating: reviews.rating, count: count() })
      .from(reviews)
      .where(eq(reviews.productId, productId))
      .groupBy(reviews.rating)
      .orderBy(asc(reviews.rating))
      .all();
  }

  save(review: NewReview, executor: CatalogExecutor = this.database.db): ReviewRecord {
    return executor
      .insert(reviews)
      .values({ ...review, helpfulCount: 0, createdAt: new Date() })
      .returning()
      .get();
  }

  /** Atomic in SQL, so concurrent votes are never lost. */
  incrementHelpful(
    id: number,
    executor: CatalogExecutor = this.database.db,
  ): ReviewRecord | undefined {
    return executor
      .update(reviews)
      .set({ helpfulCount: sql`${reviews.helpfulCount} + 1` })
      .where(eq(reviews.id, id))
      .returning()
      .get();
  }
}
