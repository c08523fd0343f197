import { Injectable } from '@nestjs/common';
import { and, count, eq, SQL, sql } from 'drizzle-orm';
import { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import { CatalogExecutor, DatabaseService } from '../database/database.service';
import { toOrderBy } from '../database/ordering';
import { NewProductRecord, ProductRecord, products } from '../database/schema';
import { Page, PageRequest } from '../common/interfaces/page.interface';
import { buildPage } from '../common/utils/pagination.util';

export const PRODUCT_SORT_PROPERTIES = [
  'id',
  'name',
  'category',
  'price',
  'averageRating',
  'reviewCount',
] as const;

export type ProductSortProperty = (typeof PRODUCT_SORT_PROPERTIES)[number];

const SORT_COLUMNS: Record<ProductSortProperty, AnySQLiteColumn> = {
  id: products.id,
  name: products.name,
  category: products.category,
  price: products.price,
  averageRating: products.averageRating,
  reviewCount: products.reviewCount,
};

/** Category value clients send to mean "every category". */
export const ALL_CATEGORIES = 'all';

export interface ProductFilter {
  category?: string;
  search?: string;
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Read access to products. Nothing here writes `averageRating` or
 * `reviewCount`; ProductStatsStore owns those columns.
 */
@Injectable()
export class ProductRepository {
  constructor(private readonly database: DatabaseService) {}

  findById(id: number, executor: CatalogExecutor = this.database.db): ProductRecord | undefined {
    return executor.select().from(products).where(eq(products.id, id)).get();
  }

  exists(id: number, executor: CatalogExecutor = this.database.db): boolean {
    const row = executor
      .select({ id: products.id })
      .from(products)
      .where(eq(products.id, id))
      .get();
    return row !== undefined;
  }

  findPage(
    filter: ProductFilter,
    request: PageRequest<ProductSortProperty>,
    executor: CatalogExecutor = this.database.db,
  ): Page<ProductRecord> {
    const where = this.buildFilter(filter);

    const content = executor
      .select()
      .from(products)
      .where(where)
      .orderBy(...toOrderBy(request.sort, SORT_COLUMNS, products.id))
      .limit(request.size)
      .offset(request.page * request.size)
      .all();

    const total = executor.select({ value: count() }).from(products).where(where).get();

    return buildPage(content, request, total?.value ?? 0);
  }

  findAllIds(executor: CatalogExecutor = this.database.db): number[] {
    return executor
      .select({ id: products.id })
      .from(products)
      .orderBy(products.id)
      .all()
      .map((row) => row.id);
  }

  count(executor: CatalogExecutor = this.database.db): number {
    return executor.select({ value: count() }).from(products).get()?.value ?? 0;
  }

  /** Catalog import only. Derived columns always start from zero. */
  insert(
    product: Omit<NewProductRecord, 'id' | 'averageRating' | 'reviewCount'>,
    executor: CatalogExecutor = this.database.db,
  ): ProductRecord {
    return executor
      .insert(products)
      .values({ ...product, averageRating: 0, reviewCount: 0 })
      .returning()
      .get();
  }

  private buildFilter(filter: ProductFilter): SQL | undefined {
    const conditions: SQL[] = [];

    const category = filter.category?.trim();
    if (category && category.toLowerCase() !== ALL_CATEGORIES) {
      conditions.push(eq(products.category, category));
    }

    const search = filter.search?.trim();
    if (search) {
      // LIKE is case-insensitive for ASCII in SQLite
      conditions.push(sql`${products.name} like ${`%${escapeLike(search)}%`} escape '\\'`);
    }

    return conditions.length > 0 ? and(...conditions) : undefined;
  }
}
