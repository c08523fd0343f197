import { Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { CatalogExecutor } from '../database/database.service';
import { products } from '../database/schema';
import { ResourceNotFoundException } from '../common/exceptions';
import { ProductStats } from './rating.types';

export const PRODUCT_STATS_WRITER = Symbol('PRODUCT_STATS_WRITER');

/**
 * The single write path for a product's derived rating columns. Provided only
 * inside AggregationModule.
 */
export interface ProductStatsWriter {
  write(productId: number, stats: ProductStats, executor: CatalogExecutor): void;
}

@Injectable()
export class ProductStatsStore implements ProductStatsWriter {
  write(productId: number, stats: ProductStats, executor: CatalogExecutor): void {
    const result = executor
      .update(products)
      .set({ averageRating: stats.averageRating, reviewCount: stats.reviewCount })
      .where(eq(products.id, productId))
      .run();

    if (result.changes === 0) {
      throw new ResourceNotFoundException('Product', productId);
    }
  }
}
