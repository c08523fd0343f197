/**
 * Aggregation module. The stats writer is registered here and not exported,
 * so nothing outside this module can write a product's derived columns.
 */

import { Module } from '@nestjs/common';
import { ProductsModule } from '../products/products.module';
import { ReviewsModule } from '../reviews/reviews.module';
import { PRODUCT_STATS_WRITER, ProductStatsStore } from './product-stats.store';
import { RatingAggregationService } from './rating-aggregation.service';
import { StatsReconciliationService } from './stats-reconciliation.service';

@Module({
  imports: [ProductsModule, ReviewsModule],
  providers: [
    RatingAggregationService,
    StatsReconciliationService,
    { provide: PRODUCT_STATS_WRITER, useClass: ProductStatsStore },
  ],
  exports: [RatingAggregationService, StatsReconciliationService],
})
export class AggregationModule {}
