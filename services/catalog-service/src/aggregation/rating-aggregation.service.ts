/**
 * Rating aggregation: keeps a product's review count and average rating in
 * line with its review rows, and answers rating-breakdown queries.
 *
 * Every recompute re-reads the full review set instead of applying a delta,
 * so a product's stats depend only on the rows committed at that moment and
 * repeating the call without new reviews yields the same figures.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { CatalogExecutor, DatabaseService } from '../database/database.service';
import { ReviewRepository } from '../reviews/review.repository';
import { PRODUCT_STATS_WRITER, ProductStatsWriter } from './product-stats.store';
import {
  emptyBreakdown,
  isStarValue,
  ProductStats,
  RatingBreakdown,
} from './rating.types';

/**
 * Mean of the ratings rounded to one decimal, half away from zero.
 * Worked on the integer sum so that ties such as 4.05 land on 4.1.
 */
export function averageToTenth(ratings: readonly number[]): number {
  if (ratings.length === 0) {
    return 0;
  }
  const count = ratings.length;
  const sum = ratings.reduce((total, rating) => total + rating, 0);
  // round(10 * sum / count) for a non-negative numerator
  const tenths = Math.floor((20 * sum + count) / (2 * count));
  return tenths / 10;
}

@Injectable()
export class RatingAggregationService {
  private readonly logger = new Logger(RatingAggregationService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly reviewRepository: ReviewRepository,
    @Inject(PRODUCT_STATS_WRITER) private readonly statsWriter: ProductStatsWriter,
  ) {}

  /**
   * Recomputes and stores the product's stats. Joins the caller's transaction
   * when an executor is passed, otherwise runs in a transaction of its own;
   * either way a failure leaves the previously committed stats in place.
   */
  recomputeStats(productId: number, executor?: CatalogExecutor): ProductStats {
    if (executor) {
      return this.recompute(productId, executor);
    }
    return this.database.transaction('recomputeStats', (tx) => this.recompute(productId, tx));
  }

  ratingBreakdown(productId: number, executor?: CatalogExecutor): RatingBreakdown {
    const counts = executor
      ? this.reviewRepository.countByRatingForProduct(productId, executor)
      : this.database.read('ratingBreakdown', (db) =>
          this.reviewRepository.countByRatingForProduct(productId, db),
        );

    const breakdown = emptyBreakdown();
    for (const { rating, count } of counts) {
      if (isStarValue(rating)) {
        breakdown[rating] = count;
      } else {
        this.logger.warn(`Ignoring out-of-range rating ${rating} on product ${productId}`);
      }
    }
    return breakdown;
  }

  private recompute(productId: number, executor: CatalogExecutor): ProductStats {
    const ratings = this.reviewRepository
      .findByProduct(productId, executor)
      .map((review) => review.rating);

    const stats: ProductStats = {
      reviewCount: ratings.length,
      averageRating: averageToTenth(ratings),
    };

    this.statsWriter.write(productId, stats, executor);
    this.logger.debug(
      `Product ${productId} stats: ${stats.reviewCount} reviews, average ${stats.averageRating}`,
    );

    return stats;
  }
}
