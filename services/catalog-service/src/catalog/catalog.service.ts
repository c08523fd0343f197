/**
 * Catalog service: the public contract for browsing products and reviews and
 * for accepting new reviews.
 *
 * A submission saves the review and recomputes the product's stats inside one
 * immediate transaction, and only returns once that transaction has
 * committed. If the recompute fails the review is rolled back with it and the
 * caller sees the error; recomputeStats can be re-run on its own afterwards.
 */

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DatabaseService } from '../database/database.service';
import { ProductRepository, PRODUCT_SORT_PROPERTIES } from '../products/product.repository';
import { ReviewRepository, REVIEW_SORT_PROPERTIES } from '../reviews/review.repository';
import { RatingAggregationService } from '../aggregation/rating-aggregation.service';
import { isStarValue } from '../aggregation/rating.types';
import { IdempotencyService } from '../common/services/idempotency.service';
import {
  IdempotencyException,
  isRetryableError,
  ResourceNotFoundException,
  ValidationException,
} from '../common/exceptions';
import { Page } from '../common/interfaces/page.interface';
import {
  mapPage,
  PagingLimits,
  parseSort,
  resolvePaging,
} from '../common/utils/pagination.util';
import { retryWithBackoff, RetryConfig } from '../common/utils/retry.util';
import {
  ANONYMOUS_REVIEWER,
  isReviewView,
  MAX_COMMENT_LENGTH,
  MAX_REVIEWER_NAME_LENGTH,
  MIN_COMMENT_LENGTH,
  ProductDetail,
  ProductListQuery,
  ProductSummary,
  REVIEW_SUBMITTED_EVENT,
  ReviewListQuery,
  ReviewSubmission,
  ReviewSubmittedEvent,
  ReviewView,
  toProductSummary,
  toReviewView,
} from './catalog.types';

const MAX_IDEMPOTENCY_KEY_LENGTH = 200;

export interface CatalogMetrics {
  reviewsSubmitted: number;
  submissionsFailed: number;
  submissionsReplayed: number;
  helpfulVotes: number;
}

interface ValidatedSubmission {
  reviewerName: string;
  comment: string;
  rating: number;
}

@Injectable()
export class CatalogService implements OnModuleInit {
  private readonly logger = new Logger(CatalogService.name);
  private paging!: PagingLimits;
  private retryConfig!: Partial<RetryConfig>;
  private metrics: CatalogMetrics = {
    reviewsSubmitted: 0,
    submissionsFailed: 0,
    submissionsReplayed: 0,
    helpfulVotes: 0,
  };

  constructor(
    private readonly configService: ConfigService,
    private readonly database: DatabaseService,
    private readonly productRepository: ProductRepository,
    private readonly reviewRepository: ReviewRepository,
    private readonly aggregation: RatingAggregationService,
    private readonly idempotencyService: IdempotencyService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  onModuleInit() {
    this.paging = {
      defaultSize: this.configService.get<number>('pagination.defaultSize', 10),
      maxSize: this.configService.get<number>('pagination.maxSize', 100),
    };

    this.retryConfig = {
      maxAttempts: this.configService.get<number>('retry.maxAttempts', 3),
      baseDelayMs: this.configService.get<number>('retry.baseDelayMs', 50),
      maxDelayMs: this.configService.get<number>('retry.maxDelayMs', 1000),
      exponentialBase: 2,
      jitter: true,
      retryIf: isRetryableError,
    };
  }

  async listProducts(query: ProductListQuery = {}): Promise<Page<ProductSummary>> {
    const { page, size } = resolvePaging(query.page, query.size, this.paging);
    const sort = parseSort(query.sort, PRODUCT_SORT_PROPERTIES, [
      { property: 'id', direction: 'asc' },
    ]);

    const products = this.database.read('listProducts', (db) =>
      this.productRepository.findPage(
        { category: query.category, search: query.search },
        { page, size, sort },
        db,
      ),
    );

    return mapPage(products, toProductSummary);
  }

  async getProduct(id: number): Promise<ProductDetail> {
    return this.database.read('getProduct', (db) => {
      const product = this.productRepository.findById(id, db);
      if (!product) {
        throw new ResourceNotFoundException('Product', id);
      }
      return {
        ...toProductSummary(product),
        ratingBreakdown: this.aggregation.ratingBreakdown(id, db),
      };
    });
  }

  async listReviews(productId: number, query: ReviewListQuery = {}): Promise<Page<ReviewView>> {
    const { page, size } = resolvePaging(query.page, query.size, this.paging);
    const sort = parseSort(query.sort, REVIEW_SORT_PROPERTIES, [
      { property: 'createdAt', direction: 'asc' },
    ]);
    if (query.rating !== undefined && !isStarValue(query.rating)) {
      throw new ValidationException('rating filter must be an integer between 1 and 5', 'rating');
    }

    const reviews = this.database.read('listReviews', (db) => {
      if (!this.productRepository.exists(productId, db)) {
        throw new ResourceNotFoundException('Product', productId);
      }
      return this.reviewRepository.findByProductPaged(
        productId,
        query.rating,
        { page, size, sort },
        db,
      );
    });

    return mapPage(reviews, toReviewView);
  }

  /**
   * Saves a review and refreshes the product's stats before resolving. With an
   * idempotency key, a repeat of a completed submission returns the original
   * review instead of writing a second one.
   */
  async submitReview(
    productId: number,
    submission: ReviewSubmission,
    idempotencyKey?: string,
  ): Promise<ReviewView> {
    const input = this.validateSubmission(submission);

    if (idempotencyKey === undefined) {
      return this.persistReview(productId, input);
    }

    const key = this.validateIdempotencyKey(idempotencyKey);
    const status = await this.idempotencyService.checkAndLock(productId, key);

    if (this.idempotencyService.isProcessed(status)) {
      const stored = await this.idempotencyService.getResult(productId, key);
      if (!isReviewView(stored)) {
        throw new IdempotencyException(`Stored result for key ${key} is unreadable`, key);
      }
      this.metrics.submissionsReplayed++;
      this.logger.log(`Replayed review ${stored.id} for idempotency key ${key}`);
      return stored;
    }

    if (this.idempotencyService.isProcessing(status)) {
      throw new IdempotencyException(`A submission with key ${key} is already in progress`, key);
    }

    let review: ReviewView;
    try {
      review = await this.persistReview(productId, input);
    } catch (error) {
      await this.idempotencyService.release(productId, key);
      throw error;
    }

    // The review is committed; a lost key record must not turn that into an error
    try {
      await this.idempotencyService.markCompleted(productId, key, review);
    } catch (error) {
      this.logger.warn(
        `Could not record idempotency key ${key} for review ${review.id}: ${error instanceof Error ? error.message : error}`,
      );
    }
    return review;
  }

  async markHelpful(reviewId: number): Promise<ReviewView> {
    const updated = this.database.transaction('markHelpful', (tx) =>
      this.reviewRepository.incrementHelpful(reviewId, tx),
    );

    if (!updated) {
      throw new ResourceNotFoundException('Review', reviewId);
    }

    this.metrics.helpfulVotes++;
    return toReviewView(updated);
  }

  getMetrics(): CatalogMetrics {
    return { ...this.metrics };
  }

  private async persistReview(productId: number, input: ValidatedSubmission): Promise<ReviewView> {
    try {
      const { review, stats } = await retryWithBackoff(
        async () =>
          this.database.transaction('submitReview', (tx) => {
            if (!this.productRepository.exists(productId, tx)) {
              throw new ResourceNotFoundException('Product', productId);
            }
            const saved = this.reviewRepository.save({ productId, ...input }, tx);
            const stats = this.aggregation.recomputeStats(productId, tx);
            return { review: toReviewView(saved), stats };
          }),
        this.retryConfig,
        this.logger,
        `submitReview:${productId}`,
      );

      this.metrics.reviewsSubmitted++;
      this.logger.log(
        `Review ${review.id} saved for product ${productId} (${stats.reviewCount} reviews, average ${stats.averageRating})`,
      );

      const event: ReviewSubmittedEvent = { review, stats };
      this.eventEmitter.emit(REVIEW_SUBMITTED_EVENT, event);

      return review;
    } catch (error) {
      this.metrics.submissionsFailed++;
      throw error;
    }
  }

  private validateSubmission(submission: ReviewSubmission): ValidatedSubmission {
    const { rating, comment } = submission;

    if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
      throw new ValidationException('rating must be an integer between 1 and 5', 'rating');
    }
    if (typeof comment !== 'string' || comment.length < MIN_COMMENT_LENGTH) {
      throw new ValidationException(
        `comment must be at least ${MIN_COMMENT_LENGTH} characters`,
        'comment',
      );
    }
    if (comment.length > MAX_COMMENT_LENGTH) {
      throw new ValidationException(
        `comment must be at most ${MAX_COMMENT_LENGTH} characters`,
        'comment',
      );
    }

    const reviewerName = submission.reviewerName?.trim();
    if (reviewerName && reviewerName.length > MAX_REVIEWER_NAME_LENGTH) {
      throw new ValidationException(
        `reviewerName must be at most ${MAX_REVIEWER_NAME_LENGTH} characters`,
        'reviewerName',
      );
    }

    return {
      reviewerName: reviewerName || ANONYMOUS_REVIEWER,
      comment,
      rating,
    };
  }

  private validateIdempotencyKey(raw: string): string {
    const key = raw.trim();
    if (key.length === 0 || key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new ValidationException(
        `Idempotency-Key must be 1-${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
        'Idempotency-Key',
      );
    }
    return key;
  }
}
