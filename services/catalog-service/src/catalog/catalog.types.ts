import { ProductRecord, ReviewRecord } from '../database/schema';
import { ProductStats, RatingBreakdown } from '../aggregation/rating.types';

export const ANONYMOUS_REVIEWER = 'Anonymous';
export const MIN_COMMENT_LENGTH = 10;
export const MAX_COMMENT_LENGTH = 2000;
export const MAX_REVIEWER_NAME_LENGTH = 100;

export const REVIEW_SUBMITTED_EVENT = 'review.submitted';

/** List view of a product; never carries the rating breakdown. */
export interface ProductSummary {
  id: number;
  name: string;
  description: string;
  category: string;
  price: number;
  imageUrl: string | null;
  averageRating: number;
  reviewCount: number;
}

export interface ProductDetail extends ProductSummary {
  ratingBreakdown: RatingBreakdown;
}

export interface ReviewView {
  id: number;
  productId: number;
  reviewerName: string;
  comment: string;
  rating: number;
  helpfulCount: number;
  createdAt: string;
}

export interface ReviewSubmission {
  reviewerName?: string;
  comment: string;
  rating: number;
}

export interface ReviewSubmittedEvent {
  review: ReviewView;
  stats: ProductStats;
}

export interface PageQuery {
  page?: number;
  size?: number;
  sort?: string | string[];
}

export interface ProductListQuery extends PageQuery {
  category?: string;
  search?: string;
}

export interface ReviewListQuery extends PageQuery {
  rating?: number;
}

export function toProductSummary(product: ProductRecord): ProductSummary {
  return {
    id: product.id,
    name: product.name,
    description: product.description,
    category: product.category,
    price: product.price,
    imageUrl: product.imageUrl,
    averageRating: product.averageRating,
    reviewCount: product.reviewCount,
  };
}

export function toReviewView(review: ReviewRecord): ReviewView {
  return {
    id: review.id,
    productId: review.productId,
    reviewerName: review.reviewerName,
    comment: review.comment,
    rating: review.rating,
    helpfulCount: review.helpfulCount,
    createdAt: review.createdAt.toISOString(),
  };
}

/** Checks a value read back from the idempotency store. */
export function isReviewView(value: unknown): value is ReviewView {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.id === 'number' &&
    typeof candidate.productId === 'number' &&
    typeof candidate.reviewerName === 'string' &&
    typeof candidate.comment === 'string' &&
    typeof candidate.rating === 'number' &&
    typeof candidate.helpfulCount === 'number' &&
    typeof candidate.createdAt === 'string'
  );
}
