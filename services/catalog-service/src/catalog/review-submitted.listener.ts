/**
 * Logs committed review submissions. Called synchronously from the submit
 * path once the transaction has committed; errors here are caught by the
 * event emitter and never reach the stored review or stats.
 */

import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { REVIEW_SUBMITTED_EVENT, ReviewSubmittedEvent } from './catalog.types';

@Injectable()
export class ReviewSubmittedListener {
  private readonly logger = new Logger(ReviewSubmittedListener.name);
  private received = 0;

  @OnEvent(REVIEW_SUBMITTED_EVENT)
  handleReviewSubmitted(event: ReviewSubmittedEvent): void {
    const { review, stats } = event;
    this.received++;

    this.logger.log(
      `Received ${REVIEW_SUBMITTED_EVENT} for review ${review.id}`,
      {
        productId: review.productId,
        rating: review.rating,
        reviewCount: stats.reviewCount,
        averageRating: stats.averageRating,
      },
    );
  }

  get receivedCount(): number {
    return this.received;
  }
}
