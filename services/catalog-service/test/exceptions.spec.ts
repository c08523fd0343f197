import { HttpStatus } from '@nestjs/common';
import {
  CatalogError,
  ConfigurationException,
  ErrorCategory,
  ErrorSeverity,
  IdempotencyException,
  isRetryableError,
  ResourceNotFoundException,
  StorageException,
  ValidationException,
} from '../src/common/exceptions';

describe('Catalog exceptions', () => {
  describe('CatalogError', () => {
    it('should default to a non-retryable storage error', () => {
      const error = new CatalogError('Write failed');

      expect(error.message).toBe('Write failed');
      expect(error.name).toBe('CatalogError');
      expect(error.category).toBe(ErrorCategory.STORAGE);
      expect(error.severity).toBe(ErrorSeverity.MEDIUM);
      expect(error.retryable).toBe(false);
      expect(error.httpStatus).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
    });

    it('should serialize context and the original error message', () => {
      const error = new CatalogError('Write failed', {
        context: { productId: 7, operation: 'submitReview' },
        originalError: new Error('disk I/O error'),
      });
      const json = error.toJSON();

      expect(json.name).toBe('CatalogError');
      expect(json.originalError).toBe('disk I/O error');
      expect(error.context.productId).toBe(7);
      expect(error.context.operation).toBe('submitReview');
      expect(typeof error.context.timestamp).toBe('string');
    });
  });

  describe('ResourceNotFoundException', () => {
    it('should name the missing product', () => {
      const error = new ResourceNotFoundException('Product', 42);

      expect(error.message).toBe('Product not found: 42');
      expect(error.httpStatus).toBe(HttpStatus.NOT_FOUND);
      expect(error.category).toBe(ErrorCategory.NOT_FOUND);
      expect(error.context.productId).toBe(42);
      expect(error.context.reviewId).toBeUndefined();
    });

    it('should put review ids in reviewId', () => {
      const error = new ResourceNotFoundException('Review', 9);

      expect(error.message).toBe('Review not found: 9');
      expect(error.context.reviewId).toBe(9);
    });
  });

  describe('ValidationException', () => {
    it('should capture the offending field', () => {
      const error = new ValidationException('rating must be an integer between 1 and 5', 'rating', {
        productId: 3,
      });

      expect(error.httpStatus).toBe(HttpStatus.BAD_REQUEST);
      expect(error.retryable).toBe(false);
      expect(error.context.additionalData?.field).toBe('rating');
      expect(error.context.productId).toBe(3);
    });
  });

  describe('StorageException', () => {
    it('should record the operation and honour the retryable flag', () => {
      const error = new StorageException('busy', 'submitReview', { retryable: true });

      expect(error.context.operation).toBe('submitReview');
      expect(error.severity).toBe(ErrorSeverity.HIGH);
      expect(error.retryable).toBe(true);
    });
  });

  describe('ConfigurationException', () => {
    it('should be critical and non-retryable', () => {
      const error = new ConfigurationException('Seed file not found', 'database.seedFile');

      expect(error.category).toBe(ErrorCategory.CONFIGURATION);
      expect(error.severity).toBe(ErrorSeverity.CRITICAL);
      expect(error.retryable).toBe(false);
      expect(error.context.additionalData?.configKey).toBe('database.seedFile');
    });
  });

  describe('IdempotencyException', () => {
    it('should map to 409 Conflict', () => {
      const error = new IdempotencyException('in progress', 'key-1');

      expect(error.httpStatus).toBe(HttpStatus.CONFLICT);
      expect(error.context.additionalData?.idempotencyKey).toBe('key-1');
    });
  });

  describe('isRetryableError', () => {
    it('should only accept catalog errors flagged as retryable', () => {
      expect(isRetryableError(new StorageException('busy', 'op', { retryable: true }))).toBe(true);
      expect(isRetryableError(new StorageException('constraint', 'op'))).toBe(false);
      expect(isRetryableError(new Error('plain'))).toBe(false);
    });
  });
});
