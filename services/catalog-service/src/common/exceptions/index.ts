/**
 * Custom exceptions for the catalog service.
 * Provides structured error handling with rich context.
 */

import { HttpStatus } from '@nestjs/common';

export enum ErrorCategory {
  VALIDATION = 'validation',
  NOT_FOUND = 'not_found',
  STORAGE = 'storage',
  CONFIGURATION = 'configuration',
  IDEMPOTENCY = 'idempotency',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  productId?: number;
  reviewId?: number;
  operation?: string;
  timestamp: string;
  additionalData?: Record<string, unknown>;
}

export class CatalogError extends Error {
  public readonly context: ErrorContext;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly retryable: boolean;
  public readonly httpStatus: HttpStatus;
  public readonly originalError?: Error;

  constructor(
    message: string,
    options: {
      context?: Partial<ErrorContext>;
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      retryable?: boolean;
      httpStatus?: HttpStatus;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;

    this.context = {
      timestamp: new Date().toISOString(),
      ...options.context,
    };
    this.category = options.category || ErrorCategory.STORAGE;
    this.severity = options.severity || ErrorSeverity.MEDIUM;
    this.retryable = options.retryable ?? false;
    this.httpStatus = options.httpStatus ?? HttpStatus.INTERNAL_SERVER_ERROR;
    this.originalError = options.originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      retryable: this.retryable,
      context: this.context,
      originalError: this.originalError?.message,
    };
  }
}

export type CatalogEntity = 'Product' | 'Review';

export class ResourceNotFoundException extends CatalogError {
  public readonly entity: CatalogEntity;

  constructor(entity: CatalogEntity, id: number) {
    super(`${entity} not found: ${id}`, {
      context: entity === 'Product' ? { productId: id } : { reviewId: id },
      category: ErrorCategory.NOT_FOUND,
      severity: ErrorSeverity.LOW,
      httpStatus: HttpStatus.NOT_FOUND,
    });
    this.entity = entity;
  }
}

export class ValidationException extends CatalogError {
  constructor(
    message: string,
    field: string,
    context?: Partial<ErrorContext>,
  ) {
    super(message, {
      context: { ...context, additionalData: { field } },
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      httpStatus: HttpStatus.BAD_REQUEST,
    });
  }
}

export class StorageException extends CatalogError {
  constructor(
    message: string,
    operation: string,
    options: {
      context?: Partial<ErrorContext>;
      retryable?: boolean;
      originalError?: Error;
    } = {},
  ) {
    super(message, {
      context: { ...options.context, operation },
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.HIGH,
      retryable: options.retryable ?? false,
      httpStatus: HttpStatus.INTERNAL_SERVER_ERROR,
      originalError: options.originalError,
    });
  }
}

export class ConfigurationException extends CatalogError {
  constructor(message: string, configKey: string) {
    super(message, {
      context: { additionalData: { configKey } },
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.CRITICAL,
    });
  }
}

export class IdempotencyException extends CatalogError {
  constructor(message: string, key: string) {
    super(message, {
      context: { additionalData: { idempotencyKey: key } },
      category: ErrorCategory.IDEMPOTENCY,
      severity: ErrorSeverity.LOW,
      httpStatus: HttpStatus.CONFLICT,
    });
  }
}

export function isRetryableError(error: Error): boolean {
  return error instanceof CatalogError && error.retryable;
}
