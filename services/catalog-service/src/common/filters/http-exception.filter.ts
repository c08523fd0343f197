/**
 * Global HTTP exception filter for standardized error responses.
 */

import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { CatalogError } from '../exceptions';

interface ErrorResponse {
  statusCode: number;
  timestamp: string;
  path: string;
  method: string;
  message: string;
  error?: string;
  details?: unknown;
}

function describeHttpException(
  exceptionResponse: string | object,
  fallback: string,
): { message: string; error?: string; details?: unknown } {
  if (typeof exceptionResponse === 'string') {
    return { message: exceptionResponse };
  }

  const resp: Record<string, unknown> = { ...exceptionResponse };
  const rawMessage = resp.message;
  // ValidationPipe reports one message per failed constraint
  const message = Array.isArray(rawMessage)
    ? rawMessage.map(String).join('; ')
    : typeof rawMessage === 'string'
      ? rawMessage
      : fallback;

  return {
    message,
    error: typeof resp.error === 'string' ? resp.error : undefined,
    details: Array.isArray(rawMessage) ? rawMessage : resp.details,
  };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error: string | undefined;
    let details: unknown;

    if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      ({ message, error, details } = describeHttpException(
        exception.getResponse(),
        message,
      ));
    } else if (exception instanceof CatalogError) {
      statusCode = exception.httpStatus;
      error = exception.category;
      // Server-side failures keep their driver detail in the log only
      if (statusCode < HttpStatus.INTERNAL_SERVER_ERROR) {
        message = exception.message;
        details = exception.toJSON();
      }
    }

    const errorResponse: ErrorResponse = {
      statusCode,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message,
    };

    if (error) {
      errorResponse.error = error;
    }
    if (details !== undefined) {
      errorResponse.details = details;
    }

    if (statusCode >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - ${statusCode}: ${
          exception instanceof Error ? exception.message : message
        }`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${statusCode}: ${message}`);
    }

    response.status(statusCode).json(errorResponse);
  }
}
