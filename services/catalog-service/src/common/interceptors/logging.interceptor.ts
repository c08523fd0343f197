/**
 * Logging interceptor for request/response tracking.
 * Echoes the correlation id back so clients can match log lines to calls.
 */

import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';

export const CORRELATION_HEADER = 'x-correlation-id';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const { method, originalUrl, ip } = request;
    const correlationId = request.get(CORRELATION_HEADER) || this.generateId();
    response.setHeader(CORRELATION_HEADER, correlationId);

    const handler = `${context.getClass().name}.${context.getHandler().name}`;
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - startTime;

          this.logger.log(
            `${method} ${originalUrl} ${response.statusCode} - ${duration}ms`,
            { handler, duration, ip, correlationId },
          );
        },
        error: (error: unknown) => {
          const duration = Date.now() - startTime;
          const reason = error instanceof Error ? error.message : String(error);

          this.logger.warn(
            `${method} ${originalUrl} failed after ${duration}ms: ${reason}`,
            { handler, duration, ip, correlationId },
          );
        },
      }),
    );
  }

  private generateId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
  }
}
