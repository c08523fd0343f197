/**
 * Retry utilities with exponential backoff and jitter.
 * Used to ride out transient write-lock contention on the catalog database.
 */

import { Logger } from '@nestjs/common';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
  jitter: boolean;
  /** Errors rejected by this predicate are rethrown without another attempt. */
  retryIf?: (error: Error) => boolean;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
  exponentialBase: 2,
  jitter: true,
};

export function calculateDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_CONFIG,
): number {
  let delay = config.baseDelayMs * Math.pow(config.exponentialBase, attempt);
  delay = Math.min(delay, config.maxDelayMs);

  if (config.jitter) {
    const jitterFactor = 0.5 + Math.random();
    delay *= jitterFactor;
  }

  return Math.round(delay);
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  logger?: Logger,
  operationName = 'operation',
): Promise<T> {
  const fullConfig: RetryConfig = { ...DEFAULT_CONFIG, ...config };
  let lastError: Error = new Error(`${operationName} was not attempted`);

  for (let attempt = 0; attempt < fullConfig.maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = toError(error);

      if (fullConfig.retryIf && !fullConfig.retryIf(lastError)) {
        throw lastError;
      }

      if (attempt < fullConfig.maxAttempts - 1) {
        const delay = calculateDelay(attempt, fullConfig);
        logger?.warn(
          `${operationName} failed (attempt ${attempt + 1}/${fullConfig.maxAttempts}): ${lastError.message}. Retrying in ${delay}ms`,
        );
        await sleep(delay);
      } else {
        logger?.error(
          `${operationName} failed after ${fullConfig.maxAttempts} attempts: ${lastError.message}`,
        );
      }
    }
  }

  throw lastError;
}
