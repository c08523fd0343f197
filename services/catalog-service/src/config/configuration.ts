/**
 * Application configuration with validation.
 */

import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

const BOOLEAN_FLAGS = ['true', 'false'];

export class EnvironmentVariables {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  @IsNumber()
  @Min(1)
  @IsOptional()
  PORT: number = 3000;

  // Database
  @IsString()
  @IsOptional()
  DATABASE_PATH: string = 'data/catalog.db';

  @IsNumber()
  @Min(0)
  @IsOptional()
  DATABASE_BUSY_TIMEOUT_MS: number = 5000;

  @IsIn(BOOLEAN_FLAGS)
  @IsOptional()
  SEED_ON_STARTUP: string = 'true';

  // Pagination
  @IsNumber()
  @Min(1)
  @IsOptional()
  PAGINATION_DEFAULT_SIZE: number = 10;

  @IsNumber()
  @Min(1)
  @Max(1000)
  @IsOptional()
  PAGINATION_MAX_SIZE: number = 100;

  @IsNumber()
  @Min(100)
  @IsOptional()
  REQUEST_TIMEOUT_MS: number = 30000;

  // Redis Configuration
  @IsString()
  @IsOptional()
  REDIS_URL?: string;

  // Retry Configuration
  @IsNumber()
  @Min(1)
  @IsOptional()
  RETRY_MAX_ATTEMPTS: number = 3;

  @IsNumber()
  @Min(1)
  @IsOptional()
  RETRY_BASE_DELAY_MS: number = 50;

  @IsNumber()
  @Min(1)
  @IsOptional()
  RETRY_MAX_DELAY_MS: number = 1000;

  // Idempotency Configuration
  @IsNumber()
  @Min(60000)
  @IsOptional()
  IDEMPOTENCY_TTL_MS: number = 86400000; // 24 hours

  // Stats reconciliation
  @IsIn(BOOLEAN_FLAGS)
  @IsOptional()
  RECONCILIATION_ENABLED: string = 'false';

  @IsNumber()
  @Min(1000)
  @IsOptional()
  RECONCILIATION_INTERVAL_MS: number = 3600000;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => Object.values(error.constraints || {}).join(', '))
      .join('; ');
    throw new Error(`Configuration validation failed: ${errorMessages}`);
  }

  return validatedConfig;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === 'true';
}

export default () => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),

  database: {
    path: process.env.DATABASE_PATH || 'data/catalog.db',
    busyTimeoutMs: parseInt(process.env.DATABASE_BUSY_TIMEOUT_MS || '5000', 10),
    seedOnStartup: flag(process.env.SEED_ON_STARTUP, true),
  },

  pagination: {
    defaultSize: parseInt(process.env.PAGINATION_DEFAULT_SIZE || '10', 10),
    maxSize: parseInt(process.env.PAGINATION_MAX_SIZE || '100', 10),
  },

  http: {
    requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || '30000', 10),
  },

  redis: {
    url: process.env.REDIS_URL,
  },

  retry: {
    maxAttempts: parseInt(process.env.RETRY_MAX_ATTEMPTS || '3', 10),
    baseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS || '50', 10),
    maxDelayMs: parseInt(process.env.RETRY_MAX_DELAY_MS || '1000', 10),
  },

  idempotency: {
    ttlMs: parseInt(process.env.IDEMPOTENCY_TTL_MS || '86400000', 10),
  },

  reconciliation: {
    enabled: flag(process.env.RECONCILIATION_ENABLED, false),
    intervalMs: parseInt(process.env.RECONCILIATION_INTERVAL_MS || '3600000', 10),
  },
});
