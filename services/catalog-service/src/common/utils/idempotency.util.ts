/**
 * Idempotency utilities for de-duplicating client retries of review submissions.
 * Supports both in-memory (dev) and Redis (production) backends.
 */

import { Logger } from '@nestjs/common';
import type Redis from 'ioredis';

export enum IdempotencyStatus {
  NOT_FOUND = 'NOT_FOUND',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
}

export interface IdempotencyRecord {
  key: string;
  status: IdempotencyStatus;
  createdAt: string;
  updatedAt: string;
  result?: unknown;
}

export interface IdempotencyStore {
  get(key: string): Promise<IdempotencyRecord | null>;
  /** Stores the record only if the key is free; resolves false when it is taken. */
  setIfAbsent(key: string, record: IdempotencyRecord, ttlMs: number): Promise<boolean>;
  set(key: string, record: IdempotencyRecord, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
}

const STATUSES: readonly string[] = Object.values(IdempotencyStatus);

function isIdempotencyStatus(value: unknown): value is IdempotencyStatus {
  return typeof value === 'string' && STATUSES.includes(value);
}

export function isIdempotencyRecord(value: unknown): value is IdempotencyRecord {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.key === 'string' &&
    isIdempotencyStatus(record.status) &&
    typeof record.createdAt === 'string' &&
    typeof record.updatedAt === 'string'
  );
}

/**
 * In-memory idempotency store for development/testing.
 */
export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly store = new Map<string, { record: IdempotencyRecord; expiresAt: number }>();

  async get(key: string): Promise<IdempotencyRecord | null> {
    return this.lookup(key);
  }

  // Check and write happen in the same tick, so two callers cannot both claim a key.
  async setIfAbsent(key: string, record: IdempotencyRecord, ttlMs: number): Promise<boolean> {
    if (this.lookup(key)) {
      return false;
    }
    this.evictExpired();
    this.store.set(key, { record, expiresAt: Date.now() + ttlMs });
    return true;
  }

  async set(key: string, record: IdempotencyRecord, ttlMs: number): Promise<void> {
    this.evictExpired();
    this.store.set(key, {
      record,
      expiresAt: Date.now() + ttlMs,
    });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  /** Drops every entry past its TTL; keys are rarely looked up again once used. */
  private evictExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.store) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
      }
    }
  }

  private lookup(key: string): IdempotencyRecord | null {
    const entry = this.store.get(key);

    if (!entry) {
      return null;
    }

    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    return entry.record;
  }
}

/**
 * Redis-based idempotency store for production.
 */
export class RedisIdempotencyStore implements IdempotencyStore {
  private readonly logger = new Logger(RedisIdempotencyStore.name);
  private readonly keyPrefix = 'idempotency:';

  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<IdempotencyRecord | null> {
    const data = await this.redis.get(this.keyPrefix + key);
    if (!data) {
      return null;
    }

    const parsed: unknown = JSON.parse(data);
    if (!isIdempotencyRecord(parsed)) {
      this.logger.warn(`Discarding malformed idempotency record for ${key}`);
      return null;
    }
    return parsed;
  }

  async setIfAbsent(key: string, record: IdempotencyRecord, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(
      this.keyPrefix + key,
      JSON.stringify(record),
      'PX',
      ttlMs,
      'NX',
    );
    return result === 'OK';
  }

  async set(key: string, record: IdempotencyRecord, ttlMs: number): Promise<void> {
    await this.redis.set(this.keyPrefix + key, JSON.stringify(record), 'PX', ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.keyPrefix + key);
  }
}

/**
 * Idempotency manager for handling duplicate detection.
 */
export class IdempotencyManager {
  private readonly logger = new Logger(IdempotencyManager.name);

  constructor(
    private readonly store: IdempotencyStore,
    private readonly ttlMs = 24 * 60 * 60 * 1000,
  ) {}

  /**
   * Claims the key for the caller. Returns NOT_FOUND when the claim succeeded,
   * otherwise the status of whoever holds it.
   */
  async checkAndLock(key: string): Promise<IdempotencyStatus> {
    const now = new Date().toISOString();
    const record: IdempotencyRecord = {
      key,
      status: IdempotencyStatus.PROCESSING,
      createdAt: now,
      updatedAt: now,
    };

    if (await this.store.setIfAbsent(key, record, this.ttlMs)) {
      return IdempotencyStatus.NOT_FOUND;
    }

    const existing = await this.store.get(key);
    if (!existing) {
      // expired between the two calls; try once more
      return (await this.store.setIfAbsent(key, record, this.ttlMs))
        ? IdempotencyStatus.NOT_FOUND
        : IdempotencyStatus.PROCESSING;
    }

    this.logger.debug(`Found existing record for key ${key}: ${existing.status}`);
    return existing.status;
  }

  async getResult(key: string): Promise<unknown> {
    const existing = await this.store.get(key);
    return existing?.result;
  }

  async markCompleted(key: string, result?: unknown): Promise<void> {
    const existing = await this.store.get(key);
    const now = new Date().toISOString();
    const record: IdempotencyRecord = {
      key,
      status: IdempotencyStatus.COMPLETED,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
      result,
    };

    await this.store.set(key, record, this.ttlMs);
    this.logger.debug(`Marked ${key} as completed`);
  }

  async release(key: string): Promise<void> {
    await this.store.delete(key);
    this.logger.debug(`Released lock for ${key}`);
  }

  generateKey(productId: number, clientKey: string): string {
    return `product:${productId}:review:${clientKey}`;
  }
}
