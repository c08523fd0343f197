/**
 * Idempotency service for de-duplicating review submissions retried by clients.
 * Uses Redis when available, falls back to in-memory store.
 */

import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  IdempotencyManager,
  IdempotencyStatus,
  IdempotencyStore,
  InMemoryIdempotencyStore,
  RedisIdempotencyStore,
} from '../utils/idempotency.util';
import { RedisService } from './redis.service';

@Injectable()
export class IdempotencyService implements OnApplicationBootstrap {
  private readonly logger = new Logger(IdempotencyService.name);
  private manager!: IdempotencyManager;

  constructor(
    private readonly configService: ConfigService,
    private readonly redisService: RedisService,
  ) {}

  // RedisService connects during module init; the store is picked once that has settled.
  onApplicationBootstrap() {
    const ttlMs = this.configService.get<number>('idempotency.ttlMs', 86400000);
    const client = this.redisService.getClient();
    let store: IdempotencyStore;

    if (this.redisService.isAvailable && client) {
      store = new RedisIdempotencyStore(client);
      this.logger.log('Using Redis-based idempotency store');
    } else {
      store = new InMemoryIdempotencyStore();
      this.logger.warn('Using in-memory idempotency store (keys are not shared across instances)');
    }

    this.manager = new IdempotencyManager(store, ttlMs);
  }

  async checkAndLock(productId: number, clientKey: string): Promise<IdempotencyStatus> {
    return this.manager.checkAndLock(this.manager.generateKey(productId, clientKey));
  }

  async getResult(productId: number, clientKey: string): Promise<unknown> {
    return this.manager.getResult(this.manager.generateKey(productId, clientKey));
  }

  async markCompleted(productId: number, clientKey: string, result?: unknown): Promise<void> {
    await this.manager.markCompleted(this.manager.generateKey(productId, clientKey), result);
  }

  async release(productId: number, clientKey: string): Promise<void> {
    await this.manager.release(this.manager.generateKey(productId, clientKey));
  }

  isProcessed(status: IdempotencyStatus): boolean {
    return status === IdempotencyStatus.COMPLETED;
  }

  isProcessing(status: IdempotencyStatus): boolean {
    return status === IdempotencyStatus.PROCESSING;
  }
}
