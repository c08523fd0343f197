/**
 * Redis connection used for shared idempotency keys.
 * Left disconnected when no REDIS_URL is configured.
 */

import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private isConnected = false;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit() {
    const redisUrl = this.configService.get<string>('redis.url');

    if (!redisUrl) {
      this.logger.log('REDIS_URL not set, Redis disabled');
      return;
    }

    const client = new Redis(redisUrl, {
      lazyConnect: true,
      maxRetriesPerRequest: 2,
      retryStrategy: (times) => {
        if (times > 3) {
          this.logger.warn('Redis connection failed, using in-memory fallback');
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });

    client.on('ready', () => {
      this.isConnected = true;
      this.logger.log('Connected to Redis');
    });

    client.on('error', (error: Error) => {
      this.logger.error(`Redis error: ${error.message}`);
      this.isConnected = false;
    });

    client.on('close', () => {
      this.isConnected = false;
      this.logger.warn('Redis connection closed');
    });

    try {
      await client.connect();
      await client.ping();
      this.client = client;
      this.isConnected = true;
    } catch (error) {
      this.logger.warn(
        `Failed to connect to Redis: ${error instanceof Error ? error.message : error}. Using in-memory fallback.`,
      );
      client.disconnect();
    }
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  get isAvailable(): boolean {
    return this.isConnected && this.client !== null;
  }

  getClient(): Redis | null {
    return this.client;
  }
}
