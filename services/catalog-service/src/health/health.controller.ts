/**
 * Health check endpoints for monitoring and orchestration.
 */

import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { RedisService } from '../common/services/redis.service';
import { CatalogService } from '../catalog/catalog.service';
import { StatsReconciliationService } from '../aggregation/stats-reconciliation.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly database: DatabaseService,
    private readonly redisService: RedisService,
    private readonly catalogService: CatalogService,
    private readonly reconciliation: StatsReconciliationService,
  ) {}

  @Get()
  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'catalog-service',
      version: '1.0.0',
    };
  }

  @Get('ready')
  readiness() {
    const database = this.database.isHealthy();
    const body = {
      status: database ? 'ready' : 'unavailable',
      timestamp: new Date().toISOString(),
      database: database ? 'up' : 'down',
      redis: this.redisService.isAvailable ? 'connected' : 'disconnected',
    };

    if (!database) {
      throw new ServiceUnavailableException({ message: 'Database is not reachable', ...body });
    }
    return body;
  }

  @Get('live')
  liveness() {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
    };
  }

  @Get('metrics')
  metrics(): Record<string, unknown> {
    return {
      timestamp: new Date().toISOString(),
      catalog: this.catalogService.getMetrics(),
      reconciliation: this.reconciliation.getLastReport(),
      redis: {
        available: this.redisService.isAvailable,
      },
    };
  }
}
