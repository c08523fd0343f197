/**
 * Periodic sweep that re-runs the full recompute for every product.
 * Repairs stats changed outside the submit path, such as rows edited by hand
 * or imported without a recompute.
 */

import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ProductRepository } from '../products/product.repository';
import { RatingAggregationService } from './rating-aggregation.service';

export const RECONCILIATION_JOB = 'stats-reconciliation';

export interface ReconciliationReport {
  checked: number;
  corrected: number;
  failed: number;
  durationMs: number;
}

@Injectable()
export class StatsReconciliationService implements OnApplicationBootstrap {
  private readonly logger = new Logger(StatsReconciliationService.name);
  private lastReport: ReconciliationReport | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly productRepository: ProductRepository,
    private readonly aggregation: RatingAggregationService,
  ) {}

  onApplicationBootstrap() {
    if (!this.configService.get<boolean>('reconciliation.enabled', false)) {
      return;
    }

    const intervalMs = this.configService.get<number>('reconciliation.intervalMs', 3600000);
    const handle = setInterval(() => this.runScheduled(), intervalMs);
    this.schedulerRegistry.addInterval(RECONCILIATION_JOB, handle);
    this.logger.log(`Stats reconciliation scheduled every ${intervalMs}ms`);
  }

  reconcileAll(): ReconciliationReport {
    const startTime = Date.now();
    const productIds = this.productRepository.findAllIds();
    let corrected = 0;
    let failed = 0;

    for (const productId of productIds) {
      const before = this.productRepository.findById(productId);
      try {
        const stats = this.aggregation.recomputeStats(productId);
        if (
          before &&
          (before.reviewCount !== stats.reviewCount ||
            before.averageRating !== stats.averageRating)
        ) {
          corrected++;
          this.logger.warn(
            `Corrected stats for product ${productId}: ` +
              `${before.reviewCount}/${before.averageRating} -> ${stats.reviewCount}/${stats.averageRating}`,
          );
        }
      } catch (error) {
        failed++;
        this.logger.error(
          `Reconciliation failed for product ${productId}: ${error instanceof Error ? error.message : error}`,
        );
      }
    }

    const report: ReconciliationReport = {
      checked: productIds.length,
      corrected,
      failed,
      durationMs: Date.now() - startTime,
    };
    this.lastReport = report;
    return report;
  }

  getLastReport(): ReconciliationReport | null {
    return this.lastReport;
  }

  private runScheduled(): void {
    try {
      const report = this.reconcileAll();
      this.logger.log(
        `Reconciled ${report.checked} products (${report.corrected} corrected, ${report.failed} failed) in ${report.durationMs}ms`,
      );
    } catch (error) {
      this.logger.error(
        `Stats reconciliation run failed: ${error instanceof Error ? error.message : error}`,
      );
    }
  }
}
