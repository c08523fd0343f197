/**
 * Loads the starter catalog into an empty database at startup.
 */

import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { DatabaseService } from '../database/database.service';
import { ProductRepository } from '../products/product.repository';
import { ReviewRepository } from '../reviews/review.repository';
import { RatingAggregationService } from '../aggregation/rating-aggregation.service';
import { ConfigurationException } from '../common/exceptions';
import { ANONYMOUS_REVIEWER } from './catalog.types';
import { CatalogSeedDto } from './dto/catalog-seed.dto';

export const DEFAULT_SEED_FILE = path.resolve(__dirname, '..', '..', 'data', 'catalog-seed.json');

export interface SeedResult {
  products: number;
  reviews: number;
}

export function loadSeed(file: string): CatalogSeedDto {
  if (!existsSync(file)) {
    throw new ConfigurationException(`Seed file not found at ${file}`, 'database.seedFile');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationException(
      `Seed file ${file} is not valid JSON: ${error instanceof Error ? error.message : error}`,
      'database.seedFile',
    );
  }

  const seed = plainToInstance(CatalogSeedDto, raw);
  const errors = validateSync(seed, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new ConfigurationException(
      `Seed file ${file} is invalid: ${errors.map((error) => error.toString()).join('; ')}`,
      'database.seedFile',
    );
  }
  return seed;
}

@Injectable()
export class CatalogSeedService implements OnApplicationBootstrap {
  private readonly logger = new Logger(CatalogSeedService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly database: DatabaseService,
    private readonly productRepository: ProductRepository,
    private readonly reviewRepository: ReviewRepository,
    private readonly aggregation: RatingAggregationService,
  ) {}

  onApplicationBootstrap() {
    if (!this.configService.get<boolean>('database.seedOnStartup', true)) {
      return;
    }
    this.seedIfEmpty(DEFAULT_SEED_FILE);
  }

  /** Seeds only a catalog with no products; returns null when it was skipped. */
  seedIfEmpty(file: string): SeedResult | null {
    if (this.productRepository.count() > 0) {
      this.logger.log('Catalog already has products, skipping seed');
      return null;
    }
    return this.seed(loadSeed(file));
  }

  /** Inserts everything in one transaction; stats are computed from the inserted reviews. */
  seed(data: CatalogSeedDto): SeedResult {
    const result = this.database.transaction('seedCatalog', (tx) => {
      let reviewTotal = 0;

      for (const entry of data.products) {
        const product = this.productRepository.insert(
          {
            name: entry.name,
            description: entry.description,
            category: entry.category,
            price: entry.price,
            imageUrl: entry.imageUrl ?? null,
          },
          tx,
        );

        for (const review of entry.reviews ?? []) {
          this.reviewRepository.save(
            {
              productId: product.id,
              reviewerName: review.reviewerName?.trim() || ANONYMOUS_REVIEWER,
              comment: review.comment,
              rating: review.rating,
            },
            tx,
          );
          reviewTotal++;
        }

        this.aggregation.recomputeStats(product.id, tx);
      }

      return { products: data.products.length, reviews: reviewTotal };
    });

    this.logger.log(`Seeded ${result.products} products with ${result.reviews} reviews`);
    return result;
  }
}
