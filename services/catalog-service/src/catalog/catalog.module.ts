import { Module } from '@nestjs/common';
import { ProductsModule } from '../products/products.module';
import { ReviewsModule } from '../reviews/reviews.module';
import { AggregationModule } from '../aggregation/aggregation.module';
import { CatalogService } from './catalog.service';
import { CatalogSeedService } from './catalog-seed.service';
import { ProductsController } from './products.controller';
import { ReviewsController } from './reviews.controller';
import { ReviewSubmittedListener } from './review-submitted.listener';

@Module({
  imports: [ProductsModule, ReviewsModule, AggregationModule],
  controllers: [ProductsController, ReviewsController],
  providers: [CatalogService, CatalogSeedService, ReviewSubmittedListener],
  exports: [CatalogService, CatalogSeedService],
})
export class CatalogModule {}
