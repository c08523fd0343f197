import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { CatalogModule } from '../catalog/catalog.module';
import { AggregationModule } from '../aggregation/aggregation.module';

@Module({
  imports: [CatalogModule, AggregationModule],
  controllers: [HealthController],
})
export class HealthModule {}
