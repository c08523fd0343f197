/**
 * Product browsing and review submission endpoints.
 */

import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { Page } from '../common/interfaces/page.interface';
import { CatalogService } from './catalog.service';
import { ProductDetail, ProductSummary, ReviewView } from './catalog.types';
import { ListProductsQueryDto, ListReviewsQueryDto } from './dto/catalog-query.dto';
import { CreateReviewDto } from './dto/create-review.dto';

export const IDEMPOTENCY_HEADER = 'idempotency-key';

@Controller('products')
export class ProductsController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get()
  listProducts(@Query() query: ListProductsQueryDto): Promise<Page<ProductSummary>> {
    return this.catalogService.listProducts(query);
  }

  @Get(':id')
  getProduct(@Param('id', ParseIntPipe) id: number): Promise<ProductDetail> {
    return this.catalogService.getProduct(id);
  }

  @Get(':id/reviews')
  listReviews(
    @Param('id', ParseIntPipe) id: number,
    @Query() query: ListReviewsQueryDto,
  ): Promise<Page<ReviewView>> {
    return this.catalogService.listReviews(id, query);
  }

  @Post(':id/reviews')
  @HttpCode(HttpStatus.CREATED)
  submitReview(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: CreateReviewDto,
    @Headers(IDEMPOTENCY_HEADER) idempotencyKey?: string,
  ): Promise<ReviewView> {
    return this.catalogService.submitReview(id, body, idempotencyKey);
  }
}
