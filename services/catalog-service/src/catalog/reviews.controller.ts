import { Controller, Param, ParseIntPipe, Put } from '@nestjs/common';
import { CatalogService } from './catalog.service';
import { ReviewView } from './catalog.types';

@Controller('reviews')
export class ReviewsController {
  constructor(private readonly catalogService: CatalogService) {}

  @Put(':id/helpful')
  markHelpful(@Param('id', ParseIntPipe) id: number): Promise<ReviewView> {
    return this.catalogService.markHelpful(id);
  }
}
