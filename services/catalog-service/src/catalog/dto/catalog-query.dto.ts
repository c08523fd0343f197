/**
 * Query-string DTOs for the listing endpoints.
 */

import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export class PageQueryDto {
  @IsInt()
  @Min(0)
  @IsOptional()
  page?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  size?: number;

  /** `property[,asc|desc]`; repeat the parameter for secondary orders. */
  @Type(() => String)
  @IsString({ each: true })
  @IsOptional()
  sort?: string | string[];
}

export class ListProductsQueryDto extends PageQueryDto {
  @IsString()
  @MaxLength(100)
  @IsOptional()
  category?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  search?: string;
}

export class ListReviewsQueryDto extends PageQueryDto {
  @IsInt()
  @Min(1)
  @Max(5)
  @IsOptional()
  rating?: number;
}
