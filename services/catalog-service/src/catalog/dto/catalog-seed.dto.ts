/**
 * Shape of data/catalog-seed.json, validated before anything is inserted.
 */

import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import {
  MAX_COMMENT_LENGTH,
  MAX_REVIEWER_NAME_LENGTH,
  MIN_COMMENT_LENGTH,
} from '../catalog.types';

export class SeedReviewDto {
  @IsString()
  @MaxLength(MAX_REVIEWER_NAME_LENGTH)
  @IsOptional()
  reviewerName?: string;

  @IsString()
  @MinLength(MIN_COMMENT_LENGTH)
  @MaxLength(MAX_COMMENT_LENGTH)
  comment!: string;

  @IsInt()
  @Min(1)
  @Max(5)
  rating!: number;
}

export class SeedProductDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  description!: string;

  @IsString()
  @IsNotEmpty()
  category!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price!: number;

  @IsString()
  @IsOptional()
  imageUrl?: string;

  @IsArray()
  @ArrayMaxSize(500)
  @ValidateNested({ each: true })
  @Type(() => SeedReviewDto)
  @IsOptional()
  reviews?: SeedReviewDto[];
}

export class CatalogSeedDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeedProductDto)
  products!: SeedProductDto[];
}
