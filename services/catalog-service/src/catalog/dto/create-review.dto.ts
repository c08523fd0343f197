import { IsInt, IsOptional, IsString, Max, MaxLength, Min, MinLength } from 'class-validator';
import {
  MAX_COMMENT_LENGTH,
  MAX_REVIEWER_NAME_LENGTH,
  MIN_COMMENT_LENGTH,
} from '../catalog.types';

export class CreateReviewDto {
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
