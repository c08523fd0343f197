export type StarValue = 1 | 2 | 3 | 4 | 5;

export const STAR_VALUES: readonly StarValue[] = [1, 2, 3, 4, 5];

/** Review count per star; always carries all five keys. */
export type RatingBreakdown = Record<StarValue, number>;

export interface ProductStats {
  reviewCount: number;
  averageRating: number;
}

export function isStarValue(value: number): value is StarValue {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}

export function emptyBreakdown(): RatingBreakdown {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
}
