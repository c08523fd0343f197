/**
 * Pagination contracts shared by the product and review listings.
 * Pages are zero-based.
 */

export type SortDirection = 'asc' | 'desc';

export interface SortOrder<P extends string> {
  property: P;
  direction: SortDirection;
}

export interface PageRequest<P extends string> {
  page: number;
  size: number;
  sort: SortOrder<P>[];
}

export interface Page<T> {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
  last: boolean;
}
