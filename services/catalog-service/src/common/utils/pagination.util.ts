/**
 * Helpers for turning query parameters into page requests and building
 * page envelopes from query results.
 */

import { ValidationException } from '../exceptions';
import { Page, PageRequest, SortDirection, SortOrder } from '../interfaces/page.interface';

export interface PagingLimits {
  defaultSize: number;
  maxSize: number;
}

const DIRECTIONS: readonly string[] = ['asc', 'desc'];

function isDirection(token: string): token is SortDirection {
  return DIRECTIONS.includes(token);
}

function isAllowedProperty<P extends string>(value: string, allowed: readonly P[]): value is P {
  const names: readonly string[] = allowed;
  return names.includes(value);
}

/**
 * Parses `property[,property…][,asc|desc]` expressions. One expression may be
 * given per `sort` parameter; the direction applies to every property before it.
 */
export function parseSort<P extends string>(
  raw: string | string[] | undefined,
  allowed: readonly P[],
  fallback: SortOrder<P>[],
): SortOrder<P>[] {
  const expressions = (Array.isArray(raw) ? raw : raw === undefined ? [] : [raw])
    .map((expression) => expression.trim())
    .filter((expression) => expression.length > 0);

  const orders: SortOrder<P>[] = [];

  for (const expression of expressions) {
    const tokens = expression
      .split(',')
      .map((token) => token.trim())
      .filter((token) => token.length > 0);

    const lastToken = tokens[tokens.length - 1]?.toLowerCase();
    let direction: SortDirection = 'asc';
    if (lastToken !== undefined && isDirection(lastToken)) {
      direction = lastToken;
      tokens.pop();
    }

    for (const property of tokens) {
      if (!isAllowedProperty(property, allowed)) {
        throw new ValidationException(
          `Unsupported sort property '${property}'; expected one of ${allowed.join(', ')}`,
          'sort',
        );
      }
      orders.push({ property, direction });
    }
  }

  return orders.length > 0 ? orders : fallback;
}

/** Applies defaults; sizes above the maximum are capped rather than rejected. */
export function resolvePaging(
  page: number | undefined,
  size: number | undefined,
  limits: PagingLimits,
): { page: number; size: number } {
  const resolvedPage = page ?? 0;
  const resolvedSize = size ?? limits.defaultSize;

  if (!Number.isInteger(resolvedPage) || resolvedPage < 0) {
    throw new ValidationException('page must be a non-negative integer', 'page');
  }
  if (!Number.isInteger(resolvedSize) || resolvedSize < 1) {
    throw new ValidationException('size must be a positive integer', 'size');
  }

  return { page: resolvedPage, size: Math.min(resolvedSize, limits.maxSize) };
}

export function buildPage<T>(
  content: T[],
  request: Pick<PageRequest<string>, 'page' | 'size'>,
  totalElements: number,
): Page<T> {
  const totalPages = Math.ceil(totalElements / request.size);
  return {
    content,
    page: request.page,
    size: request.size,
    totalElements,
    totalPages,
    last: request.page + 1 >= totalPages,
  };
}

export function mapPage<T, R>(page: Page<T>, mapper: (item: T) => R): Page<R> {
  return { ...page, content: page.content.map(mapper) };
}
