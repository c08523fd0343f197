import { asc, desc, SQL } from 'drizzle-orm';
import { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import { SortOrder } from '../common/interfaces/page.interface';

/**
 * Translates sort orders into ORDER BY terms. The primary key is appended as a
 * tie-breaker in the first order's direction so page boundaries stay stable.
 */
export function toOrderBy<P extends string>(
  sort: SortOrder<P>[],
  columns: Record<P, AnySQLiteColumn>,
  tieBreaker: AnySQLiteColumn,
): SQL[] {
  const terms = sort.map(({ property, direction }) =>
    direction === 'desc' ? desc(columns[property]) : asc(columns[property]),
  );

  if (!sort.some(({ property }) => columns[property] === tieBreaker)) {
    terms.push(sort[0]?.direction === 'desc' ? desc(tieBreaker) : asc(tieBreaker));
  }

  return terms;
}
