import type { Lambda, Orderable, Predicate } from '../expr/types.js';
import type { Queryable } from '../queryable/types.js';
import { combine } from './combine.js';
import { between } from './range.js';
import { anyPropertyContainsText } from './text.js';

/** Keeps entities matching at least one of the predicates. */
export function whereOrConditions<T>(source: Queryable<T>, ...predicates: Predicate<T>[]): Queryable<T> {
  return source.where(combine('or', predicates));
}

/** Keeps entities matching every predicate. */
export function whereAndConditions<T>(source: Queryable<T>, ...predicates: Predicate<T>[]): Queryable<T> {
  return source.where(combine('and', predicates));
}

/**
 * Keeps entities whose selected value lies in `[lower, upper]`. Strings are
 * ordered by code point on every backend, so `'Z' < 'a'`.
 */
export function whereBetween<T, V extends Orderable>(
  source: Queryable<T>,
  selector: Lambda<T, V>,
  lower: V,
  upper: V,
): Queryable<T> {
  return source.where(between(selector, lower, upper));
}

/** Keeps entities whose selected date lies in `[start, end]`. */
export function whereDateTimeBetween<T>(
  source: Queryable<T>,
  selector: Lambda<T, Date>,
  start: Date,
  end: Date,
): Queryable<T> {
  return whereBetween(source, selector, start, end);
}

/** Keeps entities where any selected string field contains `searchText`. */
export function whereAnyPropertyContainsText<T>(
  source: Queryable<T>,
  searchText: string,
  ...selectors: Lambda<T, string>[]
): Queryable<T> {
  return source.where(anyPropertyContainsText(searchText, selectors));
}
