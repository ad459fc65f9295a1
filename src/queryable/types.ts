import type { Predicate } from '../expr/types.js';

/** Property names of `T` that hold a related entity rather than a scalar. */
export type NavigationKey<T> = {
  [K in keyof T & string]: NonNullable<T[K]> extends string | number | boolean | bigint | Date ? never : K;
}[keyof T & string];

/**
 * Lazily evaluated, composable query over a collection of entities. Every
 * operation returns a new handle; nothing runs until `toList()`.
 */
export interface Queryable<T> {
  where(predicate: Predicate<T>): Queryable<T>;
  include(navigation: NavigationKey<T>): Queryable<T>;
  toList(): Promise<T[]>;
}
