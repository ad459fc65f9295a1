import { compilePredicate } from '../expr/evaluate.js';
import { defaultMethods } from '../expr/methods.js';
import type { MethodTable } from '../expr/methods.js';
import type { Predicate } from '../expr/types.js';
import type { NavigationKey, Queryable } from './types.js';

export interface InMemoryQueryableOptions {
  methods?: MethodTable;
}

/**
 * Queryable over an array. Predicates are compiled when attached, so an
 * unsupported method fails at `where()` rather than while iterating.
 * Related entities are already part of the object graph, so `include` only
 * records the navigation.
 */
export class InMemoryQueryable<T> implements Queryable<T> {
  private readonly methods: MethodTable;

  constructor(
    private readonly items: readonly T[],
    options: InMemoryQueryableOptions = {},
    private readonly filters: readonly ((entity: T) => boolean)[] = [],
    readonly includes: readonly NavigationKey<T>[] = [],
  ) {
    this.methods = options.methods ?? defaultMethods;
  }

  where(predicate: Predicate<T>): InMemoryQueryable<T> {
    const test = compilePredicate(predicate, this.methods);
    return new InMemoryQueryable(this.items, { methods: this.methods }, [...this.filters, test], this.includes);
  }

  include(navigation: NavigationKey<T>): InMemoryQueryable<T> {
    return new InMemoryQueryable(this.items, { methods: this.methods }, this.filters, [
      ...this.includes,
      navigation,
    ]);
  }

  async toList(): Promise<T[]> {
    return this.items.filter((item) => this.filters.every((test) => test(item)));
  }
}
