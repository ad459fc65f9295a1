import pg from 'pg';
import { QueryExecutionError } from '../errors.js';
import type { Predicate } from '../expr/types.js';
import type { NavigationKey, Queryable } from '../queryable/types.js';
import { assertTranslatable, compileSelectQuery } from './compiler.js';
import type { CompiledQuery, CompiledSelect } from './compiler.js';
import type { EntityModel } from './model.js';
import { mapRow } from './row-mapper.js';

export interface DataContextConfig {
  pool: pg.Pool;
  /** Called with every statement right before it is sent. */
  onQuery?: (query: CompiledQuery) => void;
}

/**
 * Entry point for PostgreSQL-backed queryables. Owns the pool.
 *
 * @example
 * const db = new PostgresDataContext({ pool });
 * const orders = await db.set(orderModel).include('customer').toList();
 */
export class PostgresDataContext {
  private readonly pool: pg.Pool;
  private readonly onQuery: ((query: CompiledQuery) => void) | undefined;

  constructor(config: DataContextConfig) {
    this.pool = config.pool;
    this.onQuery = config.onQuery;
  }

  set<T>(model: EntityModel<T>): PostgresQueryable<T> {
    return new PostgresQueryable(this, model);
  }

  async execute(query: CompiledQuery): Promise<Record<string, unknown>[]> {
    this.onQuery?.(query);
    let result: pg.QueryResult<Record<string, unknown>>;
    try {
      result = await this.pool.query<Record<string, unknown>>(query.sql, query.params);
    } catch (err) {
      throw new QueryExecutionError(`Failed to execute query: ${String(err)}`, err);
    }
    return result.rows;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Immutable query over one entity model. `where` checks up front that every
 * method in the predicate can be rendered; SQL is generated on `toList()`.
 */
export class PostgresQueryable<T> implements Queryable<T> {
  constructor(
    private readonly context: PostgresDataContext,
    private readonly model: EntityModel<T>,
    private readonly filters: readonly Predicate<T>[] = [],
    private readonly includes: readonly string[] = [],
  ) {}

  where(predicate: Predicate<T>): PostgresQueryable<T> {
    assertTranslatable(predicate.body);
    return new PostgresQueryable(this.context, this.model, [...this.filters, predicate], this.includes);
  }

  include(navigation: NavigationKey<T>): PostgresQueryable<T> {
    if (this.includes.includes(navigation)) return this;
    return new PostgresQueryable(this.context, this.model, this.filters, [...this.includes, navigation]);
  }

  /** The statement `toList()` would run. */
  toQuery(): CompiledSelect {
    return compileSelectQuery(this.model, { filters: this.filters, includes: this.includes });
  }

  async toList(): Promise<T[]> {
    const compiled = this.toQuery();
    const rows = await this.context.execute(compiled);
    return rows.map((row) => mapRow(row, this.model, compiled.shape));
  }
}
