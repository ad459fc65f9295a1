import { MaterializationError } from '../errors.js';
import type { EntityModel } from './model.js';

/**
 * One entity's worth of a result row, keyed by property name. Related
 * entities that were included appear under their navigation name; `null`
 * there means the join found no match.
 */
export class EntityRecord {
  constructor(
    readonly table: string,
    private readonly values: ReadonlyMap<string, unknown>,
    private readonly related: ReadonlyMap<string, EntityRecord | null> = new Map(),
  ) {}

  value(property: string): unknown {
    if (!this.values.has(property)) {
      throw new MaterializationError(`${this.table}: no column selected for "${property}"`);
    }
    return this.values.get(property);
  }

  string(property: string): string {
    const value = this.value(property);
    if (typeof value !== 'string') {
      throw new MaterializationError(`${this.table}.${property}: expected a string, got ${typeof value}`);
    }
    return value;
  }

  number(property: string): number {
    const value = this.value(property);
    // pg returns BIGINT and NUMERIC as strings
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof n !== 'number' || Number.isNaN(n)) {
      throw new MaterializationError(`${this.table}.${property}: expected a number, got ${String(value)}`);
    }
    return n;
  }

  date(property: string): Date {
    const value = this.value(property);
    if (!(value instanceof Date)) {
      throw new MaterializationError(`${this.table}.${property}: expected a Date, got ${typeof value}`);
    }
    return value;
  }

  /** The related entity, or `undefined` when it was not included or not found. */
  navigation<U>(property: string, model: EntityModel<U>): U | undefined {
    const record = this.related.get(property);
    return record === undefined || record === null ? undefined : model.map(record);
  }
}

export interface SelectedEntity {
  readonly alias: string;
  readonly model: EntityModel<unknown>;
}

export interface ResultShape {
  readonly root: SelectedEntity;
  readonly includes: readonly (SelectedEntity & { readonly navigation: string })[];
}

export function columnAlias(alias: string, property: string): string {
  return `${alias}.${property}`;
}

function readEntity(row: Record<string, unknown>, selected: SelectedEntity): Map<string, unknown> {
  const values = new Map<string, unknown>();
  for (const property of Object.keys(selected.model.columns)) {
    values.set(property, row[columnAlias(selected.alias, property)]);
  }
  return values;
}

export function mapRow<T>(row: Record<string, unknown>, model: EntityModel<T>, shape: ResultShape): T {
  const related = new Map<string, EntityRecord | null>();
  for (const include of shape.includes) {
    const values = readEntity(row, include);
    const missing = [...values.values()].every((value) => value === null || value === undefined);
    related.set(include.navigation, missing ? null : new EntityRecord(include.model.table, values));
  }
  return model.map(new EntityRecord(model.table, readEntity(row, shape.root), related));
}
