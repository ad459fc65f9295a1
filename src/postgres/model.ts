import type { EntityRecord } from './row-mapper.js';

/** A to-one relation, joined through a foreign key column on the owning table. */
export interface NavigationModel {
  readonly target: EntityModel<unknown>;
  readonly foreignKey: string;
}

/**
 * Maps an entity type onto a table. `columns` and `navigations` are keyed by
 * property name; `map` builds the entity from a materialised row.
 */
export interface EntityModel<T> {
  readonly table: string;
  readonly primaryKey: string;
  readonly columns: Readonly<Record<string, string>>;
  readonly navigations?: Readonly<Record<string, NavigationModel>>;
  map(record: EntityRecord): T;
}

export function findNavigation(model: EntityModel<unknown>, property: string): NavigationModel | undefined {
  const navigations = model.navigations;
  return navigations !== undefined && Object.hasOwn(navigations, property) ? navigations[property] : undefined;
}

export function findColumn(model: EntityModel<unknown>, property: string): string | undefined {
  return Object.hasOwn(model.columns, property) ? model.columns[property] : undefined;
}
