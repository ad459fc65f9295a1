import { CapabilityMissingError, TranslationError } from '../errors.js';
import { formatExpression } from '../expr/format.js';
import { methodKey } from '../expr/methods.js';
import type { CallExpression, Expression, ParameterExpression, Predicate } from '../expr/types.js';
import { findColumn, findNavigation } from './model.js';
import type { EntityModel, NavigationModel } from './model.js';
import { columnAlias } from './row-mapper.js';
import type { ResultShape, SelectedEntity } from './row-mapper.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export interface CompiledSelect extends CompiledQuery {
  shape: ResultShape;
}

export interface SqlMethod {
  readonly arity: number;
  render(target: string, args: readonly string[]): string;
}

export const postgresMethods: ReadonlyMap<string, SqlMethod> = new Map<string, SqlMethod>([
  [
    'string.contains',
    {
      arity: 1,
      // strpos is exact and case-sensitive, and needs no LIKE escaping
      render: (target, args) => `(strpos(${target}, ${args.join(', ')}) > 0)`,
    },
  ],
]);

export interface SelectStages<T> {
  filters: readonly Predicate<T>[];
  includes: readonly string[];
}

interface Join extends SelectedEntity {
  readonly ownerAlias: string;
  readonly navigation: NavigationModel;
}

/**
 * Join aliases are allocated per navigation path, so a filter and an include
 * that go through the same navigation share one join.
 */
interface Scope {
  readonly root: SelectedEntity;
  readonly joins: Map<string, Join>;
}

interface Context {
  scope: Scope;
  parameter: ParameterExpression;
  params: unknown[];
  counter: { n: number };
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function ensureJoin(scope: Scope, owner: SelectedEntity, path: string, property: string): Join {
  const existing = scope.joins.get(path);
  if (existing !== undefined) return existing;

  const navigation = findNavigation(owner.model, property);
  if (navigation === undefined) {
    throw new TranslationError(`"${property}" is not a navigation of ${owner.model.table}`);
  }
  const join: Join = {
    alias: `t${scope.joins.size + 1}`,
    model: navigation.target,
    ownerAlias: owner.alias,
    navigation,
  };
  scope.joins.set(path, join);
  return join;
}

/** Flattens `x.a.b.c` into `['a', 'b', 'c']`, checking it starts at the bound placeholder. */
function memberPath(node: Expression, parameter: ParameterExpression): string[] {
  const path: string[] = [];
  let current = node;
  while (current.kind === 'member') {
    path.unshift(current.member);
    current = current.object;
  }
  if (current !== parameter) {
    throw new TranslationError(`Cannot translate member access on ${formatExpression(current)}`);
  }
  return path;
}

function compileMember(node: Expression, ctx: Context): string {
  const path = memberPath(node, ctx.parameter);
  let owner: SelectedEntity = ctx.scope.root;
  let prefix = '';
  for (const [i, property] of path.entries()) {
    prefix = prefix === '' ? property : `${prefix}.${property}`;
    if (i < path.length - 1) {
      owner = ensureJoin(ctx.scope, owner, prefix, property);
      continue;
    }
    const column = findColumn(owner.model, property);
    if (column === undefined) {
      const reason = findNavigation(owner.model, property) !== undefined
        ? 'is a navigation and cannot be compared'
        : 'is not mapped';
      throw new TranslationError(`${owner.model.table}.${property} ${reason}`);
    }
    return `${owner.alias}.${quoteIdent(column)}`;
  }
  throw new TranslationError(`Cannot translate the entity itself: ${formatExpression(node)}`);
}

function isNullConstant(node: Expression): boolean {
  return node.kind === 'constant' && node.value === null;
}

function isStringConstant(node: Expression): boolean {
  return node.kind === 'constant' && typeof node.value === 'string';
}

function resolveSqlMethod(node: CallExpression): SqlMethod {
  const method = postgresMethods.get(methodKey(node.method));
  if (method === undefined) {
    throw new CapabilityMissingError(node.method.receiver, node.method.name);
  }
  if (node.args.length !== method.arity) {
    throw new TranslationError(
      `${node.method.receiver}.${node.method.name} takes ${method.arity} argument(s), got ${node.args.length}`,
    );
  }
  return method;
}

/**
 * String ordering uses the "C" collation, i.e. code point order, so ranges
 * select the same rows as the in-memory evaluator whatever the column
 * collation is.
 */
function compileOrdering(node: Expression, other: Expression, ctx: Context): string {
  const sql = compileExpression(node, ctx);
  return node.kind === 'member' && isStringConstant(other) ? `${sql} COLLATE "C"` : sql;
}

function compileExpression(node: Expression, ctx: Context): string {
  switch (node.kind) {
    case 'parameter':
    case 'member':
      return compileMember(node, ctx);

    case 'constant': {
      if (node.value === true) return 'TRUE';
      if (node.value === false) return 'FALSE';
      if (node.value === null) return 'NULL';
      ctx.params.push(node.value);
      ctx.counter.n += 1;
      return `$${ctx.counter.n}`;
    }

    case 'call': {
      const method = resolveSqlMethod(node);
      const target = compileExpression(node.target, ctx);
      const args = node.args.map((arg) => compileExpression(arg, ctx));
      return method.render(target, args);
    }

    case 'binary': {
      if (node.operator === 'eq' && (isNullConstant(node.left) || isNullConstant(node.right))) {
        const operand = isNullConstant(node.left) ? node.right : node.left;
        return `(${compileExpression(operand, ctx)} IS NULL)`;
      }
      if (node.operator === 'ge' || node.operator === 'le') {
        const left = compileOrdering(node.left, node.right, ctx);
        const right = compileOrdering(node.right, node.left, ctx);
        return `(${left} ${node.operator === 'ge' ? '>=' : '<='} ${right})`;
      }
      const left = compileExpression(node.left, ctx);
      const right = compileExpression(node.right, ctx);
      switch (node.operator) {
        case 'and':
          return `(${left} AND ${right})`;
        case 'or':
          return `(${left} OR ${right})`;
        case 'eq':
          return `(${left} = ${right})`;
      }
    }
  }
}

/**
 * Fails fast on methods PostgreSQL cannot render, or calls with the wrong
 * number of arguments, before a query is built.
 */
export function assertTranslatable(node: Expression): void {
  switch (node.kind) {
    case 'parameter':
    case 'constant':
      return;
    case 'member':
      assertTranslatable(node.object);
      return;
    case 'binary':
      assertTranslatable(node.left);
      assertTranslatable(node.right);
      return;
    case 'call':
      resolveSqlMethod(node);
      assertTranslatable(node.target);
      node.args.forEach(assertTranslatable);
      return;
  }
}

function selectList(entity: SelectedEntity): string[] {
  return Object.entries(entity.model.columns).map(
    ([property, column]) => `${entity.alias}.${quoteIdent(column)} AS ${quoteIdent(columnAlias(entity.alias, property))}`,
  );
}

/**
 * Compiles filter stages and includes into one SELECT. Each navigation used
 * becomes a LEFT JOIN; only included navigations add columns. Rows are
 * ordered by primary key.
 */
export function compileSelectQuery<T>(
  model: EntityModel<T>,
  stages: SelectStages<T>,
): CompiledSelect {
  const scope: Scope = { root: { alias: 't0', model }, joins: new Map() };
  const params: unknown[] = [];
  const counter = { n: 0 };

  const conditions = stages.filters.map((filter) =>
    compileExpression(filter.body, { scope, parameter: filter.parameter, params, counter }),
  );

  const includes = stages.includes.map((navigation) => {
    const join = ensureJoin(scope, scope.root, navigation, navigation);
    return { navigation, alias: join.alias, model: join.model };
  });

  const columns = [scope.root, ...includes].flatMap(selectList);
  const joins = [...scope.joins.values()].map(
    (join) =>
      `LEFT JOIN ${quoteIdent(join.model.table)} AS ${join.alias} ` +
      `ON ${join.alias}.${quoteIdent(join.model.primaryKey)} = ${join.ownerAlias}.${quoteIdent(join.navigation.foreignKey)}`,
  );

  const sql = [
    `SELECT ${columns.join(', ')}`,
    `FROM ${quoteIdent(model.table)} AS t0`,
    ...joins,
    ...(conditions.length > 0 ? [`WHERE ${conditions.join(' AND ')}`] : []),
    `ORDER BY t0.${quoteIdent(model.primaryKey)} ASC`,
  ].join('\n');

  return {
    sql,
    params,
    shape: { root: scope.root, includes },
  };
}
