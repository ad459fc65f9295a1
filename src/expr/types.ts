export type Scalar = string | number | boolean | Date | null;

/** Values with a native ordering usable by `ge` / `le`. */
export type Orderable = string | number | Date;

export type ScalarKind = 'string' | 'number' | 'boolean' | 'date';

export type BinaryOperator = 'and' | 'or' | 'eq' | 'ge' | 'le';

export type LogicalOperator = 'and' | 'or';

export interface MethodRef {
  receiver: ScalarKind;
  name: string;
}

/**
 * A placeholder for the entity a lambda is written against. Identity is the
 * node reference itself; `name` is only used when formatting.
 */
export interface ParameterExpression {
  readonly kind: 'parameter';
  readonly name: string;
}

export interface MemberExpression {
  readonly kind: 'member';
  readonly object: Expression;
  readonly member: string;
}

export interface ConstantExpression {
  readonly kind: 'constant';
  readonly value: Scalar;
}

export interface BinaryExpression {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface CallExpression {
  readonly kind: 'call';
  readonly method: MethodRef;
  readonly target: Expression;
  readonly args: readonly Expression[];
}

export type Expression =
  | ParameterExpression
  | MemberExpression
  | ConstantExpression
  | BinaryExpression
  | CallExpression;

export declare const valueType: unique symbol;
export declare const entityType: unique symbol;

/**
 * An expression tagged with the type of value it produces. The tag exists
 * only at compile time.
 */
export type TypedExpression<V> = Expression & { readonly [valueType]?: V };

export type TypedParameter<T> = ParameterExpression & { readonly [valueType]?: T };

/**
 * A single-placeholder expression: a predicate fragment when `R` is boolean,
 * a field accessor otherwise.
 */
export interface Lambda<T, R> {
  readonly parameter: ParameterExpression;
  readonly body: TypedExpression<R>;
  readonly [entityType]?: (entity: T) => R;
}

export type Predicate<T> = Lambda<T, boolean>;
