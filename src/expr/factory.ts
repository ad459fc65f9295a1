import type {
  BinaryExpression,
  BinaryOperator,
  Expression,
  Lambda,
  MethodRef,
  Orderable,
  Scalar,
  TypedExpression,
  TypedParameter,
} from './types.js';

export const STRING_CONTAINS: MethodRef = { receiver: 'string', name: 'contains' };

export function isExpression(value: Expression | Scalar): value is Expression {
  return value !== null && typeof value === 'object' && !(value instanceof Date);
}

function lift<V extends Scalar>(value: TypedExpression<V> | V): TypedExpression<V> {
  if (isExpression(value)) return value;
  return constant(value);
}

function binary(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpression {
  return { kind: 'binary', operator, left, right };
}

export function param<T>(name: string): TypedParameter<T> {
  return { kind: 'parameter', name };
}

export function member<T, K extends keyof T & string>(
  target: TypedExpression<T>,
  key: K,
): TypedExpression<T[K]> {
  return { kind: 'member', object: target, member: key };
}

/**
 * Member access along a path, following navigations that may be absent.
 *
 * @example
 * prop(o, 'customer', 'firstName') // o.customer.firstName
 */
export function prop<T, K1 extends keyof T & string>(
  target: TypedExpression<T>,
  k1: K1,
): TypedExpression<T[K1]>;
export function prop<
  T,
  K1 extends keyof T & string,
  K2 extends keyof NonNullable<T[K1]> & string,
>(target: TypedExpression<T>, k1: K1, k2: K2): TypedExpression<NonNullable<T[K1]>[K2]>;
export function prop<
  T,
  K1 extends keyof T & string,
  K2 extends keyof NonNullable<T[K1]> & string,
  K3 extends keyof NonNullable<NonNullable<T[K1]>[K2]> & string,
>(
  target: TypedExpression<T>,
  k1: K1,
  k2: K2,
  k3: K3,
): TypedExpression<NonNullable<NonNullable<T[K1]>[K2]>[K3]>;
export function prop(target: Expression, ...keys: string[]): Expression {
  return keys.reduce<Expression>((object, key) => ({ kind: 'member', object, member: key }), target);
}

export function constant<V extends Scalar>(value: V): TypedExpression<V> {
  return { kind: 'constant', value };
}

export function eq<V extends Scalar>(
  left: TypedExpression<V>,
  right: TypedExpression<V> | V,
): TypedExpression<boolean> {
  return binary('eq', left, lift(right));
}

export function ge<V extends Orderable>(
  left: TypedExpression<V>,
  right: TypedExpression<V> | V,
): TypedExpression<boolean> {
  return binary('ge', left, lift(right));
}

export function le<V extends Orderable>(
  left: TypedExpression<V>,
  right: TypedExpression<V> | V,
): TypedExpression<boolean> {
  return binary('le', left, lift(right));
}

export function and(
  left: TypedExpression<boolean>,
  right: TypedExpression<boolean>,
): TypedExpression<boolean> {
  return binary('and', left, right);
}

export function or(
  left: TypedExpression<boolean>,
  right: TypedExpression<boolean>,
): TypedExpression<boolean> {
  return binary('or', left, right);
}

export function call<R>(
  method: MethodRef,
  target: Expression,
  args: readonly Expression[],
): TypedExpression<R> {
  return { kind: 'call', method, target, args };
}

export function contains(
  target: TypedExpression<string>,
  value: TypedExpression<string> | string,
): TypedExpression<boolean> {
  return call<boolean>(STRING_CONTAINS, target, [lift(value)]);
}

/**
 * Builds a single-placeholder lambda. The callback receives the placeholder
 * and returns the body; it runs once, at build time.
 *
 * @example
 * lambda<Order, boolean>('o', (o) => eq(prop(o, 'productName'), 'Onion'))
 */
export function lambda<T, R>(
  name: string,
  build: (parameter: TypedParameter<T>) => TypedExpression<R>,
): Lambda<T, R> {
  const parameter = param<T>(name);
  return { parameter, body: build(parameter) };
}
