import { InvalidOperatorError } from '../errors.js';
import { and, constant, or, param } from '../expr/factory.js';
import { unify } from '../expr/unify.js';
import type { LogicalOperator, Predicate, TypedExpression } from '../expr/types.js';

type Fold = (left: TypedExpression<boolean>, right: TypedExpression<boolean>) => TypedExpression<boolean>;

/**
 * Resolves the fold step for an operator. Checked on every call, including
 * the zero- and one-fragment shortcuts, so a bad operator never goes unnoticed.
 */
function foldFor(operator: LogicalOperator): Fold {
  switch (operator) {
    case 'and':
      return and;
    case 'or':
      return or;
    default: {
      const unexpected: never = operator;
      throw new InvalidOperatorError(String(unexpected));
    }
  }
}

/**
 * Merges predicate fragments into one predicate over a single placeholder.
 *
 * - no fragments: `x => true`, whatever the operator
 * - one fragment: returned as is
 * - otherwise: every body is moved onto a fresh `x` placeholder and the
 *   bodies are left-folded in order: `((f1 OP f2) OP f3) ...`
 */
export function combine<T>(operator: LogicalOperator, fragments: readonly Predicate<T>[]): Predicate<T> {
  const fold = foldFor(operator);

  const [first, ...rest] = fragments;
  if (first === undefined) {
    return { parameter: param<T>('x'), body: constant(true) };
  }
  if (rest.length === 0) {
    return first;
  }

  const parameter = param<T>('x');
  const body = rest.reduce<TypedExpression<boolean>>(
    (acc, fragment) => fold(acc, unify(fragment.body, fragment.parameter, parameter)),
    unify(first.body, first.parameter, parameter),
  );
  return { parameter, body };
}
