import type { Expression, Lambda, ParameterExpression, TypedExpression } from './types.js';

/**
 * Per-kind hook for `transform`. Returning `undefined` lets the walk rebuild
 * the node from its (transformed) children.
 */
export interface ExpressionVisitor {
  parameter?(node: ParameterExpression): Expression | undefined;
}

/**
 * Walks the whole tree bottom-up. A node whose children all come back
 * unchanged is returned as the same reference, so untouched subtrees are
 * shared with the input instead of copied.
 */
export function transform(node: Expression, visitor: ExpressionVisitor): Expression {
  switch (node.kind) {
    case 'parameter':
      return visitor.parameter?.(node) ?? node;

    case 'constant':
      return node;

    case 'member': {
      const object = transform(node.object, visitor);
      return object === node.object ? node : { ...node, object };
    }

    case 'binary': {
      const left = transform(node.left, visitor);
      const right = transform(node.right, visitor);
      return left === node.left && right === node.right ? node : { ...node, left, right };
    }

    case 'call': {
      const target = transform(node.target, visitor);
      const args = node.args.map((arg) => transform(arg, visitor));
      const unchanged = target === node.target && args.every((arg, i) => arg === node.args[i]);
      return unchanged ? node : { ...node, target, args };
    }
  }
}

/**
 * Replaces every reference to `oldParameter` with `newParameter`. Parameters
 * are matched by identity, not by name.
 */
export function unify<V>(
  expression: TypedExpression<V>,
  oldParameter: ParameterExpression,
  newParameter: ParameterExpression,
): TypedExpression<V> {
  if (oldParameter === newParameter) return expression;
  return transform(expression, {
    parameter: (node) => (node === oldParameter ? newParameter : undefined),
  });
}

/** Moves a lambda onto another placeholder. */
export function rebind<T, R>(source: Lambda<T, R>, parameter: ParameterExpression): Lambda<T, R> {
  return { parameter, body: unify(source.body, source.parameter, parameter) };
}
