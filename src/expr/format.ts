import type { BinaryOperator, Expression, Lambda, Scalar } from './types.js';

const OPERATOR_SYMBOLS: Record<BinaryOperator, string> = {
  and: '&&',
  or: '||',
  eq: '==',
  ge: '>=',
  le: '<=',
};

function formatConstant(value: Scalar): string {
  if (value instanceof Date) return `Date(${value.toISOString()})`;
  return JSON.stringify(value);
}

export function formatExpression(node: Expression): string {
  switch (node.kind) {
    case 'parameter':
      return node.name;
    case 'constant':
      return formatConstant(node.value);
    case 'member':
      return `${formatExpression(node.object)}.${node.member}`;
    case 'binary':
      return `(${formatExpression(node.left)} ${OPERATOR_SYMBOLS[node.operator]} ${formatExpression(node.right)})`;
    case 'call':
      return `${formatExpression(node.target)}.${node.method.name}(${node.args.map(formatExpression).join(', ')})`;
  }
}

/** Renders a lambda as `x => body`, for error messages and debugging. */
export function formatLambda<T, R>(source: Lambda<T, R>): string {
  return `${source.parameter.name} => ${formatExpression(source.body)}`;
}
