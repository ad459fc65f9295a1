import { TranslationError } from '../errors.js';
import { defaultMethods, resolveMethod } from './methods.js';
import type { MethodTable } from './methods.js';
import type { Expression, Lambda, ParameterExpression } from './types.js';

type Evaluator = (entity: unknown) => unknown;

function readMember(object: unknown, key: string): unknown {
  if (typeof object !== 'object' || object === null) return undefined;
  return key in object ? Reflect.get(object, key) : undefined;
}

function normalize(value: unknown): unknown {
  if (value === undefined) return null;
  return value instanceof Date ? value.getTime() : value;
}

function isNullConstant(node: Expression): boolean {
  return node.kind === 'constant' && node.value === null;
}

/** Code point order, the same as PostgreSQL's "C" collation. */
function compareStrings(left: string, right: string): number {
  const l = [...left];
  const r = [...right];
  for (let i = 0; i < Math.min(l.length, r.length); i++) {
    const diff = (l[i]?.codePointAt(0) ?? 0) - (r[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return l.length - r.length;
}

function compare(left: unknown, right: unknown): number | null {
  const l = normalize(left);
  const r = normalize(right);
  if (typeof l === 'number' && typeof r === 'number') return l - r;
  if (typeof l === 'string' && typeof r === 'string') return compareStrings(l, r);
  return null;
}

function compileNode(node: Expression, parameter: ParameterExpression, methods: MethodTable): Evaluator {
  switch (node.kind) {
    case 'parameter':
      if (node !== parameter) {
        throw new TranslationError(`Placeholder "${node.name}" is not bound by the enclosing lambda`);
      }
      return (entity) => entity;

    case 'constant': {
      const value = node.value;
      return () => value;
    }

    case 'member': {
      const object = compileNode(node.object, parameter, methods);
      const key = node.member;
      return (entity) => readMember(object(entity), key);
    }

    case 'call': {
      const implementation = resolveMethod(methods, node.method.receiver, node.method.name);
      if (node.args.length !== implementation.arity) {
        throw new TranslationError(
          `${node.method.receiver}.${node.method.name} takes ${implementation.arity} argument(s), got ${node.args.length}`,
        );
      }
      const target = compileNode(node.target, parameter, methods);
      const args = node.args.map((arg) => compileNode(arg, parameter, methods));
      return (entity) => implementation.invoke(target(entity), args.map((arg) => arg(entity)));
    }

    case 'binary': {
      if (node.operator === 'eq' && (isNullConstant(node.left) || isNullConstant(node.right))) {
        const operand = compileNode(isNullConstant(node.left) ? node.right : node.left, parameter, methods);
        return (entity) => normalize(operand(entity)) === null;
      }
      const left = compileNode(node.left, parameter, methods);
      const right = compileNode(node.right, parameter, methods);
      switch (node.operator) {
        case 'and':
          return (entity) => left(entity) === true && right(entity) === true;
        case 'or':
          return (entity) => left(entity) === true || right(entity) === true;
        case 'eq':
          // null on either side is unknown, as with SQL `=`
          return (entity) => {
            const l = normalize(left(entity));
            const r = normalize(right(entity));
            return l !== null && r !== null && l === r;
          };
        case 'ge':
          return (entity) => {
            const order = compare(left(entity), right(entity));
            return order !== null && order >= 0;
          };
        case 'le':
          return (entity) => {
            const order = compare(left(entity), right(entity));
            return order !== null && order <= 0;
          };
      }
    }
  }
}

/**
 * Compiles a predicate tree into a plain function. Methods are resolved here,
 * once, so a missing capability fails before any entity is tested.
 */
export function compilePredicate<T>(
  predicate: Lambda<T, boolean>,
  methods: MethodTable = defaultMethods,
): (entity: T) => boolean {
  const evaluate = compileNode(predicate.body, predicate.parameter, methods);
  return (entity) => evaluate(entity) === true;
}
