export {
  lambda,
  param,
  member,
  prop,
  constant,
  eq,
  ge,
  le,
  and,
  or,
  call,
  contains,
} from './expr/factory.js';
export type {
  Expression,
  TypedExpression,
  Lambda,
  Predicate,
  LogicalOperator,
  Orderable,
  Scalar,
} from './expr/types.js';
export { unify, rebind } from './expr/unify.js';
export { compilePredicate } from './expr/evaluate.js';
export { formatLambda, formatExpression } from './expr/format.js';
export { defaultMethods } from './expr/methods.js';
export type { MethodTable, MethodImplementation } from './expr/methods.js';
export { predicates } from './filters/predicate-object.js';
export {
  whereOrConditions,
  whereAndConditions,
  whereBetween,
  whereDateTimeBetween,
  whereAnyPropertyContainsText,
} from './filters/extensions.js';
export type { Queryable, NavigationKey } from './queryable/types.js';
export { InMemoryQueryable } from './queryable/in-memory.js';
export type { InMemoryQueryableOptions } from './queryable/in-memory.js';
export {
  CapabilityMissingError,
  InvalidOperatorError,
  TranslationError,
  QueryExecutionError,
  MaterializationError,
} from './errors.js';
