import { and, constant, ge, le, param } from '../expr/factory.js';
import { unify } from '../expr/unify.js';
import type { Lambda, Orderable, Predicate } from '../expr/types.js';

/**
 * `lower <= selector(x) <= upper`, inclusive at both ends. The selector body
 * is spliced into the tree, so navigations inside it stay translatable.
 * Bounds are not checked: `lower > upper` simply matches nothing.
 */
export function between<T, V extends Orderable>(
  selector: Lambda<T, V>,
  lower: V,
  upper: V,
): Predicate<T> {
  const parameter = param<T>('x');
  const value = unify(selector.body, selector.parameter, parameter);
  return {
    parameter,
    body: and(ge(value, constant(lower)), le(value, constant(upper))),
  };
}
