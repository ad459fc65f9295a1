import { STRING_CONTAINS, call, constant, or, param } from '../expr/factory.js';
import { defaultMethods, resolveMethod } from '../expr/methods.js';
import type { MethodTable } from '../expr/methods.js';
import { unify } from '../expr/unify.js';
import type { Lambda, Predicate, TypedExpression } from '../expr/types.js';

/**
 * Matches when `searchText` occurs in at least one of the selected string
 * fields. Starts from `false`, so an empty selector list matches nothing.
 *
 * @throws CapabilityMissingError when `methods` has no `string.contains`
 */
export function anyPropertyContainsText<T>(
  searchText: string,
  selectors: readonly Lambda<T, string>[],
  methods: MethodTable = defaultMethods,
): Predicate<T> {
  resolveMethod(methods, STRING_CONTAINS.receiver, STRING_CONTAINS.name);

  const parameter = param<T>('x');
  const search = constant(searchText);
  const body = selectors.reduce<TypedExpression<boolean>>(
    (acc, selector) =>
      or(
        acc,
        call<boolean>(STRING_CONTAINS, unify(selector.body, selector.parameter, parameter), [search]),
      ),
    constant(false),
  );
  return { parameter, body };
}
