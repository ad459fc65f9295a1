import { CapabilityMissingError } from '../errors.js';
import type { MethodRef, ScalarKind } from './types.js';

export interface MethodImplementation {
  readonly arity: number;
  invoke(target: unknown, args: readonly unknown[]): unknown;
}

/** Scalar methods keyed by `receiver.name`, e.g. `string.contains`. */
export type MethodTable = ReadonlyMap<string, MethodImplementation>;

export function methodKey(method: MethodRef): string {
  return `${method.receiver}.${method.name}`;
}

export const defaultMethods: MethodTable = new Map<string, MethodImplementation>([
  [
    'string.contains',
    {
      arity: 1,
      // Exact, case-sensitive containment. A missing receiver never matches.
      invoke: (target, [search]) =>
        typeof target === 'string' && typeof search === 'string' && target.includes(search),
    },
  ],
]);

export function resolveMethod(
  table: MethodTable,
  receiver: ScalarKind,
  name: string,
): MethodImplementation {
  const implementation = table.get(methodKey({ receiver, name }));
  if (implementation === undefined) {
    throw new CapabilityMissingError(receiver, name);
  }
  return implementation;
}
