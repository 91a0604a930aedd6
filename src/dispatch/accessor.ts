/**
 * Named accessors
 *
 * Resolves operation names of the form `train_<category>` and
 * `untrain_<category>` into an explicit `(operation, category)` pair,
 * checked against the live registry at call time.
 *
 * @module dispatch
 *
 * @example
 * ```typescript
 * resolveAccessor('untrain_spam', registry);
 * // { operation: 'untrain', category: 'spam' }
 * ```
 */

import { NoSuchOperationError, UnknownCategoryError } from '../errors';
import type { Category } from '../types';

export type AccessorOperation = 'train' | 'untrain';

export interface ResolvedAccessor {
  operation: AccessorOperation;
  category: Category;
}

/**
 * Anything that can answer registry membership
 */
export interface CategoryLookup {
  has(category: Category): boolean;
}

const ACCESSOR_PATTERN = /^(un)?train_(.+)$/s;

/**
 * Split an accessor name without consulting the registry
 *
 * @returns the parsed pair, or `undefined` when the name has another shape
 */
export function parseAccessor(name: string): ResolvedAccessor | undefined {
  const match = ACCESSOR_PATTERN.exec(name);
  if (!match) {
    return undefined;
  }

  return {
    operation: match[1] ? 'untrain' : 'train',
    category: match[2],
  };
}

/**
 * Parse an accessor name and check its category is registered
 *
 * @throws NoSuchOperationError when the name is not an accessor
 * @throws UnknownCategoryError when the category is not registered
 */
export function resolveAccessor(name: string, registry: CategoryLookup): ResolvedAccessor {
  const accessor = parseAccessor(name);
  if (!accessor) {
    throw new NoSuchOperationError(name);
  }

  if (!registry.has(accessor.category)) {
    throw new UnknownCategoryError(accessor.category, accessor.operation);
  }

  return accessor;
}
