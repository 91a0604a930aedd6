/**
 * Dispatch exports
 */

export {
  parseAccessor,
  resolveAccessor,
  type AccessorOperation,
  type CategoryLookup,
  type ResolvedAccessor,
} from './accessor';
