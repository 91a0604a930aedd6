/**
 * Named accessor tests
 */

import { describe, it, expect } from 'vitest';
import { parseAccessor, resolveAccessor } from './accessor';
import { NoSuchOperationError, UnknownCategoryError } from '../errors';

const registry = new Set(['spam', 'not_spam']);

describe('parseAccessor()', () => {
  it('should parse train_<category>', () => {
    expect(parseAccessor('train_spam')).toEqual({ operation: 'train', category: 'spam' });
  });

  it('should parse untrain_<category>', () => {
    expect(parseAccessor('untrain_not_spam')).toEqual({ operation: 'untrain', category: 'not_spam' });
  });

  it('should return undefined for other names', () => {
    expect(parseAccessor('classify')).toBeUndefined();
    expect(parseAccessor('train_')).toBeUndefined();
    expect(parseAccessor('retrain_spam')).toBeUndefined();
  });
});

describe('resolveAccessor()', () => {
  it('should resolve registered categories', () => {
    expect(resolveAccessor('untrain_spam', registry)).toEqual({ operation: 'untrain', category: 'spam' });
  });

  it('should throw UnknownCategoryError for unregistered categories', () => {
    expect(() => resolveAccessor('train_ham', registry)).toThrow(UnknownCategoryError);
    expect(() => resolveAccessor('train_ham', registry)).toThrow('No such category: ham');
  });

  it('should throw NoSuchOperationError for other names', () => {
    expect(() => resolveAccessor('score_spam', registry)).toThrow(NoSuchOperationError);
    expect(() => resolveAccessor('score_spam', registry)).toThrow('No such operation: score_spam');
  });
});
