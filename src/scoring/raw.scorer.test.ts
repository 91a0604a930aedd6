/**
 * Raw Scorer tests
 */

import { describe, it, expect } from 'vitest';
import { RawScorer } from './raw.scorer';
import { FrequencyLedger } from '../engine/ledger';

function tokens(...entries: [string, number][]): Map<string, number> {
  return new Map(entries);
}

describe('RawScorer', () => {
  it('should have name "raw"', () => {
    expect(new RawScorer().name).toBe('raw');
  });

  it('should add ln(count / total) for each distinct known word plus the prior', () => {
    const ledger = new FrequencyLedger(['a', 'b']);
    ledger.train('a', tokens(['x', 3], ['y', 1]));
    ledger.train('b', tokens(['y', 2]));
    ledger.train('b', tokens(['z', 2]));

    const scores = new RawScorer().score(ledger, tokens(['x', 1], ['y', 1]));

    expect(scores.a).toBeCloseTo(Math.log(3 / 4) + Math.log(1 / 4) + Math.log(1 / 3), 12);
    expect(scores.b).toBeCloseTo(Math.log(2 / 4) + Math.log(2 / 3), 12);
  });

  it('should ignore repeated occurrences in the input', () => {
    const ledger = new FrequencyLedger(['a']);
    ledger.train('a', tokens(['x', 1], ['y', 1]));

    const once = new RawScorer().score(ledger, tokens(['x', 1]));
    const thrice = new RawScorer().score(ledger, tokens(['x', 3]));

    expect(thrice.a).toBe(once.a);
  });

  it('should not penalize unknown words', () => {
    const ledger = new FrequencyLedger(['a']);
    ledger.train('a', tokens(['x', 1]));

    const scores = new RawScorer().score(ledger, tokens(['unseen', 4]));

    expect(scores.a).toBe(0);
  });

  it('should return an empty record for an empty registry', () => {
    expect(new RawScorer().score(new FrequencyLedger(), tokens(['x', 1]))).toEqual({});
  });
});
