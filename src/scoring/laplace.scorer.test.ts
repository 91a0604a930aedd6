/**
 * Laplace Scorer tests
 */

import { describe, it, expect } from 'vitest';
import { LaplaceScorer } from './laplace.scorer';
import { createScorer, isScorer, RawScorer } from './index';
import { FrequencyLedger } from '../engine/ledger';

function tokens(...entries: [string, number][]): Map<string, number> {
  return new Map(entries);
}

describe('LaplaceScorer', () => {
  it('should smooth every occurrence against the shared vocabulary', () => {
    const ledger = new FrequencyLedger(['a', 'b']);
    ledger.train('a', tokens(['x', 3], ['y', 1]));
    ledger.train('b', tokens(['z', 1]));

    // |V| = 3
    const scores = new LaplaceScorer().score(ledger, tokens(['x', 2], ['z', 1]));

    expect(scores.a).toBeCloseTo(2 * Math.log(4 / 7) + Math.log(1 / 7) + Math.log(1 / 2), 12);
    expect(scores.b).toBeCloseTo(2 * Math.log(1 / 4) + Math.log(2 / 4) + Math.log(1 / 2), 12);
  });

  it('should penalize unknown words', () => {
    const ledger = new FrequencyLedger(['a']);
    ledger.train('a', tokens(['x', 1]));

    const scores = new LaplaceScorer().score(ledger, tokens(['unseen', 1]));

    expect(scores.a).toBeCloseTo(Math.log(1 / 2), 12);
  });
});

describe('createScorer()', () => {
  it('should build built-in scorers by name', () => {
    expect(createScorer('raw')).toBeInstanceOf(RawScorer);
    expect(createScorer('laplace')).toBeInstanceOf(LaplaceScorer);
  });
});

describe('isScorer()', () => {
  it('should accept objects with name and score()', () => {
    expect(isScorer(new RawScorer())).toBe(true);
    expect(isScorer({ name: 'plain', score: () => ({}) })).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isScorer(null)).toBe(false);
    expect(isScorer({ name: 'no-score' })).toBe(false);
    expect(isScorer({ score: () => ({}) })).toBe(false);
  });
});
