/**
 * Scoring exports
 */

import { LaplaceScorer } from './laplace.scorer';
import { RawScorer } from './raw.scorer';
import type { IScorer, ScoringStrategy } from './types';

export { isScorer, type IScorer, type LedgerView, type ScoringStrategy } from './types';
export { BaseScorer, type ScoringContext } from './base';

export { RawScorer } from './raw.scorer';
export { LaplaceScorer } from './laplace.scorer';

/**
 * Build a built-in scorer by name
 */
export function createScorer(strategy: ScoringStrategy): IScorer {
  switch (strategy) {
    case 'raw':
      return new RawScorer();
    case 'laplace':
      return new LaplaceScorer();
  }
}
