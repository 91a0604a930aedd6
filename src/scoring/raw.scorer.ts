/**
 * Raw Scorer
 *
 * Unsmoothed multinomial scoring. Each distinct word of the input that the
 * category has seen adds `ln(count / categoryWordTotal)`; words the
 * category has never seen add nothing.
 *
 * @module scoring
 */

import type { Category } from '../types';
import { BaseScorer } from './base';
import type { LedgerView } from './types';

export class RawScorer extends BaseScorer {
  name = 'raw';

  protected likelihood(view: LedgerView, category: Category, tokens: ReadonlyMap<string, number>): number {
    const counts = view.wordCounts(category);
    const total = view.categoryWordTotal(category);
    let score = 0;

    for (const word of tokens.keys()) {
      const count = counts.get(word);
      if (count !== undefined) {
        score += Math.log(count / total);
      }
    }

    return score;
  }
}
