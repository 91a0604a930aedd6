/**
 * Laplace Scorer
 *
 * Add-one smoothed multinomial scoring over every token occurrence:
 *
 * `Σ occurrences(w) × ln((count_c(w) + 1) / (categoryWordTotal_c + |V|))`
 *
 * where `V` is the vocabulary of all registered categories. Unlike
 * {@link RawScorer}, unseen words are penalized and repeated words count
 * once per occurrence.
 *
 * @example
 * ```typescript
 * const classifier = new BayesClassifier({
 *   categories: ['in_china', 'not_in_china'],
 *   scoring: 'laplace',
 * });
 * ```
 *
 * @module scoring
 */

import type { Category } from '../types';
import { BaseScorer, type ScoringContext } from './base';
import type { LedgerView } from './types';

export class LaplaceScorer extends BaseScorer {
  name = 'laplace';

  protected likelihood(
    view: LedgerView,
    category: Category,
    tokens: ReadonlyMap<string, number>,
    context: ScoringContext,
  ): number {
    const counts = view.wordCounts(category);
    const denominator = view.categoryWordTotal(category) + context.vocabularySize;
    let score = 0;

    for (const [word, occurrences] of tokens) {
      score += occurrences * Math.log(((counts.get(word) ?? 0) + 1) / denominator);
    }

    return score;
  }
}
