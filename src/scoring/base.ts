/**
 * Base Scorer
 *
 * Abstract base class for per-category scoring strategies.
 * Handles iteration over the registry and the shared prior term;
 * subclasses only supply the word likelihood part.
 *
 * **Score layout:**
 * `score(c) = likelihood(c, tokens) + ln(documents(c) / totalDocuments)`
 *
 * Nothing here guards the logarithm: an untrained category yields
 * `-Infinity`, and an empty training set yields `NaN`.
 *
 * @example
 * ```typescript
 * class UniformScorer extends BaseScorer {
 *   name = 'uniform';
 *
 *   protected likelihood(): number {
 *     return 0;
 *   }
 * }
 * ```
 *
 * @module scoring
 */

import type { Category, Scores } from '../types';
import type { IScorer, LedgerView } from './types';

/**
 * Values computed once per `score()` call and shared by every category
 */
export interface ScoringContext {
  totalDocuments: number;
  vocabularySize: number;
}

export abstract class BaseScorer implements IScorer {
  /** Scorer name for identification */
  abstract name: string;

  /** Log-likelihood of the tokens under one category's ledger */
  protected abstract likelihood(
    view: LedgerView,
    category: Category,
    tokens: ReadonlyMap<string, number>,
    context: ScoringContext,
  ): number;

  score(view: LedgerView, tokens: ReadonlyMap<string, number>): Scores {
    const context: ScoringContext = {
      totalDocuments: view.totalDocuments(),
      vocabularySize: view.vocabularySize(),
    };

    return Object.fromEntries(
      view.categories().map((category): [Category, number] => [
        category,
        this.likelihood(view, category, tokens, context) + this.prior(view, category, context),
      ]),
    );
  }

  /**
   * Log prior probability of a category
   */
  protected prior(view: LedgerView, category: Category, context: ScoringContext): number {
    return Math.log(view.documentCount(category) / context.totalDocuments);
  }
}
