/**
 * Naive Bayes Classifier
 *
 * Incremental multinomial naive Bayes over a mutable set of named
 * categories. Documents go in as raw text; a {@link Tokenizer} turns them
 * into word counts and a {@link FrequencyLedger} accumulates them.
 *
 * **How it works:**
 * 1. `train(category, text)` counts one document and adds the text's word
 *    counts to that category's ledger
 * 2. `untrain(category, text)` reverses a matching `train`
 * 3. `scoreAll(text)` asks the scorer for one log score per category
 * 4. `classify(text)` picks the highest score (closest to zero)
 *
 * All operations are synchronous and not safe to interleave across
 * threads; hosts that share an instance must serialize access.
 *
 * @module engine
 *
 * @example
 * ```typescript
 * import { BayesClassifier } from 'textbayes';
 *
 * const classifier = new BayesClassifier({
 *   categories: ['spam', 'ham'],
 *   scoring: 'laplace',
 * });
 *
 * classifier.train('spam', 'Cheap pills, limited offer');
 * classifier.train('ham', 'Meeting moved to Thursday');
 *
 * classifier.classify('limited pills offer'); // 'spam'
 * classifier.scoreAll('limited pills offer'); // { spam: -5.81, ham: -7.60 }
 * ```
 */

import { resolveAccessor } from '../dispatch';
import { EmptyRegistryError, UnknownCategoryError } from '../errors';
import { createScorer, type IScorer } from '../scoring';
import { WordHashTokenizer, type Tokenizer } from '../tokenizer';
import {
  validateAndNormalizeClassifierConfig,
  type Category,
  type ClassifierConfig,
  type ClassifierInfo,
  type Scores,
} from '../types';
import { createLogger, type ClassifierLogger } from '../utils/logger';
import { FrequencyLedger } from './ledger';

export class BayesClassifier {
  private ledger: FrequencyLedger;
  private tokenizer: Tokenizer;
  private scorer: IScorer;
  private logger: ClassifierLogger;

  /**
   * Create a classifier
   *
   * @throws InvalidConfigError when the config does not pass validation
   */
  constructor(config: ClassifierConfig = {}) {
    const normalized = validateAndNormalizeClassifierConfig(config);

    this.ledger = new FrequencyLedger(normalized.categories);
    this.tokenizer = normalized.tokenizer ?? new WordHashTokenizer();
    this.scorer = normalized.scorer ?? createScorer(normalized.scoring);
    this.logger = (normalized.logger ?? createLogger(normalized.debug)).child({ component: 'BayesClassifier' });
  }

  /**
   * Shorthand for a default-configured classifier with the given categories
   */
  static withCategories(...categories: Category[]): BayesClassifier {
    return new BayesClassifier({ categories });
  }

  /**
   * Register a category. Re-adding an existing category empties its word
   * ledger, so callers should not treat this as a no-op.
   */
  addCategory(category: Category): Category {
    const existed = this.ledger.addCategory(category);
    this.logger.debug(existed ? 'Category reset' : 'Category added', { category });
    return category;
  }

  /**
   * Alias of {@link addCategory}
   */
  appendCategory(category: Category): Category {
    return this.addCategory(category);
  }

  /**
   * Unregister a category together with its ledger
   *
   * @returns the removed name, or `undefined` when it was not registered
   */
  removeCategory(category: Category): Category | undefined {
    if (!this.ledger.removeCategory(category)) {
      this.logger.debug('Category not registered, nothing removed', { category });
      return undefined;
    }

    this.logger.debug('Category removed', { category });
    return category;
  }

  listCategories(): Set<Category> {
    return new Set(this.ledger.categories());
  }

  /**
   * @throws UnknownCategoryError when the category is not registered
   */
  train(category: Category, text: string): void {
    this.requireCategory(category, 'train');

    const tokens = this.tokenizer.tokenize(text);
    const documentCount = this.ledger.train(category, tokens);

    this.logger.debug('Trained', { category, words: tokens.size, documentCount });
  }

  /**
   * Reverse a prior `train(category, text)`. Calling it without a matching
   * `train` is not rejected and can leave the document count negative.
   *
   * @throws UnknownCategoryError when the category is not registered
   */
  untrain(category: Category, text: string): void {
    this.requireCategory(category, 'untrain');

    const tokens = this.tokenizer.tokenize(text);
    const { documentCount, skippedWords } = this.ledger.untrain(category, tokens);

    this.logger.debug('Untrained', { category, words: tokens.size, documentCount });

    if (documentCount < 0) {
      this.logger.warn('Document count is negative', { category, operation: 'untrain', documentCount });
    }
    if (skippedWords > 0) {
      this.logger.warn('Global word total is negative, words skipped', {
        category,
        operation: 'untrain',
        skippedWords,
        totalWords: this.ledger.totalWords,
      });
    }
  }

  /**
   * Log score of the text under every registered category.
   * Categories without training data produce `-Infinity` or `NaN` rather
   * than an error. An empty registry gives an empty record.
   */
  scoreAll(text: string): Scores {
    return this.scorer.score(this.ledger, this.tokenizer.tokenize(text));
  }

  /**
   * Category with the highest score. Ties go to the category registered
   * first; `NaN` scores rank below every number.
   *
   * @throws EmptyRegistryError when no categories are registered
   */
  classify(text: string): Category {
    const categories = this.ledger.categories();
    if (categories.length === 0) {
      this.logger.warn('Classify called with no categories', { operation: 'classify' });
      throw new EmptyRegistryError('classify');
    }

    const scores = this.scoreAll(text);
    let best = categories[0];
    let bestScore = -Infinity;

    for (const category of categories) {
      const score = scores[category];
      if (score > bestScore) {
        best = category;
        bestScore = score;
      }
    }

    return best;
  }

  /**
   * Run a named accessor (`train_<category>` or `untrain_<category>`)
   * once per text, in order.
   *
   * @throws NoSuchOperationError when the name is not an accessor
   * @throws UnknownCategoryError when the category is not registered
   */
  invoke(name: string, ...texts: string[]): void {
    const { operation, category } = resolveAccessor(name, this.ledger);

    for (const text of texts) {
      if (operation === 'train') {
        this.train(category, text);
      } else {
        this.untrain(category, text);
      }
    }
  }

  /**
   * Copy of one category's word ledger
   *
   * @throws UnknownCategoryError when the category is not registered
   */
  wordCounts(category: Category): Map<string, number> {
    this.requireCategory(category, 'wordCounts');
    return new Map(this.ledger.wordCounts(category));
  }

  /**
   * @throws UnknownCategoryError when the category is not registered
   */
  documentCount(category: Category): number {
    this.requireCategory(category, 'documentCount');
    return this.ledger.documentCount(category);
  }

  getInfo(): ClassifierInfo {
    const categories = this.ledger.categories();

    return {
      categories,
      documentCounts: Object.fromEntries(categories.map((c): [Category, number] => [c, this.ledger.documentCount(c)])),
      totalWords: this.ledger.totalWords,
      vocabularySize: this.ledger.vocabularySize(),
      scorer: this.scorer.name,
    };
  }

  private requireCategory(category: Category, operation: string): void {
    if (!this.ledger.has(category)) {
      this.logger.warn('Unknown category', { category, operation });
      throw new UnknownCategoryError(category, operation);
    }
  }
}
