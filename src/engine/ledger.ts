/**
 * FrequencyLedger
 *
 * The mutable aggregate behind the classifier: the category registry,
 * one word ledger per category, per-category document counts and the
 * global word total.
 *
 * **Invariants:**
 * - A word entry exists only while its count is above zero
 * - Removing a category drops its word ledger and document count
 * - Document counts are not guarded and can go negative through `untrain`
 *
 * @module engine
 */

import { UnknownCategoryError } from '../errors';
import type { LedgerView } from '../scoring/types';
import type { Category } from '../types';

/**
 * What `untrain` did, for logging by the caller
 */
export interface UntrainOutcome {
  /** Document count of the category after the decrement */
  documentCount: number;
  /** Words left untouched because the global total had gone negative */
  skippedWords: number;
}

const EMPTY_LEDGER: ReadonlyMap<string, number> = new Map();

export class FrequencyLedger implements LedgerView {
  private words = new Map<Category, Map<string, number>>();
  private documents = new Map<Category, number>();
  private wordTotal = 0;

  constructor(categories: Iterable<Category> = []) {
    for (const category of categories) {
      this.words.set(category, new Map());
    }
  }

  get totalWords(): number {
    return this.wordTotal;
  }

  has(category: Category): boolean {
    return this.words.has(category);
  }

  categories(): Category[] {
    return [...this.words.keys()];
  }

  /**
   * Register a category with an empty word ledger.
   * An existing category keeps its position and document count but loses
   * its words; the global total is left as is.
   *
   * @returns whether the category was already registered
   */
  addCategory(category: Category): boolean {
    const existed = this.words.has(category);
    this.words.set(category, new Map());
    return existed;
  }

  removeCategory(category: Category): boolean {
    this.documents.delete(category);
    return this.words.delete(category);
  }

  wordCounts(category: Category): ReadonlyMap<string, number> {
    return this.words.get(category) ?? EMPTY_LEDGER;
  }

  documentCount(category: Category): number {
    return this.documents.get(category) ?? 0;
  }

  totalDocuments(): number {
    let total = 0;
    for (const category of this.words.keys()) {
      total += this.documentCount(category);
    }
    return total;
  }

  categoryWordTotal(category: Category): number {
    let total = 0;
    for (const count of this.wordCounts(category).values()) {
      total += count;
    }
    return total;
  }

  vocabularySize(): number {
    const vocabulary = new Set<string>();
    for (const ledger of this.words.values()) {
      for (const word of ledger.keys()) {
        vocabulary.add(word);
      }
    }
    return vocabulary.size;
  }

  /**
   * Count one document and add every token count to the category's ledger
   * and to the global total.
   */
  train(category: Category, tokens: ReadonlyMap<string, number>): number {
    const ledger = this.ledgerFor(category, 'train');
    const documentCount = this.documentCount(category) + 1;
    this.documents.set(category, documentCount);

    for (const [word, count] of tokens) {
      ledger.set(word, (ledger.get(word) ?? 0) + count);
      this.wordTotal += count;
    }

    return documentCount;
  }

  /**
   * Reverse a prior `train` with the same tokens.
   *
   * When a word's count drops to zero or below, the entry is removed and
   * the global total is reduced by the count the entry held, not by the
   * requested amount. Once the global total is negative, the remaining
   * words of the call are skipped entirely.
   */
  untrain(category: Category, tokens: ReadonlyMap<string, number>): UntrainOutcome {
    const ledger = this.ledgerFor(category, 'untrain');
    const documentCount = this.documentCount(category) - 1;
    this.documents.set(category, documentCount);

    let skippedWords = 0;

    for (const [word, count] of tokens) {
      if (this.wordTotal < 0) {
        skippedWords++;
        continue;
      }

      const stored = ledger.get(word) ?? 0;
      const remaining = stored - count;
      let removed = count;

      if (remaining <= 0) {
        ledger.delete(word);
        removed = stored;
      } else {
        ledger.set(word, remaining);
      }

      this.wordTotal -= removed;
    }

    return { documentCount, skippedWords };
  }

  private ledgerFor(category: Category, operation: string): Map<string, number> {
    const ledger = this.words.get(category);
    if (!ledger) {
      throw new UnknownCategoryError(category, operation);
    }
    return ledger;
  }
}
