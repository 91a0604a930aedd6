/**
 * Scoring types for textbayes
 */

import type { Category, Scores } from '../types';

/**
 * Read-only view of the frequency ledger handed to scorers
 */
export interface LedgerView {
  /** Registered categories, in insertion order */
  categories(): readonly Category[];

  /** Word ledger of one category (empty for unknown names) */
  wordCounts(category: Category): ReadonlyMap<string, number>;

  /** Net document count of one category */
  documentCount(category: Category): number;

  /** Sum of document counts over registered categories */
  totalDocuments(): number;

  /** Sum of every count in one category's word ledger */
  categoryWordTotal(category: Category): number;

  /** Number of distinct words across all registered ledgers */
  vocabularySize(): number;

  /** Global running word total */
  readonly totalWords: number;
}

/**
 * Built-in scorer names
 */
export type ScoringStrategy = 'raw' | 'laplace';

/**
 * Scorer interface
 * Turns a tokenized text into one score per registered category
 */
export interface IScorer {
  /** Scorer name */
  name: string;

  /**
   * Score every registered category for the given token counts
   */
  score(view: LedgerView, tokens: ReadonlyMap<string, number>): Scores;
}

export function isScorer(value: unknown): value is IScorer {
  return typeof value === 'object'
    && value !== null
    && 'score' in value
    && typeof value.score === 'function'
    && 'name' in value
    && typeof value.name === 'string';
}
