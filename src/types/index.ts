/**
 * Core types for textbayes
 */

/**
 * Opaque name of one classification class
 */
export type Category = string;

/**
 * One score per registered category
 */
export type Scores = Record<Category, number>;

/**
 * Snapshot of the classifier's aggregate state
 */
export interface ClassifierInfo {
  /** Registered categories, in insertion order */
  categories: Category[];
  /** Net document count per registered category */
  documentCounts: Record<Category, number>;
  /** Global running word total */
  totalWords: number;
  /** Distinct words across all registered ledgers */
  vocabularySize: number;
  /** Name of the active scorer */
  scorer: string;
}

export * from './validation';
