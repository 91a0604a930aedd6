/**
 * WordHashTokenizer
 *
 * Default tokenizer: turns text into a word → count map.
 *
 * **Pipeline:**
 * 1. Drop every character that is neither a word character nor whitespace
 * 2. Lower-case and split on whitespace
 * 3. Skip common words (see `skip-words.json`) and words of `minLength`
 *    characters or fewer
 * 4. Porter-stem what is left and count occurrences
 *
 * @module tokenizer
 *
 * @example
 * ```typescript
 * const tokenizer = new WordHashTokenizer();
 * tokenizer.tokenize('The cats are running');
 * // Map { 'cat' => 1, 'run' => 1 }
 * ```
 */

import natural from 'natural';
import defaultSkipWords from './skip-words.json';
import type { Tokenizer } from './types';

export interface WordHashTokenizerOptions {
  /**
   * Porter-stem each kept word
   * @default true
   */
  stem?: boolean;

  /**
   * Words of this many characters or fewer are dropped
   * @default 2
   */
  minLength?: number;

  /**
   * Words never counted; replaces the built-in list
   */
  skipWords?: Iterable<string>;
}

export class WordHashTokenizer implements Tokenizer {
  private stem: boolean;
  private minLength: number;
  private skipWords: ReadonlySet<string>;

  constructor(options: WordHashTokenizerOptions = {}) {
    this.stem = options.stem ?? true;
    this.minLength = options.minLength ?? 2;
    this.skipWords = new Set(options.skipWords ?? defaultSkipWords);
  }

  tokenize(text: string): Map<string, number> {
    const counts = new Map<string, number>();
    const words = text.replace(/[^\w\s]/g, '').toLowerCase().split(/\s+/);

    for (const word of words) {
      if (word.length <= this.minLength || this.skipWords.has(word)) {
        continue;
      }

      const token = this.stem ? natural.PorterStemmer.stem(word) : word;
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    return counts;
  }
}
