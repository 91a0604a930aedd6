/**
 * Tokenizer exports
 */

export { isTokenizer, type Tokenizer } from './types';
export { WordHashTokenizer, type WordHashTokenizerOptions } from './word-hash.tokenizer';
