/**
 * Tokenizer contract
 *
 * Converts raw text into a mapping from normalized word token to its
 * occurrence count in that text. Must be deterministic for a given input;
 * map order carries no meaning.
 */
export interface Tokenizer {
  tokenize(text: string): Map<string, number>;
}

export function isTokenizer(value: unknown): value is Tokenizer {
  return typeof value === 'object'
    && value !== null
    && 'tokenize' in value
    && typeof value.tokenize === 'function';
}
