/**
 * Zod validation schemas for classifier configuration
 */

import { z } from 'zod';
import { InvalidConfigError } from '../errors';
import { isScorer, type IScorer } from '../scoring/types';
import { isTokenizer, type Tokenizer } from '../tokenizer/types';
import { ClassifierLogger } from '../utils/logger';

/**
 * Category name schema
 */
export const categoryNameSchema = z.string().min(1, 'Category name must not be empty');

/**
 * Classifier configuration schema
 */
export const classifierConfigSchema = z.object({
  // Registry
  categories: z.array(categoryNameSchema).optional().default([]).describe('Initial categories, in order'),

  // Scoring
  scoring: z.enum(['raw', 'laplace']).optional().default('raw').describe('Built-in scorer'),
  scorer: z.custom<IScorer>(isScorer, { message: 'Expected a scorer with name and score()' })
    .optional()
    .describe('Custom scorer, overrides scoring'),

  // Tokenization
  tokenizer: z.custom<Tokenizer>(isTokenizer, { message: 'Expected a tokenizer with tokenize()' })
    .optional()
    .describe('Text to word-count converter'),

  // Logging
  debug: z.boolean().optional().default(false),
  logger: z.instanceof(ClassifierLogger).optional(),
}).strict();

export type ClassifierConfig = z.input<typeof classifierConfigSchema>;
export type NormalizedClassifierConfig = z.output<typeof classifierConfigSchema>;

export type ConfigValidationResult =
  | { success: true; data: NormalizedClassifierConfig }
  | { success: false; errors: string[] };

/**
 * Validate classifier configuration
 */
export function validateClassifierConfig(config: unknown): ConfigValidationResult {
  const result = classifierConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)),
  };
}

/**
 * Validate and return config with defaults applied
 */
export function validateAndNormalizeClassifierConfig(config: unknown): NormalizedClassifierConfig {
  const result = validateClassifierConfig(config);

  if (!result.success) {
    throw new InvalidConfigError(result.errors);
  }

  return result.data;
}
