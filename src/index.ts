/**
 * textbayes
 * Incremental multinomial naive Bayes text classifier
 *
 * @packageDocumentation
 */

// Export types and configuration schema
export * from './types';

// Export engine
export * from './engine';

// Export scoring (base classes for custom scorers)
export * from './scoring';

// Export tokenizer
export * from './tokenizer';

// Export named accessor resolution
export * from './dispatch';

// Export errors
export * from './errors';

// Export logger
export { ClassifierLogger, LogLevel, createLogger, type LogContext } from './utils/logger';
