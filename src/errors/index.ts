/**
 * Classifier errors
 *
 * Every failure the engine raises is a `ClassifierError` carrying a typed
 * `code`. Numeric degeneracies in scoring (log of zero, division by zero)
 * are not errors and surface as non-finite scores instead.
 *
 * @module errors
 */

export type ClassifierErrorCode =
  | 'UNKNOWN_CATEGORY' // train/untrain/dispatch on an unregistered category
  | 'EMPTY_REGISTRY' // classify with no categories
  | 'NO_SUCH_OPERATION' // dispatch name is not train_<c> / untrain_<c>
  | 'INVALID_CONFIG'; // constructor config rejected by the schema

export interface ClassifierErrorOptions {
  category?: string;
  operation?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ClassifierError extends Error {
  readonly code: ClassifierErrorCode;
  readonly category?: string;
  readonly operation?: string;
  readonly details?: Record<string, unknown>;

  constructor(code: ClassifierErrorCode, message: string, options: ClassifierErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClassifierError';
    this.code = code;
    this.category = options.category;
    this.operation = options.operation;
    this.details = options.details;
  }
}

export class UnknownCategoryError extends ClassifierError {
  constructor(category: string, operation?: string) {
    super('UNKNOWN_CATEGORY', `No such category: ${category}`, { category, operation });
    this.name = 'UnknownCategoryError';
  }
}

export class EmptyRegistryError extends ClassifierError {
  constructor(operation: string) {
    super('EMPTY_REGISTRY', `Cannot ${operation}: no categories registered`, { operation });
    this.name = 'EmptyRegistryError';
  }
}

export class NoSuchOperationError extends ClassifierError {
  constructor(operation: string) {
    super('NO_SUCH_OPERATION', `No such operation: ${operation}`, { operation });
    this.name = 'NoSuchOperationError';
  }
}

export class InvalidConfigError extends ClassifierError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid classifier configuration:\n${issues.join('\n')}`, {
      details: { issues },
    });
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

/**
 * Narrow an unknown caught value to a classifier error
 */
export function isClassifierError(value: unknown): value is ClassifierError {
  return value instanceof ClassifierError;
}
