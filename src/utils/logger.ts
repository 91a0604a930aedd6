/**
 * Structured logger for the classifier
 * Provides consistent logging with context and levels
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LogContext {
  component?: string;
  category?: string;
  operation?: string;
  error?: Error;
  [key: string]: unknown;
}

type LevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export class ClassifierLogger {
  private level: LogLevel;
  private prefix: string;
  private context: LogContext;

  constructor(level: LogLevel = LogLevel.INFO, prefix: string = '[textbayes]', context: LogContext = {}) {
    this.level = level;
    this.prefix = prefix;
    this.context = context;
  }

  debug(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('DEBUG', message, context);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, context);
    }
  }

  /**
   * Render a log line. Exposed for tests; the console methods call this.
   */
  format(level: LevelName, message: string, context?: LogContext): string {
    const merged: LogContext = { ...this.context, ...context };
    const component = merged.component ? ` [${merged.component}]` : '';
    const logMessage = `${this.prefix}${component} ${level}: ${message}`;

    const { error, component: _component, ...cleanContext } = merged;

    const contextStr = Object.keys(cleanContext).length > 0
      ? `\n  Context: ${JSON.stringify(cleanContext, null, 2)}`
      : '';

    const errorStr = error
      ? `\n  Error: ${error.message}\n  Stack: ${error.stack}`
      : '';

    return `${logMessage}${contextStr}${errorStr}`;
  }

  private log(level: LevelName, message: string, context?: LogContext): void {
    const fullMessage = this.format(level, message, context);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(fullMessage);
        break;
      case 'WARN':
        console.warn(fullMessage);
        break;
      case 'ERROR':
        console.error(fullMessage);
        break;
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): ClassifierLogger {
    return new ClassifierLogger(this.level, this.prefix, { ...this.context, ...context });
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get current log level
   */
  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Create logger from config
 */
export function createLogger(debug?: boolean): ClassifierLogger {
  const level = debug ? LogLevel.DEBUG : LogLevel.INFO;
  return new ClassifierLogger(level);
}
