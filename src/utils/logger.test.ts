/**
 * ClassifierLogger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ClassifierLogger, LogLevel, createLogger } from './logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ClassifierLogger', () => {
  describe('format()', () => {
    it('should render prefix, level and message', () => {
      const logger = new ClassifierLogger();

      expect(logger.format('INFO', 'ready')).toBe('[textbayes] INFO: ready');
    });

    it('should render component and context', () => {
      const logger = new ClassifierLogger();

      expect(logger.format('WARN', 'Unknown category', { component: 'Engine', category: 'spam' }))
        .toBe('[textbayes] [Engine] WARN: Unknown category\n  Context: {\n  "category": "spam"\n}');
    });

    it('should render errors separately from context', () => {
      const logger = new ClassifierLogger();
      const error = new Error('boom');
      error.stack = 'stack-line';

      expect(logger.format('ERROR', 'failed', { error }))
        .toBe('[textbayes] ERROR: failed\n  Error: boom\n  Stack: stack-line');
    });
  });

  describe('Levels', () => {
    it('should skip messages below the level', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const logger = new ClassifierLogger(LogLevel.WARN);

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');

      expect(log).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('[textbayes] WARN: shown');
    });

    it('should log nothing at NONE', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = new ClassifierLogger(LogLevel.NONE);

      logger.error('hidden');

      expect(error).not.toHaveBeenCalled();
    });

    it('should change level with setLevel()', () => {
      const logger = new ClassifierLogger();

      logger.setLevel(LogLevel.ERROR);

      expect(logger.getLevel()).toBe(LogLevel.ERROR);
    });
  });

  describe('child()', () => {
    it('should merge parent context into every message', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new ClassifierLogger().child({ component: 'Engine' });

      logger.info('trained', { category: 'spam' });

      expect(log).toHaveBeenCalledWith('[textbayes] [Engine] INFO: trained\n  Context: {\n  "category": "spam"\n}');
    });
  });

  describe('createLogger()', () => {
    it('should pick DEBUG when debug is on', () => {
      expect(createLogger(true).getLevel()).toBe(LogLevel.DEBUG);
      expect(createLogger().getLevel()).toBe(LogLevel.INFO);
    });
  });
});
