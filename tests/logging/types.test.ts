/**
 * Tests for logging types and helpers
 */

import { describe, it, expect } from 'vitest';
import {
  LogLevel,
  LogLevelName,
  createDefaultLoggerConfig,
  formatError,
  parseLogFormat,
  parseLogLevel,
  shouldLog,
} from '../../lib/src/logging/types.js';
import { PersistenceError, PersistenceErrorCode } from '../../lib/src/db/errors.js';

describe('Logging Types', () => {
  describe('LogLevelName', () => {
    it('should name every level', () => {
      expect(LogLevelName[LogLevel.ERROR]).toBe('ERROR');
      expect(LogLevelName[LogLevel.WARN]).toBe('WARN');
      expect(LogLevelName[LogLevel.INFO]).toBe('INFO');
      expect(LogLevelName[LogLevel.DEBUG]).toBe('DEBUG');
      expect(LogLevelName[LogLevel.TRACE]).toBe('TRACE');
    });
  });

  describe('parseLogLevel', () => {
    it('should parse names case-insensitively', () => {
      expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
      expect(parseLogLevel(' Debug ')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel('TRACE')).toBe(LogLevel.TRACE);
    });

    it('should accept WARNING as WARN', () => {
      expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
    });

    it('should fall back to INFO for unknown names', () => {
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });
  });

  describe('parseLogFormat', () => {
    it('should parse known formats', () => {
      expect(parseLogFormat('JSON')).toBe('json');
      expect(parseLogFormat('pretty')).toBe('pretty');
    });

    it('should fall back to text', () => {
      expect(parseLogFormat('xml')).toBe('text');
    });
  });

  describe('shouldLog', () => {
    it('should log at or above the minimum severity', () => {
      expect(shouldLog(LogLevel.ERROR, LogLevel.INFO)).toBe(true);
      expect(shouldLog(LogLevel.INFO, LogLevel.INFO)).toBe(true);
      expect(shouldLog(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
    });
  });

  describe('createDefaultLoggerConfig', () => {
    it('should fill defaults', () => {
      const config = createDefaultLoggerConfig();

      expect(config.level).toBe(LogLevel.INFO);
      expect(config.format).toBe('text');
      expect(config.timestamps).toBe(true);
      expect(config.colors).toBe(true);
      expect(config.console).toBe(true);
    });

    it('should reject an unknown format', () => {
      expect(() => createDefaultLoggerConfig({ format: 'yaml' as 'text' })).toThrow();
    });
  });

  describe('formatError', () => {
    it('should carry a string error code', () => {
      const error = new PersistenceError('insert failed', PersistenceErrorCode.QUERY_ERROR, 'saveParsedIncidents');
      const formatted = formatError(error);

      expect(formatted.name).toBe('PersistenceError');
      expect(formatted.message).toBe('insert failed');
      expect(formatted.code).toBe('QUERY_ERROR');
      expect(formatted.stack).toBeDefined();
    });

    it('should leave code undefined for plain errors', () => {
      expect(formatError(new TypeError('nope')).code).toBeUndefined();
    });

    it('should format non-Error values', () => {
      expect(formatError('boom')).toEqual({ name: 'UnknownError', message: 'boom' });
    });
  });
});
