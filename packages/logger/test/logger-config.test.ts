import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  LogLevel,
  parseLogLevel,
  getLogLevel,
  getLoggerConfig,
  shouldLog,
  LOG_LEVEL_NAMES
} from '../src/logger-config.js';

describe('Logger Configuration', () => {
  let originalNodeEnv: string | undefined;
  let originalLogLevel: string | undefined;
  let originalMaxSize: string | undefined;

  beforeEach(() => {
    originalNodeEnv = process.env.NODE_ENV;
    originalLogLevel = process.env.LOG_LEVEL;
    originalMaxSize = process.env.LOG_MAX_SIZE;
  });

  afterEach(() => {
    const restore = (key: string, value: string | undefined) => {
      if (value !== undefined) {
        process.env[key] = value;
      } else {
        delete process.env[key];
      }
    };
    restore('NODE_ENV', originalNodeEnv);
    restore('LOG_LEVEL', originalLogLevel);
    restore('LOG_MAX_SIZE', originalMaxSize);
  });

  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
      expect(parseLogLevel('WaRn')).toBe(LogLevel.WARN);
      expect(parseLogLevel(' info ')).toBe(LogLevel.INFO);
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    });

    it('should return undefined for unknown names', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });

  describe('getLogLevel', () => {
    it('should honour LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'DEBUG';
      expect(getLogLevel()).toBe(LogLevel.DEBUG);
    });

    it('should default to WARN in production', () => {
      process.env.NODE_ENV = 'production';
      delete process.env.LOG_LEVEL;
      expect(getLogLevel()).toBe(LogLevel.WARN);
    });

    it('should default to INFO in development', () => {
      process.env.NODE_ENV = 'development';
      delete process.env.LOG_LEVEL;
      expect(getLogLevel()).toBe(LogLevel.INFO);
    });

    it('should fall back to the environment default for invalid values', () => {
      process.env.NODE_ENV = 'development';
      process.env.LOG_LEVEL = 'LOUD';
      expect(getLogLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('getLoggerConfig', () => {
    it('should read LOG_MAX_SIZE', () => {
      process.env.LOG_MAX_SIZE = '300';
      expect(getLoggerConfig().maxSize).toBe(300);
    });

    it('should ignore a non-numeric LOG_MAX_SIZE', () => {
      process.env.LOG_MAX_SIZE = 'big';
      expect(getLoggerConfig().maxSize).toBe(2000);
    });
  });

  describe('shouldLog', () => {
    const config = { level: LogLevel.INFO, sanitize: true, maxSize: 2000 };

    it('should emit levels at or above the configured severity', () => {
      expect(shouldLog(LogLevel.ERROR, config)).toBe(true);
      expect(shouldLog(LogLevel.WARN, config)).toBe(true);
      expect(shouldLog(LogLevel.INFO, config)).toBe(true);
    });

    it('should drop more verbose levels', () => {
      expect(shouldLog(LogLevel.DEBUG, config)).toBe(false);
    });
  });

  it('should name every level', () => {
    expect(LOG_LEVEL_NAMES[LogLevel.ERROR]).toBe('ERROR');
    expect(LOG_LEVEL_NAMES[LogLevel.DEBUG]).toBe('DEBUG');
  });
});
