/**
 * Log level management and environment-based logger configuration.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LoggerConfig {
  level: LogLevel;
  sanitize: boolean;
  maxSize: number;
}

/**
 * Parse a level name, returning undefined for anything unknown
 */
export const parseLogLevel = (value: string | undefined): LogLevel | undefined => {
  switch (value?.trim().toUpperCase()) {
    case 'ERROR': return LogLevel.ERROR;
    case 'WARN': return LogLevel.WARN;
    case 'INFO': return LogLevel.INFO;
    case 'DEBUG': return LogLevel.DEBUG;
    default: return undefined;
  }
};

/**
 * Get the current log level based on environment variables
 */
export const getLogLevel = (): LogLevel => {
  const level = parseLogLevel(process.env.LOG_LEVEL);
  if (level !== undefined) {
    return level;
  }
  // Production default: WARN, Development default: INFO
  return process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO;
};

/**
 * Get complete logger configuration
 */
export const getLoggerConfig = (): LoggerConfig => {
  const maxSize = parseInt(process.env.LOG_MAX_SIZE || '2000', 10);
  return {
    level: getLogLevel(),
    sanitize: process.env.LOG_SANITIZE !== 'false',
    maxSize: Number.isNaN(maxSize) ? 2000 : maxSize
  };
};

/**
 * Check if a log level should be emitted. Lower numeric values are more severe.
 */
export const shouldLog = (level: LogLevel, config?: LoggerConfig): boolean => {
  const logConfig = config || getLoggerConfig();
  return level <= logConfig.level;
};

export const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG'
};
