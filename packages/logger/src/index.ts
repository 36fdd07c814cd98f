export {
  StructuredLogger,
  ComponentLogger,
  LogTimer,
  type LogContext,
  type LogEntry,
  LogLevel
} from './structured-logger.js';

export {
  type LoggerConfig,
  parseLogLevel,
  getLogLevel,
  getLoggerConfig,
  shouldLog,
  LOG_LEVEL_NAMES
} from './logger-config.js';

export {
  sanitizeLogData,
  sanitizeMessage,
  sanitizeString,
  sanitizeObject,
  type SanitizeOptions
} from './log-sanitizer.js';

import { StructuredLogger, type LogContext } from './structured-logger.js';

export const logger = StructuredLogger.getInstance();

export const createLogger = (component: string, baseContext?: LogContext) =>
  StructuredLogger.create(component, baseContext);
