/**
 * Structured logging for efscript packages
 *
 * Provides:
 * - Level filtering driven by LOG_LEVEL
 * - Redaction of credentials before output
 * - Human-readable lines in development, JSON lines elsewhere
 * - Component loggers and timers for external invocations
 * - Suppression under NODE_ENV=test unless EFSCRIPT_TEST_LOGS is set
 */

import { LogLevel, type LoggerConfig, getLoggerConfig, shouldLog, LOG_LEVEL_NAMES } from './logger-config.js';
import { sanitizeLogData, sanitizeMessage } from './log-sanitizer.js';

export { LogLevel };

export interface LogContext {
  component?: string;
  stage?: string;
  command?: string;
  operation?: string;
  duration?: number;
  error?: unknown;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

type Environment = 'development' | 'production' | 'test';

function currentEnvironment(): Environment {
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

export class StructuredLogger {
  private static instance: StructuredLogger | undefined;
  private config: LoggerConfig;

  // ANSI color codes for console output
  private static readonly COLORS: Record<string, string> = {
    ERROR: '\x1b[31m',
    WARN: '\x1b[33m',
    INFO: '\x1b[32m',
    DEBUG: '\x1b[36m'
  };

  private static readonly RESET_COLOR = '\x1b[0m';

  private constructor(config?: LoggerConfig) {
    this.config = config || getLoggerConfig();
  }

  /**
   * Get singleton instance
   */
  static getInstance(): StructuredLogger {
    if (!StructuredLogger.instance) {
      StructuredLogger.instance = new StructuredLogger();
    }
    return StructuredLogger.instance;
  }

  /**
   * Create a logger with specific component context
   */
  static create(component: string, baseContext?: LogContext): ComponentLogger {
    return new ComponentLogger(component, baseContext);
  }

  /**
   * Replace the active configuration, e.g. after the CLI parsed --verbose
   */
  configure(overrides: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...overrides };
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Re-read configuration from the environment
   */
  reset(): void {
    this.config = getLoggerConfig();
  }

  log(level: LogLevel, message: string, context: LogContext = {}): void {
    const environment = currentEnvironment();
    if (environment === 'test' && !process.env.EFSCRIPT_TEST_LOGS) {
      return;
    }

    if (!shouldLog(level, this.config)) {
      return;
    }

    const { error, ...rest } = context;
    const sanitizedMessage = this.config.sanitize ? sanitizeMessage(message) : message;
    const sanitizedContext: Record<string, unknown> = this.config.sanitize ? sanitizeLogData(rest) : rest;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LOG_LEVEL_NAMES[level],
      message: sanitizedMessage,
      context: sanitizedContext
    };

    if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: this.config.sanitize ? sanitizeMessage(error.message) : error.message,
        stack: error.stack
      };
    } else if (error !== undefined) {
      entry.context.error = this.config.sanitize ? sanitizeLogData({ error }).error : error;
    }

    this.outputToConsole(entry, environment);
  }

  private outputToConsole(entry: LogEntry, environment: Environment): void {
    const levelName = entry.level;
    const color = StructuredLogger.COLORS[levelName] ?? '';
    const logString = JSON.stringify(entry);

    if (logString.length > this.config.maxSize) {
      const truncated = {
        ...entry,
        message: entry.message.substring(0, Math.floor(this.config.maxSize / 2)),
        context: { component: entry.context.component, _truncated: true, _originalSize: logString.length }
      };
      console.error(JSON.stringify(truncated));
      return;
    }

    if (environment === 'development') {
      const timestamp = entry.timestamp.substring(11, 23); // HH:mm:ss.SSS
      const componentTag = entry.context.component ? `[${entry.context.component}]` : '';
      const { component, ...details } = entry.context;
      const contextStr = Object.keys(details).length > 0 ? ` ${JSON.stringify(details)}` : '';
      const errorStr = entry.error ? `\n${entry.error.stack || entry.error.message}` : '';

      console.log(
        `${color}${timestamp} [${levelName}]${StructuredLogger.RESET_COLOR} ${componentTag} ${entry.message}${contextStr}${errorStr}`
      );
      return;
    }

    switch (entry.level) {
      case 'ERROR':
        console.error(logString);
        break;
      case 'WARN':
        console.warn(logString);
        break;
      default:
        console.log(logString);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context || {});
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context || {});
  }

  warn(message: string, error?: unknown, context?: LogContext): void {
    this.log(LogLevel.WARN, message, { ...(context || {}), ...(error !== undefined && { error }) });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, { ...(context || {}), ...(error !== undefined && { error }) });
  }

  timer(operation: string, baseContext?: LogContext): LogTimer {
    return new LogTimer(operation, baseContext || {});
  }
}

/**
 * Component-specific logger that automatically includes component context
 */
export class ComponentLogger {
  private logger: StructuredLogger;
  private baseContext: LogContext;

  constructor(component: string, baseContext: LogContext = {}) {
    this.logger = StructuredLogger.getInstance();
    this.baseContext = { component, ...baseContext };
  }

  withContext(additionalContext: LogContext): ComponentLogger {
    return new ComponentLogger(
      this.baseContext.component || 'unknown',
      { ...this.baseContext, ...additionalContext }
    );
  }

  debug(message: string, context: LogContext = {}): void {
    this.logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context: LogContext = {}): void {
    this.logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, error?: unknown, context: LogContext = {}): void {
    this.logger.warn(message, error, { ...this.baseContext, ...context });
  }

  error(message: string, error?: unknown, context: LogContext = {}): void {
    this.logger.error(message, error, { ...this.baseContext, ...context });
  }

  timer(operation: string, additionalContext?: LogContext): LogTimer {
    return new LogTimer(operation, { ...this.baseContext, ...additionalContext });
  }
}

/**
 * Measures one operation and logs its duration when stopped
 */
export class LogTimer {
  private readonly startTime: number;
  private readonly operation: string;
  private readonly context: LogContext;
  private readonly logger: StructuredLogger;

  constructor(operation: string, baseContext: LogContext = {}) {
    this.startTime = performance.now();
    this.operation = operation;
    this.context = baseContext;
    this.logger = StructuredLogger.getInstance();
  }

  stop(level: LogLevel = LogLevel.DEBUG, additionalContext: LogContext = {}): number {
    const duration = Math.round(performance.now() - this.startTime);

    this.logger.log(level, `Operation completed: ${this.operation}`, {
      ...this.context,
      ...additionalContext,
      operation: this.operation,
      duration
    });

    return duration;
  }

  stopWithError(error: Error, additionalContext: LogContext = {}): number {
    return this.stop(LogLevel.ERROR, { ...additionalContext, error });
  }

  stopWithWarning(additionalContext: LogContext = {}): number {
    return this.stop(LogLevel.WARN, additionalContext);
  }
}
