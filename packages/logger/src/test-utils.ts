import { StructuredLogger } from './structured-logger.js';

/**
 * Force enable logging in tests and pick up the current LOG_* variables
 */
export const enableTestLogging = () => {
  process.env.EFSCRIPT_TEST_LOGS = 'true';
  StructuredLogger.getInstance().reset();
};

/**
 * Disable logging in tests (default behavior)
 */
export const disableTestLogging = () => {
  delete process.env.EFSCRIPT_TEST_LOGS;
  StructuredLogger.getInstance().reset();
};
