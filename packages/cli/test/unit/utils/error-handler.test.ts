import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { ScriptError } from '../../../src/errors/script-error.js';
import { formatError, handleError, withErrorHandling } from '../../../src/utils/error-handler.js';

describe('error handler', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('formatError', () => {
    it('should show stage, code, tool output and suggestions', () => {
      const error = ScriptError.buildFailed(1, 'error CS0246: missing type\nerror CS1002: ; expected\n');

      expect(formatError(error, 'Build')).toBe(
        '\n❌ [Build] Build failed (exit 1)' +
          '\n   (BuildFailed)' +
          '\n\nTool output:' +
          '\n   error CS0246: missing type' +
          '\n   error CS1002: ; expected' +
          '\n\n💡 Suggestions:' +
          '\n   • Fix the compilation errors, or rerun with --skip-build if the binaries are current'
      );
    });

    it('should leave out empty sections', () => {
      expect(formatError(ScriptError.noMigrationsFound())).toBe('\n❌ No migrations found\n   (NoMigrationsFound)');
    });

    it('should format plain errors and other values', () => {
      expect(formatError(new Error('boom'))).toBe('\n❌ boom');
      expect(formatError('oops', 'Configuration')).toBe('\n❌ [Configuration] oops');
    });
  });

  describe('handleError', () => {
    it('should print the error and exit with the given code', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit');
      });

      expect(() => handleError(new Error('boom'), 'Build', 2)).toThrowError('process.exit');
      expect(consoleSpy).toHaveBeenCalledWith('\n❌ [Build] boom');
      expect(exitSpy).toHaveBeenCalledWith(2);
    });
  });

  describe('withErrorHandling', () => {
    it('should route rejections to handleError', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit');
      });
      const handler = withErrorHandling(async (name: string) => {
        throw ScriptError.migrationNotFound(name, 'to');
      });

      await expect(handler('AddInvoices')).rejects.toThrowError('process.exit');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });
});
