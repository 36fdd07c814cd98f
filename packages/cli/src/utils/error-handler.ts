import chalk from 'chalk';
import { isScriptError } from '../errors/script-error.js';

/**
 * Format error message with proper styling, captured tool output and suggestions
 */
export function formatError(error: unknown, stage?: string): string {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const prefix = stage ? `[${stage}] ` : '';
  let output = chalk.red(`\n❌ ${prefix}${errorMessage}`);

  if (isScriptError(error)) {
    output += chalk.gray(`\n   (${error.code})`);

    if (error.stderr) {
      output += '\n\n' + chalk.gray('Tool output:');
      error.stderr.split('\n').forEach(line => {
        output += '\n   ' + chalk.gray(line);
      });
    }

    if (error.suggestions.length > 0) {
      output += '\n\n' + chalk.yellow('💡 Suggestions:');
      error.suggestions.forEach(suggestion => {
        output += '\n   ' + chalk.yellow(`• ${suggestion}`);
      });
    }
  }

  return output;
}

/**
 * Print the error and terminate with a nonzero exit code
 */
export function handleError(error: unknown, stage?: string, exitCode: number = 1): never {
  console.error(formatError(error, stage));

  if (process.env.DEBUG) {
    console.error('\n' + chalk.gray('Stack trace:'));
    console.error(chalk.gray(error instanceof Error ? error.stack : 'No stack trace available'));
  }

  process.exit(exitCode);
}

/**
 * Wrap async command handlers with error handling
 */
export function withErrorHandling<A extends unknown[]>(
  handler: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await handler(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
