import { execa, ExecaError } from 'execa';
import { createLogger } from '@efscript/logger';
import { ScriptError } from '../errors/script-error.js';
import type { ProcessResult, ProcessRunner, RunOptions } from './types.js';

const logger = createLogger('ProcessRunner');

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Runs external commands through execa. Output is captured untrimmed so that
 * SQL emitted on stdout reaches the script file byte for byte.
 */
export class ExecaProcessRunner implements ProcessRunner {
  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    const commandLine = [command, ...args].join(' ');
    const timer = logger.timer(commandLine, { cwd: options.cwd });
    logger.debug('Running command', { command: commandLine, cwd: options.cwd });

    try {
      const result = await execa(command, args, {
        cwd: options.cwd,
        stripFinalNewline: false,
      });
      timer.stop(undefined, { exitCode: 0 });
      return {
        exitCode: result.exitCode ?? 0,
        stdout: asText(result.stdout),
        stderr: asText(result.stderr),
      };
    } catch (error) {
      if (!(error instanceof ExecaError)) {
        throw error;
      }
      if (error.code === 'ENOENT') {
        timer.stopWithError(error);
        throw ScriptError.toolNotFound(command);
      }

      const exitCode = error.exitCode ?? 1;
      timer.stopWithWarning({ exitCode });
      return {
        exitCode,
        stdout: asText(error.stdout),
        stderr: asText(error.stderr),
      };
    }
  }
}

/**
 * The most useful text to show for a failed command. dotnet writes compiler
 * errors to stdout, so fall back to it when stderr is empty.
 */
export function failureOutput(result: ProcessResult): string {
  return result.stderr.trim() ? result.stderr : result.stdout;
}
