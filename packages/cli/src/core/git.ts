import { createLogger } from '@efscript/logger';
import { isScriptError } from '../errors/script-error.js';
import type { ProcessRunner } from './types.js';

const logger = createLogger('Git');

/**
 * Current branch of the repository at `repoPath`, or undefined when there is
 * none to read: not a repository, detached HEAD, or git not installed.
 */
export async function readCurrentBranch(runner: ProcessRunner, repoPath: string): Promise<string | undefined> {
  try {
    const result = await runner.run('git', ['rev-parse', '--abbrev-ref', 'HEAD'], { cwd: repoPath });
    const branch = result.stdout.trim();

    if (result.exitCode !== 0 || !branch || branch === 'HEAD') {
      logger.debug('No branch name available', { exitCode: result.exitCode, branch });
      return undefined;
    }
    return branch;
  } catch (error) {
    if (isScriptError(error) && error.code === 'ToolNotFound') {
      logger.debug('git is not installed');
      return undefined;
    }
    throw error;
  }
}
