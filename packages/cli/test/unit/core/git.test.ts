import { describe, it, expect } from 'vitest';
import { readCurrentBranch } from '../../../src/core/git.js';
import type { ProcessResult, ProcessRunner } from '../../../src/core/types.js';
import { FakeDotnet } from '../../helpers/fake-dotnet.js';

function answering(result: ProcessResult): ProcessRunner {
  return { run: async () => result };
}

describe('readCurrentBranch', () => {
  it('should return the branch name without the trailing newline', async () => {
    const runner = new FakeDotnet({ branch: 'feature/OS-42-add-users' });

    await expect(readCurrentBranch(runner, '/repo')).resolves.toBe('feature/OS-42-add-users');
    expect(runner.calls).toEqual([{ command: 'git', args: ['rev-parse', '--abbrev-ref', 'HEAD'], cwd: '/repo' }]);
  });

  it('should return undefined outside a repository', async () => {
    await expect(readCurrentBranch(new FakeDotnet(), '/repo')).resolves.toBeUndefined();
  });

  it('should return undefined on a detached HEAD', async () => {
    const runner = answering({ exitCode: 0, stdout: 'HEAD\n', stderr: '' });

    await expect(readCurrentBranch(runner, '/repo')).resolves.toBeUndefined();
  });

  it('should return undefined when git is not installed', async () => {
    await expect(readCurrentBranch(new FakeDotnet({ gitMissing: true }), '/repo')).resolves.toBeUndefined();
  });

  it('should propagate unexpected failures', async () => {
    const runner: ProcessRunner = {
      run: async () => {
        throw new Error('spawn EACCES');
      },
    };

    await expect(readCurrentBranch(runner, '/repo')).rejects.toThrowError('spawn EACCES');
  });
});
