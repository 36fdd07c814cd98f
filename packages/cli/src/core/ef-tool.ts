import { createLogger } from '@efscript/logger';
import { ScriptError, isScriptError } from '../errors/script-error.js';
import type { ProcessResult, ProcessRunner, RunConfiguration } from './types.js';

const logger = createLogger('EfTool');

type ToolSelectors = Pick<RunConfiguration, 'repoPath' | 'projectPath' | 'startupProjectPath' | 'contextName'>;

interface EfInvocation {
  mode: 'global' | 'local';
  command: string;
  prefixArgs: string[];
}

const EF_INVOCATIONS: EfInvocation[] = [
  { mode: 'global', command: 'dotnet', prefixArgs: ['ef'] },
  { mode: 'local', command: 'dotnet', prefixArgs: ['tool', 'run', 'dotnet-ef'] },
];

/**
 * The `dotnet ef` migration tool bound to one project/startup-project/context
 */
export class EfTool {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly invocation: EfInvocation,
    private readonly selectors: ToolSelectors
  ) {}

  get mode(): EfInvocation['mode'] {
    return this.invocation.mode;
  }

  /**
   * Lists the migrations compiled into the current binaries; callers build first
   */
  listMigrations(): Promise<ProcessResult> {
    return this.run(['migrations', 'list', '--no-build']);
  }

  addMigration(name: string): Promise<ProcessResult> {
    return this.run(['migrations', 'add', name]);
  }

  /**
   * Without `--no-build` the tool prints its build banner on stdout, ahead of the SQL
   */
  script(from: string, to: string, idempotent: boolean): Promise<ProcessResult> {
    return this.run(['migrations', 'script', from, to, ...(idempotent ? ['--idempotent'] : []), '--no-build']);
  }

  private run(args: string[]): Promise<ProcessResult> {
    const { projectPath, startupProjectPath, contextName, repoPath } = this.selectors;
    return this.runner.run(
      this.invocation.command,
      [
        ...this.invocation.prefixArgs,
        ...args,
        '--project', projectPath,
        '--startup-project', startupProjectPath,
        ...(contextName ? ['--context', contextName] : []),
        '--no-color',
      ],
      { cwd: repoPath }
    );
  }
}

/**
 * Find dotnet-ef, preferring the global tool over a local tool manifest
 */
export async function locateEfTool(runner: ProcessRunner, selectors: ToolSelectors): Promise<EfTool> {
  for (const invocation of EF_INVOCATIONS) {
    let result: ProcessResult;
    try {
      result = await runner.run(invocation.command, [...invocation.prefixArgs, '--version'], { cwd: selectors.repoPath });
    } catch (error) {
      if (isScriptError(error) && error.code === 'ToolNotFound') {
        throw ScriptError.toolNotFound(invocation.command, ['Install the .NET SDK and make sure `dotnet` is on PATH']);
      }
      throw error;
    }

    if (result.exitCode === 0) {
      logger.debug('Located dotnet-ef', { mode: invocation.mode, version: result.stdout.trim() });
      return new EfTool(runner, invocation, selectors);
    }
  }

  throw ScriptError.toolNotFound('dotnet-ef', [
    'Install it globally: dotnet tool install --global dotnet-ef',
    'Or add it to the repository tool manifest: dotnet tool install dotnet-ef',
  ]);
}
