import { ScriptError } from '../../src/errors/script-error.js';
import type { ProcessResult, ProcessRunner, RunConfiguration, RunOptions } from '../../src/core/types.js';

export interface RecordedCall {
  command: string;
  args: string[];
  cwd: string;
}

export interface FakeDotnetOptions {
  migrations?: string[];
  /** Which dotnet-ef installation answers `--version`; 'none' means neither */
  efMode?: 'global' | 'local' | 'none';
  dotnetMissing?: boolean;
  gitMissing?: boolean;
  branch?: string;
  buildResult?: Partial<ProcessResult>;
  listResult?: Partial<ProcessResult>;
  addResult?: Partial<ProcessResult>;
  scriptResult?: Partial<ProcessResult>;
  /** Timestamp given to the next created migration */
  addTimestamp?: string;
}

const ok = (stdout = ''): ProcessResult => ({ exitCode: 0, stdout, stderr: '' });

export const BUILD_BANNER = 'Build started...\nBuild succeeded.\n';

export function fakeScript(from: string, to: string, idempotent: boolean): string {
  return `-- ${from} -> ${to}${idempotent ? ' (idempotent)' : ''}\r\nSELECT 1;\n\n`;
}

/**
 * In-process stand-in for `dotnet`, `dotnet ef` and `git`. Records every call.
 *
 * Migrations live in two lists: the source files, which `migrations add`
 * appends to, and the compiled ones, which a build copies from the source.
 * `migrations list` and `migrations script` build first and print the build
 * banner on stdout unless given `--no-build`; either way they only see
 * compiled migrations. `migrations add` builds before it scaffolds, so the
 * new migration stays uncompiled until the next build.
 */
export class FakeDotnet implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  readonly migrations: string[];
  private compiled: string[];

  constructor(private readonly options: FakeDotnetOptions = {}) {
    this.migrations = [...(options.migrations ?? [])];
    this.compiled = [...this.migrations];
  }

  /** `dotnet build` invocations */
  get builds(): RecordedCall[] {
    return this.calls.filter(call => call.command === 'dotnet' && call.args[0] === 'build');
  }

  /** Calls as command lines, e.g. `dotnet ef migrations list` */
  get commandLines(): string[] {
    return this.calls.map(call => [call.command, ...call.args].join(' '));
  }

  callsTo(subcommand: string): RecordedCall[] {
    return this.calls.filter(call => call.args.join(' ').includes(subcommand));
  }

  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    this.calls.push({ command, args, cwd: options.cwd });

    if (command === 'git') {
      if (this.options.gitMissing) {
        throw ScriptError.toolNotFound('git');
      }
      return this.options.branch === undefined
        ? { exitCode: 128, stdout: '', stderr: 'fatal: not a git repository' }
        : ok(`${this.options.branch}\n`);
    }

    if (command !== 'dotnet' || this.options.dotnetMissing) {
      throw ScriptError.toolNotFound(command);
    }

    if (args[0] === 'build') {
      const result = { ...ok('Build succeeded.\n'), ...this.options.buildResult };
      if (result.exitCode === 0) {
        this.compile();
      }
      return result;
    }

    let efArgs: string[];
    let mode: 'global' | 'local';
    if (args[0] === 'ef') {
      mode = 'global';
      efArgs = args.slice(1);
    } else if (args.slice(0, 3).join(' ') === 'tool run dotnet-ef') {
      mode = 'local';
      efArgs = args.slice(3);
    } else {
      return { exitCode: 1, stdout: '', stderr: `unknown command: ${args.join(' ')}` };
    }

    const efMode = this.options.efMode ?? 'global';
    if (efMode !== mode) {
      return { exitCode: 1, stdout: '', stderr: 'Could not execute because the specified command or file was not found.' };
    }

    const [group, action, ...rest] = efArgs;
    if (group === '--version') {
      return ok('8.0.4\n');
    }
    if (group !== 'migrations') {
      return { exitCode: 1, stdout: '', stderr: `unknown ef command: ${efArgs.join(' ')}` };
    }

    let banner = '';
    if ((action === 'list' || action === 'script') && !rest.includes('--no-build')) {
      this.compile();
      banner = BUILD_BANNER;
    }

    switch (action) {
      case 'list':
        return {
          ...ok(banner + [...[...this.compiled].sort(), ''].join('\n')),
          ...this.options.listResult,
        };
      case 'add': {
        const failure = this.options.addResult;
        if (failure && failure.exitCode !== undefined && failure.exitCode !== 0) {
          return { ...ok(), ...failure };
        }
        this.compile();
        const id = `${this.options.addTimestamp ?? '20250101000000'}_${rest[0]}`;
        this.migrations.push(id);
        return ok(`Done. To undo this action, use 'ef migrations remove'\n`);
      }
      case 'script': {
        const [from, to] = rest;
        const missing = [from, to].find(id => id !== '0' && !this.compiled.includes(id));
        if (missing !== undefined) {
          return { exitCode: 1, stdout: banner, stderr: `The migration '${missing}' was not found.\n` };
        }
        return { ...ok(banner + fakeScript(from, to, rest.includes('--idempotent'))), ...this.options.scriptResult };
      }
      default:
        return { exitCode: 1, stdout: '', stderr: `unknown migrations command: ${action}` };
    }
  }

  private compile(): void {
    this.compiled = [...this.migrations];
  }
}

export function testConfig(overrides: Partial<RunConfiguration> = {}): RunConfiguration {
  return {
    repoPath: '/repo',
    projectPath: '/repo/src/App.Data',
    startupProjectPath: '/repo/src/App.Api',
    migrationsDir: '/repo/src/App.Data/Migrations',
    scriptsDir: '/repo/scripts',
    idempotent: false,
    skipBuild: false,
    skipScript: false,
    migrationSource: 'tool',
    ticketKeyPattern: '[A-Z]{2}',
    ...overrides,
  };
}
