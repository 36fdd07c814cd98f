import type { ScriptError } from '../errors/script-error.js';

export interface Migration {
  /** `<timestamp>_<name>`, as the migration tool prints it */
  id: string;
  /** 14-digit creation timestamp, sorts chronologically */
  timestamp: string;
  name: string;
}

/** "Before the first migration". The migration tool spells it `0`. */
export const BEGINNING_OF_HISTORY = Symbol('beginning-of-history');

export type MigrationRef = Migration | typeof BEGINNING_OF_HISTORY;

export interface MigrationPair {
  from: MigrationRef;
  to: Migration;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd: string;
}

export interface ProcessRunner {
  /**
   * Resolves with the exit status of the command, whatever it is.
   * Rejects with a `ToolNotFound` ScriptError when the executable cannot be launched.
   */
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

export type MigrationSource = 'tool' | 'files';

export interface RunConfiguration {
  readonly repoPath: string;
  readonly projectPath: string;
  readonly startupProjectPath: string;
  readonly migrationsDir: string;
  readonly scriptsDir: string;
  readonly contextName?: string;
  readonly idempotent: boolean;
  readonly skipBuild: boolean;
  readonly skipScript: boolean;
  readonly from?: string;
  readonly to?: string;
  readonly ticket?: string;
  readonly createName?: string;
  readonly migrationSource: MigrationSource;
  /** Regex source for the project key of a ticket, e.g. `[A-Z]{2}` */
  readonly ticketKeyPattern: string;
}

export type PipelineStage =
  | 'locate-tool'
  | 'build'
  | 'list-migrations'
  | 'create-migration'
  | 'resolve-pair'
  | 'resolve-output'
  | 'generate-script';

export const STAGE_LABELS: Record<PipelineStage, string> = {
  'locate-tool': 'Locate dotnet-ef',
  build: 'Build',
  'list-migrations': 'List migrations',
  'create-migration': 'Create migration',
  'resolve-pair': 'Resolve migration pair',
  'resolve-output': 'Resolve output name',
  'generate-script': 'Generate script'
};

export type PipelineResult =
  | {
      ok: true;
      outputPath?: string;
      createdMigration?: string;
      pair?: MigrationPair;
      ticket?: string;
    }
  | {
      ok: false;
      stage: PipelineStage;
      error: ScriptError;
    };

/**
 * Progress callbacks; the CLI renders them as spinners
 */
export interface PipelineReporter {
  stageStarted(stage: PipelineStage, detail?: string): void;
  stageSucceeded(stage: PipelineStage, detail?: string): void;
  stageSkipped(stage: PipelineStage, reason: string): void;
  stageFailed(stage: PipelineStage, error: ScriptError): void;
}

export function migrationRefToString(ref: MigrationRef): string {
  return ref === BEGINNING_OF_HISTORY ? '0' : ref.id;
}
