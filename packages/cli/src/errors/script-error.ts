/**
 * Error taxonomy for the efscript pipeline
 */

export type ScriptErrorCode =
  | 'ToolNotFound'
  | 'BuildFailed'
  | 'NoMigrationsFound'
  | 'InsufficientMigrations'
  | 'MigrationNotFound'
  | 'MigrationCreationFailed'
  | 'TicketResolutionFailed'
  | 'ScriptGenerationFailed'
  | 'ConfigurationInvalid';

export interface ScriptErrorDetails {
  stderr?: string;
  suggestions?: string[];
  metadata?: Record<string, unknown>;
}

/**
 * Base error for every failure the pipeline reports. Never retried.
 */
export class ScriptError extends Error {
  public readonly code: ScriptErrorCode;
  public readonly stderr?: string;
  public readonly suggestions: string[];
  public readonly metadata?: Record<string, unknown>;

  constructor(code: ScriptErrorCode, message: string, details: ScriptErrorDetails = {}) {
    super(message);
    this.name = 'ScriptError';
    this.code = code;
    this.stderr = details.stderr?.trim() || undefined;
    this.suggestions = details.suggestions ?? [];
    this.metadata = details.metadata;

    Object.setPrototypeOf(this, ScriptError.prototype);
  }

  static toolNotFound(command: string, suggestions: string[] = []): ScriptError {
    return new ScriptError('ToolNotFound', `Executable not found: ${command}`, {
      suggestions,
      metadata: { command }
    });
  }

  static buildFailed(exitCode: number, stderr: string): ScriptError {
    return new ScriptError('BuildFailed', `Build failed (exit ${exitCode})`, {
      stderr,
      suggestions: ['Fix the compilation errors, or rerun with --skip-build if the binaries are current'],
      metadata: { exitCode }
    });
  }

  static noMigrationsFound(message = 'No migrations found', stderr?: string): ScriptError {
    return new ScriptError('NoMigrationsFound', message, { stderr });
  }

  static insufficientMigrations(count: number): ScriptError {
    return new ScriptError('InsufficientMigrations', `Need at least two migrations to generate a script (found ${count})`, {
      suggestions: [
        'Create a migration with --create <name>',
        'Pass both --from and --to, using --from 0 for the beginning of history'
      ],
      metadata: { count }
    });
  }

  static migrationNotFound(id: string, side: 'from' | 'to'): ScriptError {
    return new ScriptError('MigrationNotFound', `Migration "${id}" given with --${side} does not exist`, {
      suggestions: ['Check the identifier against `dotnet ef migrations list`'],
      metadata: { id, side }
    });
  }

  static migrationCreationFailed(name: string, reason: string, stderr?: string): ScriptError {
    return new ScriptError('MigrationCreationFailed', `Could not create migration "${name}": ${reason}`, {
      stderr,
      metadata: { name }
    });
  }

  static ticketResolutionFailed(reason: string): ScriptError {
    return new ScriptError('TicketResolutionFailed', `Could not resolve a ticket for the script name: ${reason}`, {
      suggestions: ['Pass --ticket <token>']
    });
  }

  static scriptGenerationFailed(exitCode: number, stderr: string): ScriptError {
    return new ScriptError('ScriptGenerationFailed', `Script generation failed (exit ${exitCode})`, {
      stderr,
      metadata: { exitCode }
    });
  }

  static configurationInvalid(message: string, suggestions: string[] = []): ScriptError {
    return new ScriptError('ConfigurationInvalid', message, { suggestions });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stderr: this.stderr,
      suggestions: this.suggestions,
      metadata: this.metadata
    };
  }
}

export function isScriptError(error: unknown): error is ScriptError {
  return error instanceof ScriptError;
}
