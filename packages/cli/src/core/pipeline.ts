import { join } from 'path';
import { createLogger } from '@efscript/logger';
import { ScriptError, isScriptError } from '../errors/script-error.js';
import { type EfTool, locateEfTool } from './ef-tool.js';
import { readCurrentBranch } from './git.js';
import { DirectoryMigrationLister, type MigrationLister, ToolMigrationLister } from './migration-lister.js';
import { selectMigrationPair } from './migration-pair.js';
import { failureOutput } from './process-runner.js';
import { ScriptGenerator } from './script-generator.js';
import { type ResolvedTicket, resolveTicket } from './ticket-resolver.js';
import {
  type Migration,
  type MigrationPair,
  type PipelineReporter,
  type PipelineResult,
  type PipelineStage,
  type ProcessRunner,
  type RunConfiguration,
  migrationRefToString,
} from './types.js';

const logger = createLogger('Pipeline');

const silentReporter: PipelineReporter = {
  stageStarted: () => {},
  stageSucceeded: () => {},
  stageSkipped: () => {},
  stageFailed: () => {},
};

/**
 * Runs locate-tool, build, list, create, resolve-pair, resolve-output and
 * generate-script in that order. The first failing stage ends the run.
 * Listing and scripting never build; a created migration is compiled by a
 * second build before the pair is resolved.
 */
export class PipelineOrchestrator {
  private currentStage: PipelineStage = 'locate-tool';

  constructor(
    private readonly config: RunConfiguration,
    private readonly runner: ProcessRunner,
    private readonly reporter: PipelineReporter = silentReporter
  ) {}

  async run(): Promise<PipelineResult> {
    try {
      return await this.execute();
    } catch (error) {
      if (!isScriptError(error)) {
        throw error;
      }
      const stage = this.currentStage;
      this.reporter.stageFailed(stage, error);
      logger.error('Pipeline aborted', error, { stage, code: error.code });
      return { ok: false, stage, error };
    }
  }

  private async execute(): Promise<PipelineResult> {
    const { config } = this;

    const tool = await this.step('locate-tool', undefined, () => locateEfTool(this.runner, config), t => `${t.mode} dotnet-ef`);

    if (config.skipBuild) {
      this.reporter.stageSkipped('build', '--skip-build');
    } else {
      await this.step('build', config.startupProjectPath, () => this.build());
    }

    const lister = this.createLister(tool);
    await this.step('list-migrations', undefined, () => this.listBeforeCreation(lister), m => `${m.length} migration(s)`);

    let createdMigration: string | undefined;
    if (config.createName) {
      const name = config.createName;
      await this.step('create-migration', name, () => this.createMigration(tool, name));
      createdMigration = name;
    } else {
      this.reporter.stageSkipped('create-migration', 'no --create given');
    }

    if (createdMigration !== undefined) {
      if (config.skipScript) {
        this.reporter.stageSkipped('generate-script', '--no-script');
        return { ok: true, createdMigration };
      }
      // the new migration exists only as source until the project is compiled again
      await this.step('build', `${config.startupProjectPath} (with ${createdMigration})`, () => this.build());
    } else if (config.skipScript) {
      logger.warn('--no-script only applies together with --create; generating the script');
    }

    const { pair, migrations } = await this.step(
      'resolve-pair',
      undefined,
      () => this.resolvePair(lister, createdMigration),
      ({ pair: p }) => `${migrationRefToString(p.from)} → ${p.to.id}`
    );

    const ticket = await this.step(
      'resolve-output',
      undefined,
      () => this.resolveOutputTicket(migrations),
      t => `${t.token} (from ${t.source})`
    );
    const outputPath = join(config.scriptsDir, `${ticket.token}.sql`);

    await this.step('generate-script', outputPath, () =>
      new ScriptGenerator(tool).generate({ pair, idempotent: config.idempotent, outputPath })
    );

    return { ok: true, outputPath, createdMigration, pair, ticket: ticket.token };
  }

  private async step<T>(
    stage: PipelineStage,
    detail: string | undefined,
    action: () => Promise<T>,
    describe?: (value: T) => string
  ): Promise<T> {
    this.currentStage = stage;
    this.reporter.stageStarted(stage, detail);
    logger.debug('Stage started', { stage, detail });

    const value = await action();

    const summary = describe ? describe(value) : detail;
    this.reporter.stageSucceeded(stage, summary);
    logger.debug('Stage completed', { stage, summary });
    return value;
  }

  private createLister(tool: EfTool): MigrationLister {
    return this.config.migrationSource === 'files'
      ? new DirectoryMigrationLister(this.config.migrationsDir)
      : new ToolMigrationLister(tool);
  }

  private async build(): Promise<void> {
    const result = await this.runner.run('dotnet', ['build', this.config.startupProjectPath], {
      cwd: this.config.repoPath,
    });
    if (result.exitCode !== 0) {
      throw ScriptError.buildFailed(result.exitCode, failureOutput(result));
    }
  }

  private async listBeforeCreation(lister: MigrationLister): Promise<Migration[]> {
    const migrations = await lister.list();
    const name = this.config.createName;

    if (name && migrations.some(m => m.name === name)) {
      throw ScriptError.migrationCreationFailed(name, 'a migration with this name already exists');
    }
    return migrations;
  }

  private async createMigration(tool: EfTool, name: string): Promise<void> {
    const result = await tool.addMigration(name);
    if (result.exitCode !== 0) {
      throw ScriptError.migrationCreationFailed(name, `dotnet-ef exited with ${result.exitCode}`, failureOutput(result));
    }
  }

  private async resolvePair(
    lister: MigrationLister,
    createdMigration: string | undefined
  ): Promise<{ pair: MigrationPair; migrations: Migration[] }> {
    const migrations = await lister.list();

    if (createdMigration !== undefined) {
      const latest: Migration | undefined = migrations[migrations.length - 1];
      if (latest?.name !== createdMigration) {
        throw ScriptError.migrationCreationFailed(
          createdMigration,
          'the new migration is not the latest entry of the migration list'
        );
      }
    }

    const pair = selectMigrationPair(migrations, { from: this.config.from, to: this.config.to });
    return { pair, migrations };
  }

  private async resolveOutputTicket(migrations: Migration[]): Promise<ResolvedTicket> {
    const { ticket, repoPath, ticketKeyPattern } = this.config;
    const branch = ticket === undefined ? await readCurrentBranch(this.runner, repoPath) : undefined;

    return resolveTicket({ override: ticket, branch, migrations, keyPattern: ticketKeyPattern });
  }
}
