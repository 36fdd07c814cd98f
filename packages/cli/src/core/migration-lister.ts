import { readdir } from 'fs/promises';
import { createLogger } from '@efscript/logger';
import { ScriptError } from '../errors/script-error.js';
import type { EfTool } from './ef-tool.js';
import { failureOutput } from './process-runner.js';
import type { Migration } from './types.js';

const logger = createLogger('MigrationLister');

const MIGRATION_ID = /^(\d{14})_([A-Za-z_][A-Za-z0-9_]*)$/;
// `dotnet ef migrations list` may annotate entries, e.g. "20240101000000_Init (Pending)"
const MIGRATION_LINE = /^(\d{14}_[A-Za-z_][A-Za-z0-9_]*)(?:\s+\(.*\))?$/;
const MIGRATION_FILE = /^(\d{14}_[A-Za-z_][A-Za-z0-9_]*)\.cs$/i;

export function parseMigrationId(value: string): Migration | undefined {
  const match = MIGRATION_ID.exec(value.trim());
  if (!match) {
    return undefined;
  }
  return { id: match[0], timestamp: match[1], name: match[2] };
}

/**
 * Parse the tool's listing. Lines that are not migration identifiers (build
 * banners, warnings) are skipped; order is preserved.
 */
export function parseMigrationList(output: string): Migration[] {
  const migrations: Migration[] = [];
  let skipped = 0;

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const match = MIGRATION_LINE.exec(line);
    const migration = match ? parseMigrationId(match[1]) : undefined;
    if (migration) {
      migrations.push(migration);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.debug('Ignored non-migration lines in tool output', { skipped });
  }
  return migrations;
}

export interface MigrationLister {
  readonly source: 'tool' | 'files';
  list(): Promise<Migration[]>;
}

/**
 * Asks `dotnet ef migrations list`
 */
export class ToolMigrationLister implements MigrationLister {
  readonly source = 'tool';

  constructor(private readonly tool: EfTool) {}

  async list(): Promise<Migration[]> {
    const result = await this.tool.listMigrations();
    if (result.exitCode !== 0) {
      throw ScriptError.noMigrationsFound(`Listing migrations failed (exit ${result.exitCode})`, failureOutput(result));
    }
    const migrations = parseMigrationList(result.stdout);
    logger.debug('Listed migrations', { count: migrations.length, source: this.source });
    return migrations;
  }
}

/**
 * Reads `<timestamp>_<Name>.cs` files from the migrations directory, without
 * building anything
 */
export class DirectoryMigrationLister implements MigrationLister {
  readonly source = 'files';

  constructor(private readonly migrationsDir: string) {}

  async list(): Promise<Migration[]> {
    let entries: string[];
    try {
      entries = await readdir(this.migrationsDir);
    } catch (error) {
      logger.debug('Cannot read migrations directory', { migrationsDir: this.migrationsDir, error });
      throw ScriptError.configurationInvalid(`Migrations directory not found: ${this.migrationsDir}`, [
        'Check MIGRATIONS_DIR in the environment file'
      ]);
    }

    const migrations: Migration[] = [];
    for (const entry of entries) {
      if (entry.endsWith('.Designer.cs') || entry.endsWith('ModelSnapshot.cs')) {
        continue;
      }
      const match = MIGRATION_FILE.exec(entry);
      const migration = match ? parseMigrationId(match[1]) : undefined;
      if (migration) {
        migrations.push(migration);
      }
    }

    migrations.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    logger.debug('Listed migrations', { count: migrations.length, source: this.source });
    return migrations;
  }
}

/**
 * Fail unless at least `count` migrations exist
 */
export function requireAtLeast(migrations: Migration[], count: 1 | 2): void {
  if (count === 1 && migrations.length === 0) {
    throw ScriptError.noMigrationsFound();
  }
  if (count === 2 && migrations.length < 2) {
    throw ScriptError.insufficientMigrations(migrations.length);
  }
}
