import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { createLogger } from '@efscript/logger';
import { ScriptError } from '../errors/script-error.js';
import type { EfTool } from './ef-tool.js';
import { failureOutput } from './process-runner.js';
import { type MigrationPair, migrationRefToString } from './types.js';

const logger = createLogger('ScriptGenerator');

export interface GenerateScriptOptions {
  pair: MigrationPair;
  idempotent: boolean;
  outputPath: string;
}

/**
 * Emits the SQL for a migration pair and writes it, unmodified, to the output
 * path. An existing file is overwritten.
 */
export class ScriptGenerator {
  constructor(private readonly tool: EfTool) {}

  async generate({ pair, idempotent, outputPath }: GenerateScriptOptions): Promise<string> {
    const from = migrationRefToString(pair.from);
    const result = await this.tool.script(from, pair.to.id, idempotent);

    if (result.exitCode !== 0) {
      throw ScriptError.scriptGenerationFailed(result.exitCode, failureOutput(result));
    }

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, result.stdout, 'utf8');

    logger.info('Script written', { from, to: pair.to.id, idempotent, outputPath, bytes: Buffer.byteLength(result.stdout) });
    return outputPath;
  }
}
