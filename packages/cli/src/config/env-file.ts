import { readdir, readFile, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import enquirer from 'enquirer';
import { createLogger } from '@efscript/logger';
import { ScriptError } from '../errors/script-error.js';

const logger = createLogger('EnvFile');

/** Remembers the environment file picked last time, next to the candidates */
export const LAST_ENV_FILE = '.last_env';

export type EnvFilePrompt = (choices: string[], initial: string | undefined) => Promise<string>;

export interface EnvFileSelectionOptions {
  /** Explicit --env; skips discovery */
  envFile?: string;
  envDir: string;
  interactive: boolean;
  prompt?: EnvFilePrompt;
}

export async function findEnvFiles(envDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(envDir);
  } catch (error) {
    logger.debug('Cannot read environment directory', { envDir, error });
    throw ScriptError.configurationInvalid(`Environment directory not found: ${envDir}`);
  }
  return entries.filter(entry => entry.endsWith('.env')).sort();
}

async function readLastChoice(envDir: string): Promise<string | undefined> {
  try {
    const value = (await readFile(join(envDir, LAST_ENV_FILE), 'utf8')).trim();
    return value || undefined;
  } catch {
    return undefined;
  }
}

const promptWithEnquirer: EnvFilePrompt = async (choices, initial) => {
  const index = initial ? choices.indexOf(initial) : -1;
  const { envFile } = await enquirer.prompt<{ envFile: string }>({
    type: 'select',
    name: 'envFile',
    message: 'Select environment',
    choices,
    initial: index >= 0 ? index : 0,
  });
  return envFile;
};

/**
 * Decide which environment file configures this run and return its path.
 *
 * `--env` wins. Otherwise a single `*.env` file in `envDir` is used as is;
 * with several, the user picks one on a terminal (defaulting to the last
 * choice) and the remembered choice is used elsewhere.
 */
export async function selectEnvFile(options: EnvFileSelectionOptions): Promise<string> {
  if (options.envFile) {
    return resolve(options.envFile);
  }

  const envDir = resolve(options.envDir);
  const candidates = await findEnvFiles(envDir);

  if (candidates.length === 0) {
    throw ScriptError.configurationInvalid(`No *.env files found in ${envDir}`, [
      'Create one with REPO_PATH, PROJECT_NAME, STARTUP_PROJECT, MIGRATIONS_DIR and SCRIPTS_DIR',
      'Or point at one with --env <file>',
    ]);
  }
  if (candidates.length === 1) {
    return join(envDir, candidates[0]);
  }

  const lastChoice = await readLastChoice(envDir);
  const remembered = lastChoice && candidates.includes(lastChoice) ? lastChoice : undefined;

  if (!options.interactive) {
    if (!remembered) {
      throw ScriptError.configurationInvalid(`Several environment files found in ${envDir}: ${candidates.join(', ')}`, [
        'Pass --env <file>',
      ]);
    }
    logger.debug('Using remembered environment file', { envFile: remembered });
    return join(envDir, remembered);
  }

  const prompt = options.prompt ?? promptWithEnquirer;
  const chosen = await prompt(candidates, remembered);
  if (!candidates.includes(chosen)) {
    throw ScriptError.configurationInvalid(`Unknown environment file: ${chosen}`);
  }

  await writeFile(join(envDir, LAST_ENV_FILE), chosen, 'utf8');
  return join(envDir, chosen);
}
