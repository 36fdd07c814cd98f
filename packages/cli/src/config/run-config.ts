import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { createLogger } from '@efscript/logger';
import { ScriptError } from '../errors/script-error.js';
import { DEFAULT_TICKET_KEY_PATTERN, assertValidTicketKeyPattern } from '../core/ticket-resolver.js';
import type { RunConfiguration } from '../core/types.js';
import { type EnvFilePrompt, selectEnvFile } from './env-file.js';

const logger = createLogger('Config');

const required = (key: string) => z.string({ required_error: `${key} is required` }).trim();

const envSchema = z.object({
  REPO_PATH: required('REPO_PATH'),
  PROJECT_NAME: required('PROJECT_NAME'),
  STARTUP_PROJECT: required('STARTUP_PROJECT'),
  MIGRATIONS_DIR: required('MIGRATIONS_DIR'),
  SCRIPTS_DIR: required('SCRIPTS_DIR'),
  DBCONTEXT_NAME: z.string().trim().optional(),
  MIGRATION_SOURCE: z.enum(['tool', 'files']).optional(),
  TICKET_KEY_PATTERN: z.string().optional(),
});

export type EnvValues = z.infer<typeof envSchema>;

const MIGRATION_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Options as commander hands them to the action */
export interface ScriptCommandOptions {
  from?: string;
  to?: string;
  ticket?: string;
  context?: string;
  idempotent?: boolean;
  skipBuild?: boolean;
  create?: string;
  /** false with --no-script */
  script?: boolean;
  env?: string;
  envDir?: string;
  listFrom?: string;
  ticketKey?: string;
  verbose?: boolean;
}

const optionsSchema = z.object({
  create: z
    .string()
    .regex(MIGRATION_NAME, 'migration names must be identifiers (letters, digits, underscores)')
    .optional(),
  listFrom: z.enum(['tool', 'files']).optional(),
});

function formatIssues(prefix: string, issues: z.ZodIssue[]): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.');
    return issue.message.startsWith(path) ? issue.message : `${prefix}${path}: ${issue.message}`;
  });
}

/**
 * Merge environment-file values and CLI flags into the immutable record one
 * run works from. Paths are resolved here: REPO_PATH against the environment
 * file's directory, everything else against the repository.
 */
export function buildRunConfiguration(
  values: Record<string, string>,
  envFileDir: string,
  options: ScriptCommandOptions
): RunConfiguration {
  const present = Object.fromEntries(Object.entries(values).filter(([, value]) => value.trim() !== ''));
  const env = envSchema.safeParse(present);
  const flags = optionsSchema.safeParse({ create: options.create, listFrom: options.listFrom });

  const problems: string[] = [];
  if (!env.success) {
    problems.push(...formatIssues('', env.error.issues));
  }
  if (!flags.success) {
    problems.push(...formatIssues('--', flags.error.issues));
  }

  const ticketKeyPattern = options.ticketKey ?? (env.success ? env.data.TICKET_KEY_PATTERN : undefined) ?? DEFAULT_TICKET_KEY_PATTERN;
  try {
    assertValidTicketKeyPattern(ticketKeyPattern);
  } catch (error) {
    problems.push(error instanceof Error ? error.message : String(error));
  }

  if (!env.success || !flags.success || problems.length > 0) {
    throw ScriptError.configurationInvalid(`Invalid configuration:\n${problems.map(p => `  • ${p}`).join('\n')}`);
  }

  const repoPath = resolve(envFileDir, env.data.REPO_PATH);
  const config: RunConfiguration = {
    repoPath,
    projectPath: resolve(repoPath, env.data.PROJECT_NAME),
    startupProjectPath: resolve(repoPath, env.data.STARTUP_PROJECT),
    migrationsDir: resolve(repoPath, env.data.MIGRATIONS_DIR),
    scriptsDir: resolve(repoPath, env.data.SCRIPTS_DIR),
    contextName: options.context ?? env.data.DBCONTEXT_NAME,
    idempotent: options.idempotent ?? false,
    skipBuild: options.skipBuild ?? false,
    skipScript: options.script === false,
    from: options.from,
    to: options.to,
    ticket: options.ticket,
    createName: flags.data.create,
    migrationSource: flags.data.listFrom ?? env.data.MIGRATION_SOURCE ?? 'tool',
    ticketKeyPattern,
  };

  return Object.freeze(config);
}

export async function readEnvFile(path: string): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    logger.debug('Cannot read environment file', { path, error });
    throw ScriptError.configurationInvalid(`Environment file not found: ${path}`);
  }
  return dotenv.parse(content);
}

export interface LoadOptions {
  interactive: boolean;
  cwd?: string;
  prompt?: EnvFilePrompt;
}

/**
 * Pick the environment file, read it and build the run configuration
 */
export async function loadRunConfiguration(
  options: ScriptCommandOptions,
  { interactive, cwd = process.cwd(), prompt }: LoadOptions
): Promise<{ config: RunConfiguration; envFile: string }> {
  const envFile = await selectEnvFile({
    envFile: options.env ? resolve(cwd, options.env) : undefined,
    envDir: resolve(cwd, options.envDir ?? '.'),
    interactive,
    prompt,
  });

  const values = await readEnvFile(envFile);
  const config = buildRunConfiguration(values, dirname(envFile), options);
  logger.debug('Configuration loaded', { envFile, repoPath: config.repoPath, migrationSource: config.migrationSource });
  return { config, envFile };
}
