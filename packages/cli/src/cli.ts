import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { scriptCommand } from './commands/script.js';
import type { ScriptCommandOptions } from './config/run-config.js';
import { withErrorHandling } from './utils/error-handler.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

export type ScriptAction = (options: ScriptCommandOptions) => Promise<void>;

export function createProgram(action: ScriptAction = scriptCommand): Command {
  const program = new Command();

  program
    .name('efscript')
    .description('Create EF Core migrations and generate the SQL script between two of them')
    .version(readVersion())
    .option('--from <id>', "Start of the script; '0' means the beginning of history")
    .option('--to <id>', 'End of the script (defaults to the latest migration)')
    .option('--ticket <token>', 'Name the script <token>.sql instead of deriving it')
    .option('--context <name>', 'DbContext to use (overrides DBCONTEXT_NAME)')
    .option('--idempotent', 'Generate an idempotent script')
    .option('--skip-build', 'Skip the dotnet build step')
    .option('--create <name>', 'Create a new migration first')
    .option('--no-script', 'Do not generate a SQL script')
    .option('--env <file>', 'Environment file to read')
    .option('--env-dir <dir>', 'Directory searched for *.env files', '.')
    .option('--list-from <source>', "Where migrations are listed from: 'tool' or 'files'")
    .option('--ticket-key <regex>', 'Pattern for the ticket project key (default [A-Z]{2})')
    .option('--verbose', 'Log every external command')
    .action(withErrorHandling((options: ScriptCommandOptions) => action(options)));

  return program;
}
