import { basename } from 'path';
import chalk from 'chalk';
import { LogLevel, logger } from '@efscript/logger';
import { type ScriptCommandOptions, loadRunConfiguration } from '../config/run-config.js';
import { PipelineOrchestrator } from '../core/pipeline.js';
import { ExecaProcessRunner } from '../core/process-runner.js';
import { type RunConfiguration, STAGE_LABELS } from '../core/types.js';
import { SpinnerReporter } from '../ui/spinner-reporter.js';
import { handleError } from '../utils/error-handler.js';

function printSummary(config: RunConfiguration): void {
  console.log(chalk.yellow('\n=== Migration script ==='));
  console.log(`Repo:    ${config.repoPath}`);
  console.log(`Project: ${config.projectPath}`);
  console.log(`Startup: ${config.startupProjectPath}`);
  if (config.contextName) console.log(`Context: ${config.contextName}`);
  if (config.createName) console.log(`Create:  ${config.createName}`);
  if (config.from || config.to) console.log(`Range:   ${config.from ?? '(auto)'} → ${config.to ?? '(latest)'}`);
  console.log('='.repeat(24));
}

export async function scriptCommand(options: ScriptCommandOptions): Promise<void> {
  if (options.verbose) {
    logger.configure({ level: LogLevel.DEBUG });
  }

  let loaded: Awaited<ReturnType<typeof loadRunConfiguration>>;
  try {
    loaded = await loadRunConfiguration(options, {
      interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
    });
  } catch (error) {
    handleError(error, 'Configuration');
  }

  const { config, envFile } = loaded;
  console.log(chalk.cyan(`\n🔧 Using environment file: ${basename(envFile)}`));
  printSummary(config);

  const result = await new PipelineOrchestrator(config, new ExecaProcessRunner(), new SpinnerReporter()).run();

  if (!result.ok) {
    handleError(result.error, STAGE_LABELS[result.stage]);
  }

  if (result.outputPath) {
    console.log(chalk.green(`\n✅ SQL script generated: ${result.outputPath}`));
  } else if (result.createdMigration) {
    console.log(chalk.green(`\n✅ Migration created: ${result.createdMigration}`));
    console.log(chalk.yellow('Skipping SQL generation (--no-script)'));
  }
}
