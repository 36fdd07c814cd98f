import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ScriptError } from '../errors/script-error.js';
import { type PipelineReporter, type PipelineStage, STAGE_LABELS } from '../core/types.js';

/**
 * Renders pipeline progress as one spinner per stage
 */
export class SpinnerReporter implements PipelineReporter {
  private spinner: Ora | undefined;

  stageStarted(stage: PipelineStage, detail?: string): void {
    this.spinner = ora(this.label(stage, detail)).start();
  }

  stageSucceeded(stage: PipelineStage, detail?: string): void {
    this.spinner?.succeed(this.label(stage, detail));
    this.spinner = undefined;
  }

  stageSkipped(stage: PipelineStage, reason: string): void {
    ora().info(chalk.gray(`${STAGE_LABELS[stage]} skipped (${reason})`));
  }

  stageFailed(stage: PipelineStage, error: ScriptError): void {
    const text = chalk.red(`${STAGE_LABELS[stage]} failed: ${error.code}`);
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = undefined;
    } else {
      ora().fail(text);
    }
  }

  private label(stage: PipelineStage, detail?: string): string {
    return detail ? `${STAGE_LABELS[stage]} ${chalk.gray(detail)}` : STAGE_LABELS[stage];
  }
}
