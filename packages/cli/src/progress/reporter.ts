/**
 * Progress reporter with ora spinners
 *
 * Driven by the pipeline executor's observer hooks: one spinner per stage,
 * resolved as succeeded, skipped or failed.
 */

import type { PipelineObserver, PipelineRunResult, Stage, StageRecord } from '@annotext/core';
import ora, { type Ora, type Color } from 'ora';

import type { SkippedSeed } from '../orchestrator/seeds.js';

import { createColorFns, formatDuration } from './formatters.js';
import type { ColorFunctions, ProgressReporterOptions, ServiceStatus } from './types.js';

export type { ServiceStatus, ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter implements PipelineObserver {
  private spinner: Ora | null = null;
  private stageCount = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`annotext v${version}`));
    console.log('');
  }

  /**
   * Report service health check results
   */
  reportServiceStatus(services: ServiceStatus[]): void {
    if (this.silent) return;

    console.log(this.c.dim('Checking services...'));
    for (const service of services) {
      const status = service.healthy ? this.c.green('✓') : this.c.red('✗');
      const endpoint = service.endpoint ? ` (${service.endpoint})` : '';
      const latency =
        service.healthy && service.latencyMs !== undefined
          ? this.c.dim(` - ${service.latencyMs}ms`)
          : '';
      const error = service.error ? this.c.red(` (${service.error})`) : '';

      console.log(`  ${status} ${service.name}${endpoint}${latency}${error}`);
    }
    console.log('');
  }

  /**
   * Warn about a seed entry that was left out
   */
  reportSkippedSeed(seed: SkippedSeed): void {
    this.printWarning(`Seed ${seed.entry} skipped: ${seed.reason}`);
  }

  onRunStart(stages: readonly Stage[]): void {
    this.stageCount = stages.length;
    if (this.silent) return;
    console.log(this.c.bold(`Running ${this.stageCount} stage${this.stageCount === 1 ? '' : 's'}`));
  }

  onStageStart(stage: Stage, index: number): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.stop();
    }

    // Only include a color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: `${stage.name} (${index + 1}/${this.stageCount})`,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  onStageComplete(stage: Stage, record: StageRecord): void {
    if (this.silent) return;

    const added = record.annotationsAdded;
    const text = `${stage.name}${this.c.dim(`: ${added} annotation${added === 1 ? '' : 's'} (${formatDuration(record.durationMs)})`)}`;
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${text}`);
    }
  }

  onStageFailed(stage: Stage, _record: StageRecord, error: Error, skipped: boolean): void {
    if (this.silent) return;

    const text = skipped
      ? `${stage.name}${this.c.yellow(` skipped: ${error.message}`)}`
      : `${stage.name}${this.c.red(`: ${error.message}`)}`;
    if (this.spinner) {
      if (skipped) {
        this.spinner.warn(text);
      } else {
        this.spinner.fail(text);
      }
      this.spinner = null;
    } else {
      console.log(`  ${skipped ? this.c.yellow('~') : this.c.red('✗')} ${text}`);
    }
  }

  onRunComplete(result: PipelineRunResult): void {
    this.stop();
    if (this.silent) return;
    const status =
      result.status === 'completed' ? this.c.green(result.status) : this.c.red(result.status);
    console.log(`Run ${status} in ${formatDuration(result.durationMs)}`);
    console.log('');
  }

  /**
   * Print a plain message
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message
   */
  printWarning(message: string): void {
    if (this.silent) return;
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    if (this.silent) return;
    console.log(this.c.red(`✗ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Color functions matching the reporter's color setting
   */
  get colors(): ColorFunctions {
    return this.c;
  }
}
