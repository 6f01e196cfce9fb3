/**
 * Run command implementation
 */

import * as fs from 'node:fs';

import chalk from 'chalk';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { ExitCode, InputError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { orchestrateRun } from '../orchestrator/orchestrator.js';
import { loadSeedFile } from '../orchestrator/seeds.js';
import { buildStages, performHealthChecks } from '../orchestrator/services.js';
import { formatConfigDisplay, formatJson, formatSummary } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Read the document from a file or stdin, byte for byte
 */
async function readInput(inputPath: string | undefined): Promise<string> {
  if (inputPath) {
    const absolutePath = resolveAbsolutePath(inputPath);
    if (!fs.existsSync(absolutePath)) {
      throw new InputError(
        `Input file not found: ${absolutePath}`,
        'Check the file path and try again',
      );
    }
    return fs.readFileSync(absolutePath, 'utf-8');
  }

  // Check if stdin is a TTY (no piped input)
  if (process.stdin.isTTY) {
    throw new InputError(
      'No input provided',
      'Provide a document with --input or pipe text to stdin',
    );
  }

  process.stdin.setEncoding('utf-8');
  const chunks: string[] = [];
  try {
    for await (const chunk of process.stdin) {
      chunks.push(String(chunk));
    }
  } catch (error) {
    throw new InputError(
      `Failed to read from stdin: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return chunks.join('');
}

/**
 * Main run command handler
 */
export async function runCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  let reporter: ProgressReporter | undefined;
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();

  try {
    const config = await loadConfig(options);
    if (!config.output.color) {
      chalk.level = 0;
    }

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    // Progress goes quiet when stdout carries JSON
    const activeReporter = new ProgressReporter({
      color: config.output.color,
      silent: config.output.json,
    });
    reporter = activeReporter;
    activeReporter.printHeader(VERSION);

    const stages = buildStages(config);

    // Dry-run mode: validate setup without running the pipeline
    if (options.dryRun) {
      const healthStatus = await performHealthChecks(stages);
      activeReporter.reportServiceStatus(healthStatus);

      if (healthStatus.every((s) => s.healthy)) {
        activeReporter.printSuccess('All services healthy. Ready to run.');
      } else {
        activeReporter.printWarning('Some services unavailable:');
        for (const service of healthStatus.filter((s) => !s.healthy)) {
          activeReporter.printMessage(`  - ${service.name}: ${service.error ?? 'unhealthy'}`);
        }
      }

      if (options.input) {
        const inputPath = resolveAbsolutePath(options.input);
        if (fs.existsSync(inputPath)) {
          activeReporter.printSuccess(`Input file exists: ${inputPath}`);
        } else {
          activeReporter.printError(`Input file not found: ${inputPath}`);
        }
      }

      if (options.seed) {
        const seeds = loadSeedFile(resolveAbsolutePath(options.seed));
        activeReporter.printSuccess(`Seed file is valid: ${seeds.length} entries`);
      }

      activeReporter.printMessage('');
      activeReporter.printMessage('Dry-run complete. No stages were run.');
      return;
    }

    const text = await readInput(options.input);
    const seeds = options.seed ? loadSeedFile(resolveAbsolutePath(options.seed)) : [];

    process.once('SIGINT', onInterrupt);
    const report = await orchestrateRun({ text, seeds }, config, {
      stages: stages.map((stage) => stage.client),
      observer: activeReporter,
      signal: controller.signal,
      onSeedSkipped: (seed) => activeReporter.reportSkippedSeed(seed),
    });

    if (config.output.json) {
      process.stdout.write(`${formatJson(report)}\n`);
    } else {
      console.log(formatSummary(report, activeReporter.colors));
    }

    if (report.run.status === 'failed') {
      process.exitCode = ExitCode.RUN_FAILED;
    }
  } catch (error) {
    reporter?.stop();
    handleError(error);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
