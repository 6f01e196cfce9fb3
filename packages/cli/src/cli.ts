/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

/**
 * Exit status descriptions for help text
 */
const EXIT_HELP = `
Exit status:
  0  the run completed
  1  usage, configuration or input error
  2  the run ended in the failed state (partial results are still printed)`;

/**
 * Parse a strictly positive integer option value
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('annotext')
    .description(
      'Run a document through sentiment, hate-speech and fact-checking services and summarise the annotations',
    )
    .version(VERSION);

  program
    .command('run')
    .description('Analyze a document with the configured stages')
    .option('-i, --input <file>', 'Input document (default: stdin)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-s, --seed <file>', 'JSON file of claims and the facts to check them against')
    .option('-l, --lang <code>', 'Document language (default: en)')
    .option('--deadline <ms>', 'Run deadline in milliseconds (default: 900000)', parsePositiveInt)
    .option('--continue-on-error', 'Skip failing stages instead of failing the run')
    .option('--json', 'Print the summary as JSON')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--dry-run', 'Check services and inputs without running the pipeline')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .addHelpText('after', EXIT_HELP)
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { runCommand } = await import('./commands/run.js');
      await runCommand(options);
    });

  program
    .command('check')
    .description('Health-check the service behind every enabled stage')
    .option('-c, --config <file>', 'Path to config file')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (options: Record<string, unknown>) => {
      const { checkCommand } = await import('./commands/check.js');
      await checkCommand(options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const input = stringOption(options, 'input');
  if (input !== undefined) result.input = input;
  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;
  const seed = stringOption(options, 'seed');
  if (seed !== undefined) result.seed = seed;
  const lang = stringOption(options, 'lang');
  if (lang !== undefined) result.lang = lang;

  const deadline = options['deadline'];
  if (typeof deadline === 'number') result.deadline = deadline;

  const continueOnError = booleanOption(options, 'continueOnError');
  if (continueOnError !== undefined) result.continueOnError = continueOnError;
  const json = booleanOption(options, 'json');
  if (json !== undefined) result.json = json;
  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  const dryRun = booleanOption(options, 'dryRun');
  if (dryRun !== undefined) result.dryRun = dryRun;

  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
