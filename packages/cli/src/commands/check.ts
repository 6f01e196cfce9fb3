/**
 * Check command implementation
 */

import chalk from 'chalk';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { ExitCode, createServiceError, formatError, handleError } from '../errors/index.js';
import { buildStages, performHealthChecks } from '../orchestrator/services.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Health-check every enabled stage; exit 1 if any service is down
 */
export async function checkCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);

  try {
    const config = await loadConfig(options);
    if (!config.output.color) {
      chalk.level = 0;
    }

    const reporter = new ProgressReporter({ color: config.output.color });
    reporter.printHeader(VERSION);

    const stages = buildStages(config);
    if (stages.length === 0) {
      reporter.printWarning('No stages are enabled');
      return;
    }

    const healthStatus = await performHealthChecks(stages);
    reporter.reportServiceStatus(healthStatus);

    const down = healthStatus.filter((s) => !s.healthy);
    if (down.length === 0) {
      reporter.printSuccess('All services healthy');
      return;
    }

    for (const service of down) {
      console.error(
        formatError(createServiceError(service.name, service.key, service.endpoint, service.error)),
      );
      console.error('');
    }
    process.exitCode = ExitCode.ERROR;
  } catch (error) {
    handleError(error);
  }
}
