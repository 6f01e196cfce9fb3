/**
 * Error handling utilities
 */

import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, ExitCode, ServiceError } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode: number = ExitCode.ERROR;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}

/**
 * Create a service error with a suggestion naming the config key that
 * disables the stage
 */
export function createServiceError(
  serviceName: string,
  configKey: string,
  endpoint: string,
  reason?: string,
): ServiceError {
  const message = `Service unavailable at ${endpoint}${reason ? ` (${reason})` : ''}`;
  const suggestion =
    `Start the ${serviceName} service, point stages.${configKey}.endpoint at it, ` +
    `or set stages.${configKey}.enabled to false`;

  return new ServiceError(serviceName, message, suggestion);
}
