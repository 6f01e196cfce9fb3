/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Process exit codes
 */
export const ExitCode = {
  /** The run completed */
  SUCCESS: 0,
  /** Usage, configuration or input error */
  ERROR: 1,
  /** The pipeline ran and ended in the failed state */
  RUN_FAILED: 2,
} as const;

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = ExitCode.ERROR,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Input document error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Seed file error. `entry` is the 1-based position of the offending seed.
 */
export class SeedError extends CliError {
  constructor(
    message: string,
    public readonly entry?: number,
    suggestion?: string,
  ) {
    super(message, suggestion);
    this.name = 'SeedError';
  }

  override format(): string {
    const location = this.entry !== undefined ? ` (entry ${this.entry})` : '';
    const lines = [`Seed Error${location}: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Service connection error
 */
export class ServiceError extends CliError {
  constructor(
    public readonly serviceName: string,
    message: string,
    suggestion?: string,
  ) {
    super(message, suggestion);
    this.name = 'ServiceError';
  }

  override format(): string {
    const lines = [`Error [${this.serviceName}]: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}
