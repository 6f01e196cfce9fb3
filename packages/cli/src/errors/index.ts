/**
 * Error module exports
 */

export {
  ExitCode,
  CliError,
  ConfigError,
  InputError,
  SeedError,
  ServiceError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError, createServiceError } from './handler.js';
