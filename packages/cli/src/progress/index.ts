/**
 * Progress module exports
 */

export { ProgressReporter } from './reporter.js';
export type { ServiceStatus, ProgressReporterOptions, ColorFunctions } from './types.js';
export {
  createColorFns,
  formatConfigDisplay,
  formatDuration,
  formatJson,
  formatSpan,
  formatStageRecord,
  formatSummary,
  toJsonReport,
  truncate,
} from './formatters.js';
export type { JsonReport, JsonStageRecord } from './formatters.js';
