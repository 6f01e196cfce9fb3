/**
 * Configuration module exports
 */

// Schema types
export type {
  StageKey,
  StageSettings,
  SentimentStageSettings,
  HateCheckStageSettings,
  FactCheckStageSettings,
  StagesConfigSchema,
  PipelineConfigSchema,
  OutputConfigSchema,
  AnnotextConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_STAGE_ORDER,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_SENTIMENT_STAGE,
  DEFAULT_HATE_CHECK_STAGE,
  DEFAULT_FACT_CHECK_STAGE,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, mapCliToConfig, formatConfig } from './loader.js';
