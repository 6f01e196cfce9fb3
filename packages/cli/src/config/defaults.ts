/**
 * Default configuration values
 */

import {
  DEFAULT_FACT_CHECK_CONFIG,
  DEFAULT_HATE_CHECK_CONFIG,
  DEFAULT_HATE_CHECK_OPTIONS,
  DEFAULT_SENTIMENT_CONFIG,
  DEFAULT_SENTIMENT_OPTIONS,
} from '@annotext/stage-client';
import type { StageEndpointConfig } from '@annotext/types';

import type {
  AnnotextConfig,
  FactCheckStageSettings,
  HateCheckStageSettings,
  OutputConfigSchema,
  PipelineConfigSchema,
  SentimentStageSettings,
  StageKey,
  StageSettings,
} from './schema.js';

function enabledStage(config: StageEndpointConfig): StageSettings {
  return {
    enabled: true,
    endpoint: config.endpoint,
    scale: config.scale,
    timeoutMs: config.timeoutMs,
    parameters: { ...config.parameters },
    continueOnError: config.continueOnError,
  };
}

/**
 * Default stage order: sentiment, then hate speech, then fact checking
 */
export const DEFAULT_STAGE_ORDER: StageKey[] = ['sentiment', 'hateCheck', 'factCheck'];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfigSchema = {
  language: 'en',
  deadlineMs: 15 * 60 * 1000,
  duplicatePolicy: 'reject',
  spanStrategy: 'sentence',
  order: DEFAULT_STAGE_ORDER,
};

export const DEFAULT_SENTIMENT_STAGE: SentimentStageSettings = {
  ...enabledStage(DEFAULT_SENTIMENT_CONFIG),
  ...DEFAULT_SENTIMENT_OPTIONS,
};

export const DEFAULT_HATE_CHECK_STAGE: HateCheckStageSettings = {
  ...enabledStage(DEFAULT_HATE_CHECK_CONFIG),
  ...DEFAULT_HATE_CHECK_OPTIONS,
};

export const DEFAULT_FACT_CHECK_STAGE: FactCheckStageSettings = enabledStage(
  DEFAULT_FACT_CHECK_CONFIG,
);

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  json: false,
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: AnnotextConfig = {
  pipeline: DEFAULT_PIPELINE_CONFIG,
  stages: {
    sentiment: DEFAULT_SENTIMENT_STAGE,
    hateCheck: DEFAULT_HATE_CHECK_STAGE,
    factCheck: DEFAULT_FACT_CHECK_STAGE,
  },
  output: DEFAULT_OUTPUT_CONFIG,
};
