/**
 * Stage construction and health checking
 */

import {
  FactCheckClient,
  HateCheckClient,
  SentimentClient,
  type BaseStageClient,
  type FetchFunction,
  type StageClientConfig,
} from '@annotext/stage-client';
import type { StageType } from '@annotext/types';

import type { AnnotextConfig, StageKey, StageSettings } from '../config/schema.js';
import type { ServiceStatus } from '../progress/types.js';

/**
 * Service name each stage key is registered under
 */
export const STAGE_TYPES: Record<StageKey, StageType> = {
  sentiment: 'sentiment',
  hateCheck: 'hate_check',
  factCheck: 'fact_check',
};

/**
 * A stage built from configuration
 */
export interface ConfiguredStage {
  key: StageKey;
  client: BaseStageClient;
}

/**
 * Health of the service behind a configured stage
 */
export interface StageServiceStatus extends ServiceStatus {
  key: StageKey;
  endpoint: string;
}

export interface ServiceOptions {
  /** Transport handed to every client (default: global fetch) */
  fetch?: FetchFunction;
}

function clientConfig(
  key: StageKey,
  settings: StageSettings,
  options: ServiceOptions,
): Partial<StageClientConfig> {
  const config: Partial<StageClientConfig> = {
    name: STAGE_TYPES[key],
    endpoint: settings.endpoint,
    scale: settings.scale,
    timeoutMs: settings.timeoutMs,
    parameters: settings.parameters,
    continueOnError: settings.continueOnError,
  };
  if (options.fetch) {
    config.fetch = options.fetch;
  }
  return config;
}

function createClient(
  key: StageKey,
  config: AnnotextConfig,
  options: ServiceOptions,
): BaseStageClient {
  switch (key) {
    case 'sentiment': {
      const { modelName, selection, batchSize, ignoreMaxLengthTruncationPadding } =
        config.stages.sentiment;
      return new SentimentClient(clientConfig(key, config.stages.sentiment, options), {
        modelName,
        selection,
        batchSize,
        ignoreMaxLengthTruncationPadding,
      });
    }
    case 'hateCheck':
      return new HateCheckClient(clientConfig(key, config.stages.hateCheck, options), {
        selection: config.stages.hateCheck.selection,
      });
    case 'factCheck':
      return new FactCheckClient(clientConfig(key, config.stages.factCheck, options));
  }
}

/**
 * Build the enabled stages in configured order
 */
export function buildStages(
  config: AnnotextConfig,
  options: ServiceOptions = {},
): ConfiguredStage[] {
  return config.pipeline.order
    .filter((key) => config.stages[key].enabled)
    .map((key) => ({ key, client: createClient(key, config, options) }));
}

/**
 * Check every stage's service concurrently
 */
export async function performHealthChecks(
  stages: readonly ConfiguredStage[],
): Promise<StageServiceStatus[]> {
  return Promise.all(
    stages.map(async ({ key, client }) => {
      const health = await client.healthCheck();
      const status: StageServiceStatus = {
        name: health.name,
        key,
        endpoint: client.endpoint,
        healthy: health.healthy,
        latencyMs: health.latencyMs,
      };
      if (health.error !== undefined) {
        status.error = health.error;
      }
      return status;
    }),
  );
}
