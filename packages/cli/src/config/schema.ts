/**
 * Configuration schema types for annotext
 */

import type { DuplicatePolicy, SpanStrategy } from '@annotext/core';
import type {
  HateCheckStageOptions,
  SentimentStageOptions,
  StageEndpointConfig,
} from '@annotext/types';

/**
 * Config keys of the stages the CLI can build
 */
export type StageKey = 'sentiment' | 'hateCheck' | 'factCheck';

/**
 * Settings shared by every configured stage
 */
export interface StageSettings extends StageEndpointConfig {
  /** Include the stage in the run */
  enabled: boolean;
}

export interface SentimentStageSettings extends StageSettings, SentimentStageOptions {}

export interface HateCheckStageSettings extends StageSettings, HateCheckStageOptions {}

/**
 * Fact checking reads claim/fact pairs from the graph and has no typed options
 */
export type FactCheckStageSettings = StageSettings;

/**
 * Per-stage configuration
 */
export interface StagesConfigSchema {
  sentiment: SentimentStageSettings;
  hateCheck: HateCheckStageSettings;
  factCheck: FactCheckStageSettings;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfigSchema {
  /** Language tag of the document */
  language: string;
  /** Run-level deadline in milliseconds */
  deadlineMs: number;
  /** What the store does with an annotation identical to a stored one */
  duplicatePolicy: DuplicatePolicy;
  /** How seeded claims without an explicit span are located */
  spanStrategy: SpanStrategy;
  /** Stage execution order */
  order: StageKey[];
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Print the summary as JSON */
  json: boolean;
  /** Colorize console output */
  color: boolean;
}

/**
 * Complete annotext configuration
 */
export interface AnnotextConfig {
  pipeline: PipelineConfigSchema;
  stages: StagesConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Input document path (undefined = stdin) */
  input?: string;
  /** Path to config file */
  config?: string;
  /** Path to a claim/fact seed file */
  seed?: string;
  /** Document language */
  lang?: string;
  /** Run deadline in milliseconds */
  deadline?: number;
  /** Let every stage fail without failing the run */
  continueOnError?: boolean;
  /** Print the summary as JSON */
  json?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Check services and inputs without running the pipeline */
  dryRun?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}
