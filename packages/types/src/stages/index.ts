/**
 * Stage configuration types
 *
 * Each remote stage type has an explicit options struct for the keys it
 * understands. `parameters` is the passthrough map for options the core
 * does not know about; its entries are copied verbatim into the request.
 */

/**
 * Remote stage types known to the pipeline
 */
export type StageType = 'sentiment' | 'hate_check' | 'fact_check';

/**
 * How a stage cuts the document into request units
 *
 * - text: the whole document as one unit
 * - sentence: one unit per sentence
 */
export type SelectionMode = 'text' | 'sentence';

/**
 * Connection settings shared by every remote stage
 */
export interface StageEndpointConfig {
  /** Base URL of the service */
  endpoint: string;
  /** Maximum number of concurrent requests within the stage (>= 1) */
  scale: number;
  /** Per-request deadline in milliseconds */
  timeoutMs: number;
  /** Opaque options copied into the request body */
  parameters: Record<string, string>;
  /** Skip the stage instead of failing the run when it errors */
  continueOnError: boolean;
}

/**
 * Sentiment stage options
 */
export interface SentimentStageOptions {
  modelName: string;
  selection: SelectionMode;
  batchSize: number;
  ignoreMaxLengthTruncationPadding: boolean;
}

/**
 * Hate-speech stage options
 */
export interface HateCheckStageOptions {
  selection: SelectionMode;
}
