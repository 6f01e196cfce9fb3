/**
 * Main orchestrator that seeds the document, runs the stages and
 * aggregates what they committed
 */

import {
  PipelineExecutor,
  aggregateResults,
  createDocument,
  createSpanResolver,
  type AggregateResult,
  type Document,
  type PipelineExecutorConfig,
  type PipelineObserver,
  type PipelineRunResult,
  type Stage,
} from '@annotext/core';

import type { AnnotextConfig } from '../config/schema.js';

import { applySeeds, resolveSeeds, type SeedEntry, type SkippedSeed } from './seeds.js';
import { buildStages, type ServiceOptions } from './services.js';

/**
 * Input of one run
 */
export interface RunInput {
  text: string;
  seeds?: readonly SeedEntry[];
}

export interface RunOptions extends ServiceOptions {
  /** Receives the executor's stage events */
  observer?: PipelineObserver;
  /** Cancels the run; committed annotations are kept */
  signal?: AbortSignal;
  /** Stages to run (default: built from config) */
  stages?: readonly Stage[];
  /** Called for every seed that could not be placed in the text */
  onSeedSkipped?: (seed: SkippedSeed) => void;
}

/**
 * Everything a run produced
 */
export interface RunReport {
  document: Document;
  run: PipelineRunResult;
  summary: AggregateResult;
  /** Number of claims seeded before the first stage */
  seeded: number;
  skippedSeeds: SkippedSeed[];
}

/**
 * Orchestrate one pipeline run over a document
 */
export async function orchestrateRun(
  input: RunInput,
  config: AnnotextConfig,
  options: RunOptions = {},
): Promise<RunReport> {
  const document = createDocument(input.text, config.pipeline.language, {
    duplicatePolicy: config.pipeline.duplicatePolicy,
  });

  const resolver = createSpanResolver(config.pipeline.spanStrategy);
  const { seeds, skipped } = resolveSeeds(document.text, input.seeds ?? [], resolver);
  for (const seed of skipped) {
    options.onSeedSkipped?.(seed);
  }
  const seeded = applySeeds(document, seeds);

  const stages = options.stages ?? buildStages(config, options).map((stage) => stage.client);

  const executorConfig: PipelineExecutorConfig = { deadlineMs: config.pipeline.deadlineMs };
  if (options.observer) {
    executorConfig.observer = options.observer;
  }
  if (options.signal) {
    executorConfig.signal = options.signal;
  }

  const executor = new PipelineExecutor(executorConfig);
  const run = await executor.run(document, stages);

  return {
    document,
    run,
    summary: aggregateResults(document, run),
    seeded: new Set(seeded.map(({ claim }) => claim.id)).size,
    skippedSeeds: skipped,
  };
}
