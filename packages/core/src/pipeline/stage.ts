/**
 * Stage contract
 *
 * A stage reads the document and everything committed by earlier stages,
 * and writes its own annotations into a batch that the executor commits
 * once the stage resolves.
 */

import type { ReadonlyAnnotationGraph } from '../graph/annotation-graph.js';
import type { AnnotationBatch } from '../store/annotation-batch.js';
import type { ReadonlyAnnotationStore } from '../store/annotation-store.js';

/**
 * Document fields visible to a stage
 */
export interface StageDocument {
  readonly text: string;
  readonly language: string;
}

/**
 * Everything a stage receives for one run
 */
export interface StageContext {
  document: StageDocument;
  /** Annotations committed by seeding and earlier stages */
  store: ReadonlyAnnotationStore;
  /** Claim/fact links committed so far */
  graph: ReadonlyAnnotationGraph;
  /** Write buffer for this stage */
  output: AnnotationBatch;
  /** Aborted when the run deadline expires or the caller cancels */
  signal: AbortSignal;
}

/**
 * One analysis step of a pipeline
 */
export interface Stage {
  /** Name recorded as the source of every annotation the stage adds */
  readonly name: string;
  /** Keep running later stages when this one fails */
  readonly continueOnError: boolean;
  run(context: StageContext): Promise<void>;
}
