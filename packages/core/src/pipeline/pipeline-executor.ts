/**
 * Pipeline Executor
 *
 * Runs stages strictly in order against one document:
 * 1. Open a batch for the stage
 * 2. Run the stage, raced against the run deadline
 * 3. Commit the batch (the next stage sees its annotations)
 * 4. On failure, discard the batch and either stop or move on
 */

import type { Document } from '../document/document.js';
import { PipelineStateError, RunDeadlineExceededError } from '../errors.js';

import type { Stage } from './stage.js';

/**
 * Executor lifecycle state
 */
export type PipelineStatus = 'idle' | 'running' | 'completed' | 'failed';

/**
 * Terminal status of a run
 */
export type RunStatus = Extract<PipelineStatus, 'completed' | 'failed'>;

/**
 * Outcome of a single stage
 *
 * - completed: ran and its batch was committed
 * - failed: raised an error that ended the run
 * - skipped: raised an error, but the stage allows the run to continue
 * - not_run: never started because the run ended earlier
 */
export type StageStatus = 'completed' | 'failed' | 'skipped' | 'not_run';

/**
 * Per-stage entry of a run result
 */
export interface StageRecord {
  name: string;
  /** Position in the stage list (0-indexed) */
  index: number;
  status: StageStatus;
  /** Wall-clock time spent in the stage, including the commit */
  durationMs: number;
  /** Annotations the stage's commit inserted */
  annotationsAdded: number;
  error?: Error;
}

/**
 * Complete run result
 */
export interface PipelineRunResult {
  status: RunStatus;
  durationMs: number;
  stages: StageRecord[];
  /** The error that ended a failed run */
  error?: Error;
}

/**
 * Lifecycle hooks, used by reporters
 */
export interface PipelineObserver {
  onRunStart?(stages: readonly Stage[]): void;
  onStageStart?(stage: Stage, index: number): void;
  onStageComplete?(stage: Stage, record: StageRecord): void;
  /** `skipped` is true when the run continues past this failure */
  onStageFailed?(stage: Stage, record: StageRecord, error: Error, skipped: boolean): void;
  onRunComplete?(result: PipelineRunResult): void;
}

/**
 * Executor configuration
 */
export interface PipelineExecutorConfig {
  /** Run-level deadline in milliseconds (default: none) */
  deadlineMs?: number;
  /** Caller-controlled cancellation */
  signal?: AbortSignal;
  observer?: PipelineObserver;
}

/**
 * Current executor state
 */
export interface PipelineState {
  status: PipelineStatus;
  /** Index of the running stage while status is 'running' */
  stageIndex?: number;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(toError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(error));
      },
    );
  });
}

/**
 * Single-use sequential stage runner
 */
export class PipelineExecutor {
  private status: PipelineStatus = 'idle';
  private stageIndex: number | undefined;
  private readonly config: PipelineExecutorConfig;

  constructor(config: PipelineExecutorConfig = {}) {
    this.config = config;
  }

  get state(): PipelineState {
    if (this.status === 'running' && this.stageIndex !== undefined) {
      return { status: this.status, stageIndex: this.stageIndex };
    }
    return { status: this.status };
  }

  /**
   * Run every stage against the document
   *
   * Annotations committed before a failure stay in the document's store.
   *
   * @throws PipelineStateError if the executor has already run
   */
  async run(document: Document, stages: readonly Stage[]): Promise<PipelineRunResult> {
    if (this.status !== 'idle') {
      throw new PipelineStateError(this.status);
    }
    this.status = 'running';

    const observer = this.config.observer;
    const startTime = Date.now();
    const controller = new AbortController();
    const cleanup = this.armCancellation(controller);

    const records: StageRecord[] = stages.map((stage, index) => ({
      name: stage.name,
      index,
      status: 'not_run',
      durationMs: 0,
      annotationsAdded: 0,
    }));
    let runError: Error | undefined;

    observer?.onRunStart?.(stages);

    try {
      for (let i = 0; i < stages.length; i++) {
        const stage = stages[i]!;
        const record = records[i]!;

        if (controller.signal.aborted) {
          runError = toError(controller.signal.reason);
          break;
        }

        this.stageIndex = i;
        observer?.onStageStart?.(stage, i);

        const stageStart = Date.now();
        const batch = document.createBatch(stage.name);

        try {
          await raceAbort(
            stage.run({
              document: { text: document.text, language: document.language },
              store: document.store,
              graph: document.graph,
              output: batch,
              signal: controller.signal,
            }),
            controller.signal,
          );
          const { added } = batch.commit();

          record.status = 'completed';
          record.annotationsAdded = added.length;
          record.durationMs = Date.now() - stageStart;
          observer?.onStageComplete?.(stage, record);
        } catch (caught) {
          batch.discard();
          const error = toError(caught);
          // A run-level abort ends the run whatever the stage allows
          const skipped = stage.continueOnError && !controller.signal.aborted;

          record.status = skipped ? 'skipped' : 'failed';
          record.error = error;
          record.durationMs = Date.now() - stageStart;
          observer?.onStageFailed?.(stage, record, error, skipped);

          if (!skipped) {
            runError = error;
            break;
          }
        }
      }
    } finally {
      cleanup();
      this.stageIndex = undefined;
    }

    const status: RunStatus = runError ? 'failed' : 'completed';
    this.status = status;
    const result: PipelineRunResult = {
      status,
      durationMs: Date.now() - startTime,
      stages: records,
    };
    if (runError) {
      result.error = runError;
    }

    observer?.onRunComplete?.(result);
    return result;
  }

  /**
   * Abort `controller` on the deadline or the caller's signal
   *
   * @returns a function releasing the timer and listener
   */
  private armCancellation(controller: AbortController): () => void {
    const { deadlineMs, signal } = this.config;

    let timer: ReturnType<typeof setTimeout> | undefined;
    if (deadlineMs !== undefined && deadlineMs > 0) {
      timer = setTimeout(() => {
        controller.abort(new RunDeadlineExceededError(deadlineMs));
      }, deadlineMs);
    }

    const onExternalAbort = (): void => {
      controller.abort(new RunDeadlineExceededError());
    };
    if (signal?.aborted) {
      onExternalAbort();
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    return () => {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onExternalAbort);
    };
  }
}
