/**
 * Mock pipeline stages
 */

import type { Stage, StageContext } from '@annotext/core';
import type { AnnotationDraft } from '@annotext/types';
import { vi, type Mock } from 'vitest';

/**
 * Stage whose run() is a spy
 */
export interface MockStage extends Stage {
  run: Mock<[StageContext], Promise<void>>;
}

export interface MockStageConfig {
  name?: string;
  continueOnError?: boolean;
  /** Drafts written to the stage's batch, fixed or computed from the context */
  annotations?: readonly AnnotationDraft[] | ((context: StageContext) => readonly AnnotationDraft[]);
  /** Thrown after the annotations are written */
  error?: Error;
  /** Delay before the stage resolves; the run signal cancels it */
  latencyMs?: number;
}

/**
 * Create a stage whose behaviour is fixed up front
 */
export function createMockStage(config: MockStageConfig = {}): MockStage {
  const { name = 'mock', continueOnError = false, annotations = [], error, latencyMs = 0 } = config;

  const run = vi.fn(async (context: StageContext): Promise<void> => {
    const drafts = typeof annotations === 'function' ? annotations(context) : annotations;
    for (const draft of drafts) {
      context.output.add(draft);
    }

    if (latencyMs > 0) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, latencyMs);
        context.signal.addEventListener(
          'abort',
          () => {
            clearTimeout(timer);
            reject(new Error(`Stage '${name}' aborted`));
          },
          { once: true },
        );
      });
    }

    if (error) {
      throw error;
    }
  });

  return { name, continueOnError, run };
}

/**
 * Fact-checking stand-in: one verdict per linked pair with a fixed score
 */
export function createMockFactCheckStage(consistency: number, name = 'fact_check'): MockStage {
  return createMockStage({
    name,
    annotations: ({ graph }) =>
      graph.claimFactPairs().map(({ claim, fact }) => ({
        kind: 'fact_check_verdict' as const,
        span: claim.span,
        claimId: claim.id,
        factId: fact.id,
        consistency,
      })),
  });
}
