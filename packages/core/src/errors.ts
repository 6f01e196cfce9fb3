/**
 * Error classes for annotation, pipeline and stage operations
 */

import type { AnnotationId, AnnotationKind, Span } from '@annotext/types';

/**
 * Base error class for annotation store and graph errors
 */
export class AnnotationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnnotationError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnnotationError);
    }
  }
}

/**
 * Error thrown when an identical (kind, span, value) annotation already exists
 */
export class DuplicateAnnotationError extends AnnotationError {
  constructor(
    public readonly kind: AnnotationKind,
    public readonly span: Span,
    public readonly existingId: AnnotationId,
  ) {
    super(
      `Duplicate ${kind} annotation at [${span.begin}, ${span.end}) (existing id ${existingId})`,
    );
    this.name = 'DuplicateAnnotationError';
  }
}

/**
 * Error thrown when a claim is linked to an empty fact list
 */
export class EmptyLinkError extends AnnotationError {
  constructor(public readonly claimId: AnnotationId) {
    super(`Claim ${claimId} must be linked to at least one fact`);
    this.name = 'EmptyLinkError';
  }
}

/**
 * Error thrown when a span falls outside the document text
 */
export class InvalidSpanError extends AnnotationError {
  constructor(
    public readonly span: Span,
    public readonly textLength: number,
  ) {
    super(
      `Invalid span [${span.begin}, ${span.end}) for document of length ${textLength}`,
    );
    this.name = 'InvalidSpanError';
  }
}

/**
 * Error thrown when a score lies outside its allowed range
 */
export class InvalidScoreError extends AnnotationError {
  constructor(
    public readonly kind: AnnotationKind,
    public readonly field: string,
    public readonly value: number,
  ) {
    super(`Invalid ${kind} ${field} ${value}; expected a number in [0, 1]`);
    this.name = 'InvalidScoreError';
  }
}

/**
 * Error thrown when an id does not resolve to an annotation of the expected kind
 */
export class UnknownAnnotationError extends AnnotationError {
  constructor(
    public readonly id: AnnotationId,
    public readonly expectedKind?: AnnotationKind,
  ) {
    super(
      expectedKind
        ? `Annotation ${id} is not a ${expectedKind} in this store`
        : `Annotation ${id} does not exist in this store`,
    );
    this.name = 'UnknownAnnotationError';
  }
}

/**
 * Base error class for pipeline executor errors
 */
export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineError);
    }
  }
}

/**
 * Error thrown when run() is called on an executor that already ran
 */
export class PipelineStateError extends PipelineError {
  constructor(public readonly status: string) {
    super(`Pipeline executor cannot start a run from state '${status}'`);
    this.name = 'PipelineStateError';
  }
}

/**
 * Error thrown when the run-level deadline expires or the run is aborted
 */
export class RunDeadlineExceededError extends PipelineError {
  constructor(public readonly deadlineMs?: number) {
    super(
      deadlineMs !== undefined
        ? `Pipeline run exceeded its deadline of ${deadlineMs}ms`
        : 'Pipeline run was aborted',
    );
    this.name = 'RunDeadlineExceededError';
  }
}

/**
 * Base error class for failures of a single stage
 */
export class StageError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'StageError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StageError);
    }
  }
}

/**
 * Error thrown when a stage's service cannot be reached
 */
export class StageUnavailableError extends StageError {
  constructor(stage: string, reason?: string, status?: number) {
    super(`Stage '${stage}' is unavailable${reason ? `: ${reason}` : ''}`, stage, status);
    this.name = 'StageUnavailableError';
  }
}

/**
 * Error thrown when a stage's service does not answer within its deadline
 */
export class StageTimeoutError extends StageError {
  constructor(
    stage: string,
    public readonly timeoutMs: number,
    status?: number,
  ) {
    super(`Stage '${stage}' timed out after ${timeoutMs}ms`, stage, status);
    this.name = 'StageTimeoutError';
  }
}

/**
 * Error thrown when a stage's response cannot be turned into valid annotations
 */
export class StageResponseError extends StageError {
  constructor(stage: string, reason: string, status?: number) {
    super(`Stage '${stage}' returned an invalid response: ${reason}`, stage, status);
    this.name = 'StageResponseError';
  }
}

/**
 * Map an HTTP status code to the matching stage error
 */
export function mapHttpStatus(
  stage: string,
  status: number,
  message: string,
  timeoutMs = 0,
): StageError {
  switch (status) {
    case 408: // Request Timeout
    case 504: // Gateway Timeout
      return new StageTimeoutError(stage, timeoutMs, status);
    case 502: // Bad Gateway
    case 503: // Service Unavailable
      return new StageUnavailableError(stage, message, status);
    default:
      return new StageResponseError(stage, `HTTP ${status}: ${message}`, status);
  }
}
