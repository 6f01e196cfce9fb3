/**
 * Checks that depend on a draft alone, not on what the store holds
 */

import type { AnnotationDraft } from '@annotext/types';

import { assertValidSpan } from '../document/span.js';
import { InvalidScoreError } from '../errors.js';

function isUnitScore(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * @throws InvalidSpanError if the span does not fit the text
 * @throws InvalidScoreError if a verdict's consistency is not in [0, 1]
 */
export function assertValidDraft(draft: AnnotationDraft, textLength: number): void {
  assertValidSpan(draft.span, textLength);
  if (draft.kind === 'fact_check_verdict' && !isUnitScore(draft.consistency)) {
    throw new InvalidScoreError(draft.kind, 'consistency', draft.consistency);
  }
}
