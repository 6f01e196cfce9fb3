/**
 * Span helpers
 */

import type { Span } from '@annotext/types';

import { InvalidSpanError } from '../errors.js';

/**
 * Create a span, validating it against a text length when one is given
 */
export function span(begin: number, end: number, textLength?: number): Span {
  const result: Span = { begin, end };
  if (textLength !== undefined) {
    assertValidSpan(result, textLength);
  }
  return result;
}

/**
 * Check `0 <= begin <= end <= textLength` with integer offsets
 */
export function isValidSpan(candidate: Span, textLength: number): boolean {
  return (
    Number.isInteger(candidate.begin) &&
    Number.isInteger(candidate.end) &&
    candidate.begin >= 0 &&
    candidate.begin <= candidate.end &&
    candidate.end <= textLength
  );
}

/**
 * @throws InvalidSpanError if the span does not fit the text
 */
export function assertValidSpan(candidate: Span, textLength: number): void {
  if (!isValidSpan(candidate, textLength)) {
    throw new InvalidSpanError(candidate, textLength);
  }
}

/**
 * Order spans by begin, then end
 */
export function compareSpans(a: Span, b: Span): number {
  return a.begin - b.begin || a.end - b.end;
}

/**
 * Text covered by a span
 */
export function coveredText(text: string, s: Span): string {
  return text.slice(s.begin, s.end);
}
