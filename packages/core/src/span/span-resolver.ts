/**
 * Span Resolution
 *
 * Turns an anchor phrase into a character span of the document. Used when
 * seeding claims that were written by hand and only quote part of the
 * sentence they belong to.
 */

import type { Span } from '@annotext/types';

/**
 * Available resolution strategies
 */
export type SpanStrategy = 'exact' | 'sentence';

/**
 * Strategy interface for locating an anchor in text
 */
export interface SpanResolver {
  readonly strategy: SpanStrategy;
  /**
   * Locate `anchor` in `text`, searching from `fromIndex`
   *
   * @returns the resolved span, or null when the anchor does not occur
   */
  resolve(text: string, anchor: string, fromIndex?: number): Span | null;
}

/**
 * Abbreviations whose trailing period does not end a sentence
 */
export const DEFAULT_ABBREVIATIONS: readonly string[] = [
  'e.g.',
  'i.e.',
  'etc.',
  'vs.',
  'approx.',
  'Dr.',
  'Mr.',
  'Mrs.',
  'Ms.',
  'Prof.',
  'St.',
  'Jr.',
  'Sr.',
  'No.',
  'Inc.',
  'Ltd.',
];

const TERMINATORS = new Set(['.', '!', '?']);
const WHITESPACE = /\s/;

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && /[\p{L}\p{N}]/u.test(char);
}

/**
 * True when the period at `index` closes one of the abbreviations
 */
function endsAbbreviation(
  text: string,
  index: number,
  abbreviations: readonly string[],
): boolean {
  for (const abbreviation of abbreviations) {
    const start = index + 1 - abbreviation.length;
    if (start < 0) continue;
    if (text.slice(start, index + 1).toLowerCase() !== abbreviation.toLowerCase()) continue;
    if (!isWordChar(text[start - 1])) {
      return true;
    }
  }
  return false;
}

/**
 * Offset just past the first sentence terminator at or after `fromIndex`.
 *
 * A terminator counts only when followed by whitespace or the end of the
 * text and not closing a known abbreviation.
 */
export function findSentenceEnd(
  text: string,
  fromIndex: number,
  abbreviations: readonly string[] = DEFAULT_ABBREVIATIONS,
): number | null {
  for (let i = Math.max(fromIndex, 0); i < text.length; i++) {
    const char = text[i];
    if (char === undefined || !TERMINATORS.has(char)) continue;

    const next = text[i + 1];
    if (next !== undefined && !WHITESPACE.test(next)) continue;
    if (char === '.' && endsAbbreviation(text, i, abbreviations)) continue;

    return i + 1;
  }
  return null;
}

function skipWhitespace(text: string, index: number): number {
  let i = index;
  while (i < text.length && WHITESPACE.test(text[i] ?? '')) i++;
  return i;
}

/**
 * Split a text into sentence spans. Leading and trailing whitespace is
 * excluded from every span; whitespace-only texts yield no sentences.
 */
export function segmentSentences(
  text: string,
  abbreviations: readonly string[] = DEFAULT_ABBREVIATIONS,
): Span[] {
  const sentences: Span[] = [];
  let begin = skipWhitespace(text, 0);

  while (begin < text.length) {
    let end = findSentenceEnd(text, begin, abbreviations) ?? text.length;
    const next = end;
    while (end > begin && WHITESPACE.test(text[end - 1] ?? '')) end--;
    if (end > begin) {
      sentences.push({ begin, end });
    }
    begin = skipWhitespace(text, next);
  }

  return sentences;
}

/**
 * Resolves to the anchor's own occurrence
 */
export class ExactSpanResolver implements SpanResolver {
  readonly strategy = 'exact' as const;

  resolve(text: string, anchor: string, fromIndex = 0): Span | null {
    if (anchor.length === 0) return null;
    const begin = text.indexOf(anchor, fromIndex);
    return begin < 0 ? null : { begin, end: begin + anchor.length };
  }
}

/**
 * Resolves from the anchor's start to the end of its sentence.
 * Without a terminator after the anchor, the span covers the anchor only.
 */
export class SentenceSpanResolver implements SpanResolver {
  readonly strategy = 'sentence' as const;
  private readonly abbreviations: readonly string[];

  constructor(abbreviations: readonly string[] = DEFAULT_ABBREVIATIONS) {
    this.abbreviations = abbreviations;
  }

  resolve(text: string, anchor: string, fromIndex = 0): Span | null {
    if (anchor.length === 0) return null;
    const begin = text.indexOf(anchor, fromIndex);
    if (begin < 0) return null;

    // The anchor's own last character may be the terminator
    const searchFrom = begin + anchor.length - 1;
    const end = findSentenceEnd(text, searchFrom, this.abbreviations);
    return { begin, end: end ?? begin + anchor.length };
  }
}

/**
 * Create a resolver for a configured strategy
 */
export function createSpanResolver(
  strategy: SpanStrategy,
  abbreviations?: readonly string[],
): SpanResolver {
  switch (strategy) {
    case 'exact':
      return new ExactSpanResolver();
    case 'sentence':
      return new SentenceSpanResolver(abbreviations);
  }
}
