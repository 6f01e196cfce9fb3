/**
 * Request units for the sentence-based services
 */

import { segmentSentences } from '@annotext/core';
import type { SelectionMode } from '@annotext/types';

import { chunk } from './concurrency.js';
import type { WireSentence } from './types/common.js';

/**
 * Cut a document into request units.
 *
 * `text` mode sends the whole document as a single sentence; `sentence`
 * mode sends its sentences, spread over up to `scale` requests. An empty
 * document produces no units.
 */
export function buildSentenceUnits(
  text: string,
  mode: SelectionMode,
  scale: number,
): WireSentence[][] {
  if (text.length === 0) return [];

  if (mode === 'text') {
    return [[{ text, begin: 0, end: text.length }]];
  }

  const sentences = segmentSentences(text).map(({ begin, end }) => ({
    text: text.slice(begin, end),
    begin,
    end,
  }));
  return chunk(sentences, scale);
}
