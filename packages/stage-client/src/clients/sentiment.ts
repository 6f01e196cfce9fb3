/**
 * Sentiment stage client
 */

import { isValidSpan, type StageContext } from '@annotext/core';
import type { SentimentPolarity, SentimentStageOptions, Span } from '@annotext/types';

import { StageResponseError } from '../errors.js';
import { buildSentenceUnits } from '../selection.js';
import type { StageClientConfig, WireSentence } from '../types/common.js';
import {
  sentimentResponseSchema,
  type SentimentRequest,
  type SentimentSentenceScores,
} from '../types/sentiment.js';

import { BaseStageClient } from './base.js';

/**
 * Default configuration for the sentiment client
 */
export const DEFAULT_SENTIMENT_CONFIG: StageClientConfig = {
  name: 'sentiment',
  endpoint: 'http://localhost:9001',
  scale: 1,
  timeoutMs: 180000,
  parameters: {},
  continueOnError: false,
};

export const DEFAULT_SENTIMENT_OPTIONS: SentimentStageOptions = {
  modelName: 'cardiffnlp/twitter-xlm-roberta-base-sentiment',
  selection: 'text',
  batchSize: 32,
  ignoreMaxLengthTruncationPadding: false,
};

/**
 * Pick the winning label. Ties favour negative, then positive.
 */
export function sentimentPolarity(scores: Pick<SentimentSentenceScores, 'pos' | 'neu' | 'neg'>): SentimentPolarity {
  const { pos, neu, neg } = scores;
  const max = Math.max(pos, neu, neg);
  const label = max === neg ? 'negative' : max === pos ? 'positive' : 'neutral';
  return {
    label,
    score: max,
    scores: { positive: pos, neutral: neu, negative: neg },
  };
}

/**
 * Client for the sentiment analysis service
 */
export class SentimentClient extends BaseStageClient {
  readonly options: SentimentStageOptions;

  constructor(
    config: Partial<StageClientConfig> = {},
    options: Partial<SentimentStageOptions> = {},
  ) {
    super({
      ...DEFAULT_SENTIMENT_CONFIG,
      ...config,
    });
    this.options = { ...DEFAULT_SENTIMENT_OPTIONS, ...options };
  }

  /**
   * Score every unit of the document and add one sentiment per sentence
   */
  async run(context: StageContext): Promise<void> {
    const { text, language } = context.document;
    const units = buildSentenceUnits(text, this.options.selection, this.scale);

    const results = await this.fanOut(units, (sentences) =>
      this.postJson(this.buildRequest(sentences, language, text.length), sentimentResponseSchema, context.signal),
    );

    // Validate every response before writing anything
    const drafts: Array<{ span: Span; polarity: SentimentPolarity }> = [];
    results.forEach((response, index) => {
      const sent = units[index] ?? [];
      const received = response.selections.flatMap((selection) => selection.sentences);
      if (received.length !== sent.length) {
        throw new StageResponseError(
          this.name,
          `expected ${sent.length} scored sentences, got ${received.length}`,
        );
      }
      received.forEach((scores, position) => {
        const request = sent[position]!;
        const span = { begin: scores.begin ?? request.begin, end: scores.end ?? request.end };
        if (!isValidSpan(span, text.length)) {
          throw new StageResponseError(
            this.name,
            `sentence span [${span.begin}, ${span.end}) is outside the document`,
          );
        }
        drafts.push({ span, polarity: sentimentPolarity(scores) });
      });
    });

    for (const { span, polarity } of drafts) {
      context.output.add({ kind: 'sentiment', span, polarity });
    }
  }

  private buildRequest(sentences: WireSentence[], language: string, docLength: number) {
    const request: SentimentRequest = {
      selections: [{ selection: this.options.selection, sentences }],
      lang: language,
      doc_len: docLength,
      model_name: this.options.modelName,
      batch_size: this.options.batchSize,
      ignore_max_length_truncation_padding: this.options.ignoreMaxLengthTruncationPadding,
    };
    return this.withParameters(request);
  }
}
