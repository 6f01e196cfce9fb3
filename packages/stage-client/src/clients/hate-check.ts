/**
 * Hate-speech stage client
 */

import type { StageContext } from '@annotext/core';
import type { HateCheckStageOptions } from '@annotext/types';

import { StageResponseError } from '../errors.js';
import { buildSentenceUnits } from '../selection.js';
import type { StageClientConfig, WireSentence } from '../types/common.js';
import { hateCheckResponseSchema, type HateCheckRequest } from '../types/hate-check.js';

import { BaseStageClient } from './base.js';

/**
 * Default configuration for the hate-check client
 */
export const DEFAULT_HATE_CHECK_CONFIG: StageClientConfig = {
  name: 'hate_check',
  endpoint: 'http://localhost:9002',
  scale: 1,
  timeoutMs: 60000,
  parameters: {},
  continueOnError: false,
};

export const DEFAULT_HATE_CHECK_OPTIONS: HateCheckStageOptions = {
  selection: 'text',
};

/**
 * Client for the hate-speech detection service
 */
export class HateCheckClient extends BaseStageClient {
  readonly options: HateCheckStageOptions;

  constructor(
    config: Partial<StageClientConfig> = {},
    options: Partial<HateCheckStageOptions> = {},
  ) {
    super({
      ...DEFAULT_HATE_CHECK_CONFIG,
      ...config,
    });
    this.options = { ...DEFAULT_HATE_CHECK_OPTIONS, ...options };
  }

  /**
   * Add one hate verdict per unit sentence
   */
  async run(context: StageContext): Promise<void> {
    const { text, language } = context.document;
    const units = buildSentenceUnits(text, this.options.selection, this.scale);

    const results = await this.fanOut(units, (sentences) =>
      this.postJson(this.buildRequest(sentences, language, text.length), hateCheckResponseSchema, context.signal),
    );

    const verdicts = results.flatMap((response, index) => {
      const sent = units[index] ?? [];
      if (response.hate.length !== sent.length || response.non_hate.length !== sent.length) {
        throw new StageResponseError(
          this.name,
          `expected ${sent.length} hate/non_hate scores, got ${response.hate.length}/${response.non_hate.length}`,
        );
      }
      return sent.map((sentence, position) => ({
        span: { begin: sentence.begin, end: sentence.end },
        hate: response.hate[position]!,
        nonHate: response.non_hate[position]!,
      }));
    });

    for (const verdict of verdicts) {
      context.output.add({ kind: 'hate_verdict', ...verdict });
    }
  }

  private buildRequest(sentences: WireSentence[], language: string, docLength: number) {
    const request: HateCheckRequest = {
      selections: [{ selection: this.options.selection, sentences }],
      lang: language,
      doc_len: docLength,
    };
    return this.withParameters(request);
  }
}
