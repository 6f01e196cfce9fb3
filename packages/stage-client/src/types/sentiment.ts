/**
 * Sentiment service types
 */

import { z } from 'zod';

import { scoreSchema, wireMetaSchema, type WireSelection } from './common.js';

/**
 * Request body of POST /v1/process
 */
export interface SentimentRequest {
  selections: WireSelection[];
  lang: string;
  doc_len: number;
  model_name: string;
  batch_size: number;
  ignore_max_length_truncation_padding: boolean;
}

const sentimentSentenceSchema = z.object({
  begin: z.number().int().optional(),
  end: z.number().int().optional(),
  pos: scoreSchema,
  neu: scoreSchema,
  neg: scoreSchema,
});

export const sentimentResponseSchema = z.object({
  selections: z.array(
    z.object({
      selection: z.string().optional(),
      sentences: z.array(sentimentSentenceSchema),
    }),
  ),
  meta: wireMetaSchema.optional(),
});

export type SentimentSentenceScores = z.infer<typeof sentimentSentenceSchema>;
export type SentimentResponse = z.infer<typeof sentimentResponseSchema>;
