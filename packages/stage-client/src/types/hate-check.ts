/**
 * Hate-speech service types
 */

import { z } from 'zod';

import { scoreSchema, wireMetaSchema, type WireSelection } from './common.js';

/**
 * Request body of POST /v1/process
 */
export interface HateCheckRequest {
  selections: WireSelection[];
  lang: string;
  doc_len: number;
}

/**
 * Scores are aligned with the request's sentences
 */
export const hateCheckResponseSchema = z.object({
  hate: z.array(scoreSchema),
  non_hate: z.array(scoreSchema),
  meta: wireMetaSchema.optional(),
});

export type HateCheckResponse = z.infer<typeof hateCheckResponseSchema>;
