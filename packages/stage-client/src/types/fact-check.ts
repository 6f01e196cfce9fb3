/**
 * Fact-checking service types
 *
 * The request text is a check sheet composed from the claim/fact pairs
 * ("Claim 1: ... Fact 1: ...\n"); every offset in the request points into
 * that sheet, not into the analysed document.
 */

import { z } from 'zod';

import { wireMetaSchema } from './common.js';

export interface FactCheckSpan {
  id: number;
  begin: number;
  end: number;
  text: string;
}

export interface FactCheckClaim extends FactCheckSpan {
  facts: FactCheckSpan[];
}

export interface FactCheckFact extends FactCheckSpan {
  claims: FactCheckSpan[];
}

/**
 * Request body of POST /v1/process
 */
export interface FactCheckRequest {
  text: string;
  lang: string;
  claims_all: FactCheckClaim[];
  facts_all: FactCheckFact[];
}

/**
 * Either one score per pair, in request order, or explicit results keyed
 * by claim and fact id. Scores are range-checked by the client so the
 * error can name the offending pair.
 */
export const factCheckResponseSchema = z.union([
  z.object({
    consistency: z.array(z.number()),
    meta: wireMetaSchema.optional(),
  }),
  z.object({
    results: z.array(
      z.object({
        claim_id: z.number().int(),
        fact_id: z.number().int(),
        consistency: z.number(),
      }),
    ),
    meta: wireMetaSchema.optional(),
  }),
]);

export type FactCheckResponse = z.infer<typeof factCheckResponseSchema>;
