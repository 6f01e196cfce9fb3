/**
 * Fact-checking stage client
 */

import type { ClaimFactPair, StageContext } from '@annotext/core';

import { chunk } from '../concurrency.js';
import { StageResponseError } from '../errors.js';
import type { StageClientConfig } from '../types/common.js';
import {
  factCheckResponseSchema,
  type FactCheckClaim,
  type FactCheckFact,
  type FactCheckRequest,
  type FactCheckResponse,
} from '../types/fact-check.js';

import { BaseStageClient } from './base.js';

/**
 * Default configuration for the fact-check client
 */
export const DEFAULT_FACT_CHECK_CONFIG: StageClientConfig = {
  name: 'fact_check',
  endpoint: 'http://localhost:9003',
  scale: 1,
  timeoutMs: 300000,
  parameters: {},
  continueOnError: false,
};

/**
 * Compose the check sheet for a group of claim/fact pairs.
 *
 * Each pair becomes a line `Claim n: <claim> Fact n: <fact>`; offsets in
 * `claims_all` and `facts_all` point into that sheet.
 */
export function buildCheckSheet(pairs: readonly ClaimFactPair[], language: string): FactCheckRequest {
  const parts: string[] = [];
  const claimsAll: FactCheckClaim[] = [];
  const factsAll: FactCheckFact[] = [];
  let position = 0;

  pairs.forEach(({ claim, fact }, index) => {
    const claimPrefix = `Claim ${index + 1}: `;
    const claimBegin = position + claimPrefix.length;
    const claimEnd = claimBegin + claim.value.length;
    parts.push(claimPrefix, claim.value);
    position = claimEnd;

    const factPrefix = ` Fact ${index + 1}: `;
    const factBegin = position + factPrefix.length;
    const factEnd = factBegin + fact.value.length;
    parts.push(factPrefix, fact.value, '\n');
    position = factEnd + 1;

    const claimRef = { id: claim.id, begin: claimBegin, end: claimEnd, text: claim.value };
    const factRef = { id: fact.id, begin: factBegin, end: factEnd, text: fact.value };
    claimsAll.push({ ...claimRef, facts: [factRef] });
    factsAll.push({ ...factRef, claims: [claimRef] });
  });

  return {
    text: parts.join(''),
    lang: language,
    claims_all: claimsAll,
    facts_all: factsAll,
  };
}

interface PairScore {
  pair: ClaimFactPair;
  consistency: number;
}

/**
 * Client for the claim/fact consistency service
 */
export class FactCheckClient extends BaseStageClient {
  constructor(config: Partial<StageClientConfig> = {}) {
    super({
      ...DEFAULT_FACT_CHECK_CONFIG,
      ...config,
    });
  }

  /**
   * Add one verdict per linked claim/fact pair, spanning the claim.
   * Sends nothing when no claim is linked.
   */
  async run(context: StageContext): Promise<void> {
    const pairs = context.graph.claimFactPairs();
    if (pairs.length === 0) return;

    const groups = chunk(pairs, this.scale);
    const results = await this.fanOut(groups, (group) =>
      this.postJson(
        this.withParameters(buildCheckSheet(group, context.document.language)),
        factCheckResponseSchema,
        context.signal,
      ),
    );

    const scores = results.flatMap((response, index) => this.readScores(response, groups[index] ?? []));

    for (const { pair, consistency } of scores) {
      context.output.add({
        kind: 'fact_check_verdict',
        span: pair.claim.span,
        claimId: pair.claim.id,
        factId: pair.fact.id,
        consistency,
      });
    }
  }

  private readScores(response: FactCheckResponse, pairs: readonly ClaimFactPair[]): PairScore[] {
    let scores: PairScore[];

    if ('consistency' in response) {
      const values = response.consistency;
      if (values.length !== pairs.length) {
        throw new StageResponseError(
          this.name,
          `expected ${pairs.length} consistency scores, got ${values.length}`,
        );
      }
      scores = pairs.map((pair, index) => ({ pair, consistency: values[index]! }));
    } else {
      const byKey = new Map(pairs.map((pair) => [`${pair.claim.id}:${pair.fact.id}`, pair]));
      const seen = new Set<string>();
      scores = response.results.map((result) => {
        const key = `${result.claim_id}:${result.fact_id}`;
        const pair = byKey.get(key);
        if (!pair) {
          throw new StageResponseError(
            this.name,
            `result names claim ${result.claim_id} / fact ${result.fact_id}, which is not in the request`,
          );
        }
        if (seen.has(key)) {
          throw new StageResponseError(
            this.name,
            `duplicate result for claim ${result.claim_id} / fact ${result.fact_id}`,
          );
        }
        seen.add(key);
        return { pair, consistency: result.consistency };
      });
    }

    for (const { pair, consistency } of scores) {
      if (!(consistency >= 0 && consistency <= 1)) {
        throw new StageResponseError(
          this.name,
          `consistency ${consistency} for claim ${pair.claim.id} / fact ${pair.fact.id} is outside [0, 1]`,
        );
      }
    }
    return scores;
  }
}
