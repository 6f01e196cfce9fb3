/**
 * Result Aggregator
 *
 * Read-only summary of everything committed to a document, paired with
 * the run's terminal status. Works on partial results after a failed run.
 */

import {
  ANNOTATION_KINDS,
  type AnnotationId,
  type AnnotationKind,
  type Span,
} from '@annotext/types';

import type { Document } from '../document/document.js';
import type { PipelineRunResult, RunStatus, StageRecord } from '../pipeline/pipeline-executor.js';

/**
 * Verbal reading of a consistency score
 */
export type ConsistencyAssessment =
  | 'supported'
  | 'partially_supported'
  | 'weakly_supported'
  | 'contradicted';

/**
 * Lower bounds (exclusive) of each assessment
 */
export const CONSISTENCY_THRESHOLDS = {
  supported: 0.7,
  partiallySupported: 0.5,
  weaklySupported: 0.3,
} as const;

/**
 * Hate score above which a span is flagged
 */
export const HATE_FLAG_THRESHOLD = 0.5;

export function classifyConsistency(consistency: number): ConsistencyAssessment {
  if (consistency > CONSISTENCY_THRESHOLDS.supported) return 'supported';
  if (consistency > CONSISTENCY_THRESHOLDS.partiallySupported) return 'partially_supported';
  if (consistency > CONSISTENCY_THRESHOLDS.weaklySupported) return 'weakly_supported';
  return 'contradicted';
}

export interface SentimentSummary {
  span: Span;
  label: string;
  score: number;
  source: string;
}

export interface HateVerdictSummary {
  span: Span;
  hate: number;
  nonHate: number;
  flagged: boolean;
  source: string;
}

export interface FactCheckSummary {
  claimId: AnnotationId;
  factId: AnnotationId;
  claim: string;
  fact: string;
  consistency: number;
  assessment: ConsistencyAssessment;
  claimSpan: Span;
  source: string;
}

export interface ClaimSummary {
  id: AnnotationId;
  value: string;
  span: Span;
  /** Linked fact texts, in link order */
  facts: string[];
  /** Number of verdicts naming this claim */
  verdicts: number;
}

/**
 * Aggregated view of a document's annotations
 */
export interface AggregateResult {
  /** Terminal status of the run, when one was given */
  status?: RunStatus;
  /** Per-stage records of the run, when one was given */
  stages?: StageRecord[];
  total: number;
  /** Count per kind; every kind is present */
  counts: Record<AnnotationKind, number>;
  sentiments: SentimentSummary[];
  hateVerdicts: HateVerdictSummary[];
  factChecks: FactCheckSummary[];
  claims: ClaimSummary[];
}

/**
 * Summarise the annotations committed to a document
 */
export function aggregateResults(document: Document, run?: PipelineRunResult): AggregateResult {
  const { store, graph } = document;

  const counts: Record<AnnotationKind, number> = {
    sentiment: 0,
    hate_verdict: 0,
    claim: 0,
    fact: 0,
    fact_check_verdict: 0,
  };
  for (const kind of ANNOTATION_KINDS) {
    counts[kind] = store.countByType(kind);
  }

  const sentiments: SentimentSummary[] = [];
  for (const annotation of store.queryByType('sentiment')) {
    sentiments.push({
      span: annotation.span,
      label: annotation.polarity.label,
      score: annotation.polarity.score,
      source: annotation.source,
    });
  }

  const hateVerdicts: HateVerdictSummary[] = [];
  for (const annotation of store.queryByType('hate_verdict')) {
    hateVerdicts.push({
      span: annotation.span,
      hate: annotation.hate,
      nonHate: annotation.nonHate,
      flagged: annotation.hate > HATE_FLAG_THRESHOLD,
      source: annotation.source,
    });
  }

  const verdictsPerClaim = new Map<AnnotationId, number>();
  const factChecks: FactCheckSummary[] = [];
  for (const verdict of store.queryByType('fact_check_verdict')) {
    const claim = store.getOfKind(verdict.claimId, 'claim');
    const fact = store.getOfKind(verdict.factId, 'fact');
    if (!claim || !fact) continue;

    verdictsPerClaim.set(claim.id, (verdictsPerClaim.get(claim.id) ?? 0) + 1);
    factChecks.push({
      claimId: claim.id,
      factId: fact.id,
      claim: claim.value,
      fact: fact.value,
      consistency: verdict.consistency,
      assessment: classifyConsistency(verdict.consistency),
      claimSpan: claim.span,
      source: verdict.source,
    });
  }

  const claims: ClaimSummary[] = [];
  for (const claim of store.queryByType('claim')) {
    claims.push({
      id: claim.id,
      value: claim.value,
      span: claim.span,
      facts: graph.resolveClaim(claim).map((fact) => fact.value),
      verdicts: verdictsPerClaim.get(claim.id) ?? 0,
    });
  }

  const result: AggregateResult = {
    total: store.count(),
    counts,
    sentiments,
    hateVerdicts,
    factChecks,
    claims,
  };
  if (run) {
    result.status = run.status;
    result.stages = run.stages;
  }
  return result;
}
