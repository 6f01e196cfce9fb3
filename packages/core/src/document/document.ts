/**
 * Document
 *
 * Immutable text plus language tag. Owns the annotation store and the
 * claim/fact graph for the lifetime of one pipeline run.
 */

import {
  SEED_SOURCE,
  type AnnotationId,
  type ClaimAnnotation,
  type FactAnnotation,
  type Span,
} from '@annotext/types';

import { UnknownAnnotationError } from '../errors.js';
import { AnnotationGraph } from '../graph/annotation-graph.js';
import { AnnotationBatch } from '../store/annotation-batch.js';
import { annotationKey } from '../store/annotation-key.js';
import { AnnotationStore, type DuplicatePolicy } from '../store/annotation-store.js';

/**
 * Options for document creation
 */
export interface DocumentOptions {
  /** Duplicate handling for the document's store (default: 'reject') */
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * Fact supplied with a seeded claim. Facts without a span get `[0, 0)`.
 */
export interface SeedFact {
  value: string;
  span?: Span;
}

/**
 * Claim supplied by the caller before the run, with the facts it is checked against
 */
export interface SeedClaim {
  value: string;
  span: Span;
  facts: readonly SeedFact[];
}

/**
 * Result of seeding one claim
 */
export interface SeededClaim {
  claim: ClaimAnnotation;
  facts: FactAnnotation[];
}

const EXTERNAL_FACT_SPAN: Span = { begin: 0, end: 0 };

/**
 * A document under analysis
 */
export class Document {
  readonly store: AnnotationStore;
  readonly graph: AnnotationGraph;

  constructor(
    readonly text: string,
    readonly language: string,
    options: DocumentOptions = {},
  ) {
    const storeOptions: { textLength: number; duplicatePolicy?: DuplicatePolicy } = {
      textLength: text.length,
    };
    if (options.duplicatePolicy !== undefined) {
      storeOptions.duplicatePolicy = options.duplicatePolicy;
    }
    this.store = new AnnotationStore(storeOptions);
    this.graph = new AnnotationGraph(this.store);
  }

  get length(): number {
    return this.text.length;
  }

  /**
   * Open a write buffer for a producer
   */
  createBatch(source: string): AnnotationBatch {
    return new AnnotationBatch(this.store, this.graph, source);
  }

  /**
   * Add a claim and its facts, and link them.
   *
   * A fact identical to one already stored (same text and span) is reused,
   * so several claims can cite the same ground truth. Seeding a claim that
   * is already stored appends the new facts to its existing fact list.
   */
  seedClaim(seed: SeedClaim, source: string = SEED_SOURCE): SeededClaim {
    const batch = this.createBatch(source);
    const claimDraft = { kind: 'claim' as const, span: seed.span, value: seed.value };
    const existing = this.store.findDuplicate(claimDraft);
    const claimId = existing?.id ?? batch.add(claimDraft);

    const factIds: AnnotationId[] = existing
      ? this.graph.resolveClaim(existing.id).map((fact) => fact.id)
      : [];
    const seen = new Set<string>();
    for (const fact of seed.facts) {
      const draft = { kind: 'fact' as const, span: fact.span ?? EXTERNAL_FACT_SPAN, value: fact.value };
      const key = annotationKey(draft);
      if (seen.has(key)) continue;
      seen.add(key);
      factIds.push(this.store.findDuplicate(draft)?.id ?? batch.add(draft));
    }
    batch.link(claimId, factIds);
    batch.commit();

    const claim = this.store.getOfKind(claimId, 'claim');
    if (!claim) {
      throw new UnknownAnnotationError(claimId, 'claim');
    }
    return { claim, facts: this.graph.resolveClaim(claim) };
  }
}

/**
 * Create a document with an empty annotation store
 */
export function createDocument(
  text: string,
  language = 'en',
  options: DocumentOptions = {},
): Document {
  return new Document(text, language, options);
}
