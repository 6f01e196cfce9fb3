/**
 * Annotation Graph
 *
 * Claim <-> Fact links layered on the store. Links are kept as id
 * adjacency lists in both directions; every mutation updates both sides
 * before returning, so the graph is always navigable from either end.
 */

import type {
  AnnotationId,
  ClaimAnnotation,
  FactAnnotation,
} from '@annotext/types';

import { EmptyLinkError, UnknownAnnotationError } from '../errors.js';
import type { ReadonlyAnnotationStore } from '../store/annotation-store.js';

/**
 * A claim, or its id
 */
export type ClaimRef = AnnotationId | ClaimAnnotation;

/**
 * A fact, or its id
 */
export type FactRef = AnnotationId | FactAnnotation;

/**
 * One claim checked against one of its facts
 */
export interface ClaimFactPair {
  claim: ClaimAnnotation;
  fact: FactAnnotation;
}

/**
 * Read-only view of the graph handed to stages
 */
export interface ReadonlyAnnotationGraph {
  resolveClaim(claim: ClaimRef): FactAnnotation[];
  resolveFact(fact: FactRef): ClaimAnnotation[];
  isLinked(claim: ClaimRef): boolean;
  claimFactPairs(): ClaimFactPair[];
  linkCount(): number;
}

function refId(ref: AnnotationId | { readonly id: AnnotationId }): AnnotationId {
  return typeof ref === 'number' ? ref : ref.id;
}

/**
 * Bidirectional claim/fact link index over an annotation store
 */
export class AnnotationGraph implements ReadonlyAnnotationGraph {
  /** claimId -> linked fact ids, in link order */
  private readonly claimFacts = new Map<AnnotationId, readonly AnnotationId[]>();

  /** factId -> citing claim ids, in link order */
  private readonly factClaims = new Map<AnnotationId, readonly AnnotationId[]>();

  constructor(private readonly store: ReadonlyAnnotationStore) {}

  /**
   * Set a claim's fact list and register the claim on each fact.
   *
   * Repeated facts are collapsed (first occurrence wins). Relinking a
   * claim replaces its fact list and drops it from facts no longer listed.
   *
   * @throws EmptyLinkError if `facts` is empty
   * @throws UnknownAnnotationError if an id is not a claim/fact in the store
   */
  linkClaimToFacts(claim: ClaimRef, facts: readonly FactRef[]): void {
    const claimId = refId(claim);
    const factIds = this.validateLink(claimId, facts.map(refId));

    const previous = this.claimFacts.get(claimId) ?? [];
    for (const factId of previous) {
      if (!factIds.includes(factId)) {
        const remaining = (this.factClaims.get(factId) ?? []).filter((id) => id !== claimId);
        this.factClaims.set(factId, remaining);
      }
    }

    this.claimFacts.set(claimId, factIds);
    for (const factId of factIds) {
      const claims = this.factClaims.get(factId) ?? [];
      if (!claims.includes(claimId)) {
        this.factClaims.set(factId, [...claims, claimId]);
      }
    }
  }

  /**
   * Check a link request without applying it
   *
   * @returns the de-duplicated fact ids in link order
   */
  validateLink(claimId: AnnotationId, factIds: readonly AnnotationId[]): AnnotationId[] {
    if (!this.store.getOfKind(claimId, 'claim')) {
      throw new UnknownAnnotationError(claimId, 'claim');
    }
    if (factIds.length === 0) {
      throw new EmptyLinkError(claimId);
    }
    const unique: AnnotationId[] = [];
    for (const factId of factIds) {
      if (!this.store.getOfKind(factId, 'fact')) {
        throw new UnknownAnnotationError(factId, 'fact');
      }
      if (!unique.includes(factId)) {
        unique.push(factId);
      }
    }
    return unique;
  }

  /**
   * Facts linked to a claim, in link order
   */
  resolveClaim(claim: ClaimRef): FactAnnotation[] {
    const ids = this.claimFacts.get(refId(claim)) ?? [];
    const facts: FactAnnotation[] = [];
    for (const id of ids) {
      const fact = this.store.getOfKind(id, 'fact');
      if (fact) facts.push(fact);
    }
    return facts;
  }

  /**
   * Claims citing a fact, in link order
   */
  resolveFact(fact: FactRef): ClaimAnnotation[] {
    const ids = this.factClaims.get(refId(fact)) ?? [];
    const claims: ClaimAnnotation[] = [];
    for (const id of ids) {
      const claim = this.store.getOfKind(id, 'claim');
      if (claim) claims.push(claim);
    }
    return claims;
  }

  isLinked(claim: ClaimRef): boolean {
    return (this.claimFacts.get(refId(claim))?.length ?? 0) > 0;
  }

  /**
   * Every (claim, fact) pair, claims in store order and facts in link order
   */
  claimFactPairs(): ClaimFactPair[] {
    const pairs: ClaimFactPair[] = [];
    for (const claim of this.store.queryByType('claim')) {
      for (const fact of this.resolveClaim(claim)) {
        pairs.push({ claim, fact });
      }
    }
    return pairs;
  }

  /**
   * Number of claim -> fact edges
   */
  linkCount(): number {
    let total = 0;
    for (const ids of this.claimFacts.values()) {
      total += ids.length;
    }
    return total;
  }
}
