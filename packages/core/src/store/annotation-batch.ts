/**
 * Annotation Batch
 *
 * Buffer of annotations and links written by one stage. Nothing reaches
 * the store until commit(); commit validates every pending entry first
 * and only then applies them, so a rejected batch leaves the store as it
 * was.
 */

import type {
  Annotation,
  AnnotationDraft,
  AnnotationId,
  AnnotationKind,
} from '@annotext/types';

import {
  AnnotationError,
  DuplicateAnnotationError,
  EmptyLinkError,
  UnknownAnnotationError,
} from '../errors.js';
import type { AnnotationGraph } from '../graph/annotation-graph.js';

import { annotationKey } from './annotation-key.js';
import type { AnnotationStore } from './annotation-store.js';
import { assertValidDraft } from './annotation-validation.js';

interface PendingAnnotation {
  id: AnnotationId;
  draft: AnnotationDraft;
}

interface PendingLink {
  claimId: AnnotationId;
  factIds: readonly AnnotationId[];
}

interface PreparedAnnotation {
  id: AnnotationId;
  draft: AnnotationDraft;
}

/**
 * Outcome of a successful commit
 */
export interface BatchCommitResult {
  /** Annotations inserted into the store, in batch order */
  added: Annotation[];
  /** Drafts dropped because an identical annotation already existed */
  duplicates: number;
  /** Claim -> facts link operations applied */
  links: number;
}

/**
 * Write buffer for a single stage
 */
export class AnnotationBatch {
  private readonly entries: PendingAnnotation[] = [];
  private readonly links: PendingLink[] = [];
  private state: 'open' | 'committed' | 'discarded' = 'open';

  constructor(
    private readonly store: AnnotationStore,
    private readonly graph: AnnotationGraph,
    /** Producer name recorded on every committed annotation */
    readonly source: string,
  ) {}

  /**
   * Queue an annotation
   *
   * @returns the id the annotation will have once committed, usable as a
   *   reference by later verdicts and links in the same batch
   */
  add(draft: AnnotationDraft): AnnotationId {
    this.assertOpen();
    const id = this.store.reserveId();
    this.entries.push({ id, draft });
    return id;
  }

  /**
   * Queue a claim -> facts link. Ids may be stored or pending in this batch.
   *
   * @throws EmptyLinkError if `factIds` is empty
   */
  link(claimId: AnnotationId, factIds: readonly AnnotationId[]): void {
    this.assertOpen();
    if (factIds.length === 0) {
      throw new EmptyLinkError(claimId);
    }
    this.links.push({ claimId, factIds: [...factIds] });
  }

  /**
   * Number of queued annotations
   */
  get size(): number {
    return this.entries.length;
  }

  /**
   * Queued drafts, in insertion order
   */
  get pending(): readonly AnnotationDraft[] {
    return this.entries.map((entry) => entry.draft);
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Validate and apply every queued annotation and link
   *
   * @throws AnnotationError subclasses if any entry is invalid; the store
   *   is not modified in that case
   */
  commit(): BatchCommitResult {
    this.assertOpen();

    const { prepared, idMap, duplicates } = this.prepare();
    const resolvedLinks = this.prepareLinks(idMap, prepared);

    const added: Annotation[] = [];
    for (const { id, draft } of prepared) {
      added.push(this.store.add(draft, { id, source: this.source }));
    }
    for (const { claimId, factIds } of resolvedLinks) {
      this.graph.linkClaimToFacts(claimId, factIds);
    }

    this.state = 'committed';
    return { added, duplicates, links: resolvedLinks.length };
  }

  /**
   * Drop everything queued. Reserved ids are not reused.
   */
  discard(): void {
    this.state = 'discarded';
    this.entries.length = 0;
    this.links.length = 0;
  }

  private prepare(): {
    prepared: PreparedAnnotation[];
    idMap: Map<AnnotationId, AnnotationId>;
    duplicates: number;
  } {
    const prepared: PreparedAnnotation[] = [];
    const idMap = new Map<AnnotationId, AnnotationId>();
    const pendingKinds = new Map<AnnotationId, AnnotationKind>();
    const seenKeys = new Map<string, AnnotationId>();
    let duplicates = 0;

    const resolve = (id: AnnotationId): AnnotationId => idMap.get(id) ?? id;
    const kindOf = (id: AnnotationId): AnnotationKind | undefined =>
      pendingKinds.get(id) ?? this.store.get(id)?.kind;

    for (const entry of this.entries) {
      assertValidDraft(entry.draft, this.store.textLength);

      let draft = entry.draft;
      if (draft.kind === 'fact_check_verdict') {
        const claimId = resolve(draft.claimId);
        const factId = resolve(draft.factId);
        if (kindOf(claimId) !== 'claim') {
          throw new UnknownAnnotationError(draft.claimId, 'claim');
        }
        if (kindOf(factId) !== 'fact') {
          throw new UnknownAnnotationError(draft.factId, 'fact');
        }
        draft = { ...draft, claimId, factId };
      }

      const key = annotationKey(draft);
      const existingId = seenKeys.get(key) ?? this.store.findDuplicate(draft)?.id;
      if (existingId !== undefined) {
        if (this.store.duplicatePolicy === 'reject') {
          throw new DuplicateAnnotationError(draft.kind, draft.span, existingId);
        }
        idMap.set(entry.id, existingId);
        duplicates++;
        continue;
      }

      seenKeys.set(key, entry.id);
      pendingKinds.set(entry.id, draft.kind);
      prepared.push({ id: entry.id, draft });
    }

    return { prepared, idMap, duplicates };
  }

  private prepareLinks(
    idMap: Map<AnnotationId, AnnotationId>,
    prepared: readonly PreparedAnnotation[],
  ): PendingLink[] {
    const pendingKinds = new Map<AnnotationId, AnnotationKind>(
      prepared.map(({ id, draft }) => [id, draft.kind]),
    );
    const kindOf = (id: AnnotationId): AnnotationKind | undefined =>
      pendingKinds.get(id) ?? this.store.get(id)?.kind;
    const resolve = (id: AnnotationId): AnnotationId => idMap.get(id) ?? id;

    return this.links.map((link) => {
      const claimId = resolve(link.claimId);
      if (kindOf(claimId) !== 'claim') {
        throw new UnknownAnnotationError(link.claimId, 'claim');
      }
      const factIds = link.factIds.map(resolve);
      for (const factId of factIds) {
        if (kindOf(factId) !== 'fact') {
          throw new UnknownAnnotationError(factId, 'fact');
        }
      }
      return { claimId, factIds };
    });
  }

  private assertOpen(): void {
    if (this.state !== 'open') {
      throw new AnnotationError(`Batch for '${this.source}' is already ${this.state}`);
    }
  }
}
