/**
 * Annotation Store
 *
 * Append-only, span-ordered collection of typed annotations over one
 * document's text. Per-kind lists are replaced (never mutated in place)
 * on every insert, so an iteration that has already started keeps
 * reading the snapshot it began with.
 */

import {
  ANNOTATION_KINDS,
  SEED_SOURCE,
  type Annotation,
  type AnnotationDraft,
  type AnnotationId,
  type AnnotationKind,
  type AnnotationOf,
} from '@annotext/types';

import { compareSpans } from '../document/span.js';
import { DuplicateAnnotationError, UnknownAnnotationError } from '../errors.js';

import { annotationKey } from './annotation-key.js';
import { assertValidDraft } from './annotation-validation.js';

/**
 * What `add` does when an identical annotation already exists
 *
 * - reject: throw DuplicateAnnotationError
 * - ignore: return the existing annotation, insert nothing
 */
export type DuplicatePolicy = 'reject' | 'ignore';

export interface AnnotationStoreOptions {
  /** Length of the document text; spans are validated against it */
  textLength: number;
  /** Duplicate handling (default: 'reject') */
  duplicatePolicy?: DuplicatePolicy;
}

export interface AddAnnotationOptions {
  /** Producer name recorded on the annotation (default: "seed") */
  source?: string;
  /** Id previously obtained from reserveId() */
  id?: AnnotationId;
}

/**
 * Read-only view of the store handed to stages and reporters
 */
export interface ReadonlyAnnotationStore {
  readonly textLength: number;
  readonly duplicatePolicy: DuplicatePolicy;
  get(id: AnnotationId): Annotation | undefined;
  getOfKind<K extends AnnotationKind>(id: AnnotationId, kind: K): AnnotationOf<K> | undefined;
  has(id: AnnotationId): boolean;
  findDuplicate(draft: AnnotationDraft): Annotation | undefined;
  queryByType<K extends AnnotationKind>(kind: K): Iterable<AnnotationOf<K>>;
  queryAll(): Iterable<Annotation>;
  count(): number;
  countByType(kind: AnnotationKind): number;
}

/**
 * Narrow an annotation to a given kind
 */
export function isAnnotationOfKind<K extends AnnotationKind>(
  annotation: Annotation,
  kind: K,
): annotation is AnnotationOf<K> {
  return annotation.kind === kind;
}

/**
 * Order annotations by (begin, end), ties broken by id
 */
export function compareAnnotations(a: Annotation, b: Annotation): number {
  return compareSpans(a.span, b.span) || a.id - b.id;
}

/**
 * Copy of `list` with `item` inserted at its ordered position
 */
function insertOrdered(list: readonly Annotation[], item: Annotation): readonly Annotation[] {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compareAnnotations(list[mid]!, item) <= 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  const next = list.slice();
  next.splice(low, 0, item);
  return next;
}

/**
 * In-memory annotation store for a single document
 */
export class AnnotationStore implements ReadonlyAnnotationStore {
  readonly textLength: number;
  readonly duplicatePolicy: DuplicatePolicy;

  /** All annotations indexed by id */
  private readonly byId = new Map<AnnotationId, Annotation>();

  /** Identity key -> id, for duplicate detection */
  private readonly byKey = new Map<string, AnnotationId>();

  /** Ordered snapshot per kind */
  private readonly byKind = new Map<AnnotationKind, readonly Annotation[]>();

  /** Ordered snapshot of everything */
  private all: readonly Annotation[] = [];

  private nextId: AnnotationId = 1;

  constructor(options: AnnotationStoreOptions) {
    this.textLength = options.textLength;
    this.duplicatePolicy = options.duplicatePolicy ?? 'reject';
    for (const kind of ANNOTATION_KINDS) {
      this.byKind.set(kind, []);
    }
  }

  /**
   * Allocate an id for an annotation that will be added later.
   * Reserved ids that are never used leave a gap; ids are never reused.
   */
  reserveId(): AnnotationId {
    return this.nextId++;
  }

  /**
   * Insert an annotation
   *
   * @throws InvalidSpanError if the span does not fit the document
   * @throws InvalidScoreError if a verdict's consistency is outside [0, 1]
   * @throws UnknownAnnotationError if a verdict references a missing claim or fact
   * @throws DuplicateAnnotationError if an identical annotation exists and the policy is 'reject'
   */
  add<D extends AnnotationDraft>(
    draft: D,
    options: AddAnnotationOptions = {},
  ): AnnotationOf<D['kind']> {
    const annotation = this.insert(draft, options);
    if (!isAnnotationOfKind<D['kind']>(annotation, draft.kind)) {
      throw new UnknownAnnotationError(annotation.id, draft.kind);
    }
    return annotation;
  }

  private insert(draft: AnnotationDraft, options: AddAnnotationOptions): Annotation {
    this.validate(draft);

    const key = annotationKey(draft);
    const existingId = this.byKey.get(key);
    if (existingId !== undefined) {
      if (this.duplicatePolicy === 'ignore') {
        return this.byId.get(existingId)!;
      }
      throw new DuplicateAnnotationError(draft.kind, draft.span, existingId);
    }

    const id = this.claimId(options.id);
    const annotation = freezeAnnotation(draft, id, options.source ?? SEED_SOURCE);

    this.byId.set(id, annotation);
    this.byKey.set(key, id);
    this.byKind.set(annotation.kind, insertOrdered(this.byKind.get(annotation.kind) ?? [], annotation));
    this.all = insertOrdered(this.all, annotation);

    return annotation;
  }

  /**
   * Validate a draft without inserting it
   *
   * Used by batches to check all pending annotations before committing any.
   */
  validate(draft: AnnotationDraft): void {
    assertValidDraft(draft, this.textLength);
    if (draft.kind === 'fact_check_verdict') {
      if (!this.getOfKind(draft.claimId, 'claim')) {
        throw new UnknownAnnotationError(draft.claimId, 'claim');
      }
      if (!this.getOfKind(draft.factId, 'fact')) {
        throw new UnknownAnnotationError(draft.factId, 'fact');
      }
    }
  }

  get(id: AnnotationId): Annotation | undefined {
    return this.byId.get(id);
  }

  getOfKind<K extends AnnotationKind>(id: AnnotationId, kind: K): AnnotationOf<K> | undefined {
    const annotation = this.byId.get(id);
    return annotation && isAnnotationOfKind(annotation, kind) ? annotation : undefined;
  }

  has(id: AnnotationId): boolean {
    return this.byId.has(id);
  }

  /**
   * Existing annotation with the same identity as the draft, if any
   */
  findDuplicate(draft: AnnotationDraft): Annotation | undefined {
    const id = this.byKey.get(annotationKey(draft));
    return id === undefined ? undefined : this.byId.get(id);
  }

  /**
   * All annotations of one kind, ordered by (begin, end).
   * Each iteration reads the snapshot current when it starts.
   */
  queryByType<K extends AnnotationKind>(kind: K): Iterable<AnnotationOf<K>> {
    const byKind = this.byKind;
    return {
      *[Symbol.iterator](): Iterator<AnnotationOf<K>> {
        for (const annotation of byKind.get(kind) ?? []) {
          if (isAnnotationOfKind(annotation, kind)) {
            yield annotation;
          }
        }
      },
    };
  }

  /**
   * Every annotation regardless of kind, ordered by (begin, end)
   */
  queryAll(): Iterable<Annotation> {
    return {
      [Symbol.iterator]: (): Iterator<Annotation> => this.all[Symbol.iterator](),
    };
  }

  count(): number {
    return this.byId.size;
  }

  countByType(kind: AnnotationKind): number {
    return this.byKind.get(kind)?.length ?? 0;
  }

  private claimId(requested: AnnotationId | undefined): AnnotationId {
    if (requested === undefined) {
      return this.reserveId();
    }
    if (!Number.isInteger(requested) || requested < 1 || requested >= this.nextId) {
      throw new UnknownAnnotationError(requested);
    }
    if (this.byId.has(requested)) {
      throw new UnknownAnnotationError(requested);
    }
    return requested;
  }
}

function freezeAnnotation(draft: AnnotationDraft, id: AnnotationId, source: string): Annotation {
  const span = Object.freeze({ begin: draft.span.begin, end: draft.span.end });
  switch (draft.kind) {
    case 'sentiment':
      return Object.freeze({
        ...draft,
        id,
        source,
        span,
        polarity: Object.freeze({
          ...draft.polarity,
          scores: Object.freeze({ ...draft.polarity.scores }),
        }),
      });
    case 'hate_verdict':
    case 'claim':
    case 'fact':
    case 'fact_check_verdict':
      return Object.freeze({ ...draft, id, source, span });
  }
}
