/**
 * Annotation type exports
 *
 * Span-anchored records that analysis stages attach to a document.
 * The set of kinds is closed: every consumer switches over `kind`
 * exhaustively.
 */

/**
 * Half-open character range `[begin, end)` into the document text
 */
export interface Span {
  readonly begin: number;
  readonly end: number;
}

/**
 * Stable arena id assigned by the annotation store
 */
export type AnnotationId = number;

/**
 * Annotation kind discriminator
 */
export type AnnotationKind =
  | 'sentiment'
  | 'hate_verdict'
  | 'claim'
  | 'fact'
  | 'fact_check_verdict';

/**
 * All annotation kinds in display order
 */
export const ANNOTATION_KINDS: readonly AnnotationKind[] = [
  'sentiment',
  'hate_verdict',
  'claim',
  'fact',
  'fact_check_verdict',
];

/**
 * Source tag for annotations supplied by the caller before the run
 */
export const SEED_SOURCE = 'seed';

/**
 * Polarity reported by a sentiment service.
 *
 * The score distribution is whatever the producing service returns;
 * the core only reads `label` and `score`.
 */
export interface SentimentPolarity {
  /** Winning label (e.g. "positive") */
  readonly label: string;
  /** Score of the winning label */
  readonly score: number;
  /** Full distribution keyed by label */
  readonly scores: Readonly<Record<string, number>>;
}

interface AnnotationBase {
  readonly id: AnnotationId;
  readonly span: Span;
  /** Name of the stage that produced the annotation, or "seed" */
  readonly source: string;
}

export interface SentimentAnnotation extends AnnotationBase {
  readonly kind: 'sentiment';
  readonly polarity: SentimentPolarity;
}

export interface HateVerdictAnnotation extends AnnotationBase {
  readonly kind: 'hate_verdict';
  /** Probability-like hate score */
  readonly hate: number;
  /** Probability-like non-hate score (need not sum to 1 with `hate`) */
  readonly nonHate: number;
}

export interface ClaimAnnotation extends AnnotationBase {
  readonly kind: 'claim';
  /** The asserted proposition */
  readonly value: string;
}

/**
 * Ground-truth statement. The span may be degenerate when the fact was
 * supplied from outside the document.
 */
export interface FactAnnotation extends AnnotationBase {
  readonly kind: 'fact';
  readonly value: string;
}

export interface FactCheckVerdictAnnotation extends AnnotationBase {
  readonly kind: 'fact_check_verdict';
  readonly claimId: AnnotationId;
  readonly factId: AnnotationId;
  /** Consistency between claim and fact, 0.0 - 1.0 */
  readonly consistency: number;
}

/**
 * Any stored annotation
 */
export type Annotation =
  | SentimentAnnotation
  | HateVerdictAnnotation
  | ClaimAnnotation
  | FactAnnotation
  | FactCheckVerdictAnnotation;

/**
 * Stored annotation of a given kind
 */
export type AnnotationOf<K extends AnnotationKind> = Extract<Annotation, { kind: K }>;

type DraftOf<A> = A extends Annotation ? Omit<A, 'id' | 'source'> : never;

/**
 * Annotation before the store assigns it an id and source
 */
export type AnnotationDraft = DraftOf<Annotation>;

/**
 * Draft of a given kind
 */
export type AnnotationDraftOf<K extends AnnotationKind> = Extract<AnnotationDraft, { kind: K }>;
