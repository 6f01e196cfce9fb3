/**
 * Identity keys for duplicate detection
 *
 * Two annotations are the same when kind, span and value agree. The
 * "value" part depends on the kind.
 */

import type { Annotation, AnnotationDraft, AnnotationKind } from '@annotext/types';

/**
 * Value component of an annotation's identity
 */
export function annotationValueKey(annotation: AnnotationDraft | Annotation): string {
  switch (annotation.kind) {
    case 'sentiment': {
      const scores = Object.entries(annotation.polarity.scores).sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0,
      );
      // Labels are free text; encode instead of joining with separators
      return JSON.stringify([annotation.polarity.label, annotation.polarity.score, scores]);
    }
    case 'hate_verdict':
      return `${annotation.hate}|${annotation.nonHate}`;
    case 'claim':
    case 'fact':
      return annotation.value;
    case 'fact_check_verdict':
      return `${annotation.claimId}|${annotation.factId}|${annotation.consistency}`;
  }
}

/**
 * Full (kind, span, value) identity key
 */
export function annotationKey(annotation: AnnotationDraft | Annotation): string {
  const kind: AnnotationKind = annotation.kind;
  return `${kind}@${annotation.span.begin}:${annotation.span.end}#${annotationValueKey(annotation)}`;
}
