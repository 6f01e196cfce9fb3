import { describe, it, expect } from 'vitest';

import { createDocument } from '../document/document.js';
import {
  AnnotationError,
  DuplicateAnnotationError,
  EmptyLinkError,
  InvalidScoreError,
  InvalidSpanError,
  UnknownAnnotationError,
} from '../errors.js';

const TEXT = 'Rain is expected tomorrow. Roads may flood.';

describe('AnnotationBatch', () => {
  it('should not touch the store before commit', () => {
    const document = createDocument(TEXT);
    const batch = document.createBatch('extractor');

    batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain tomorrow' });

    expect(batch.size).toBe(1);
    expect(document.store.count()).toBe(0);
  });

  it('should commit annotations with the reserved ids and the batch source', () => {
    const document = createDocument(TEXT);
    const batch = document.createBatch('extractor');

    const claimId = batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
    const factId = batch.add({ kind: 'fact', span: { begin: 0, end: 0 }, value: 'forecast' });
    batch.link(claimId, [factId]);
    batch.add({
      kind: 'fact_check_verdict',
      span: { begin: 0, end: 26 },
      claimId,
      factId,
      consistency: 0.9,
    });

    const result = batch.commit();

    expect(result.added.map((a) => a.id)).toEqual([1, 2, 3]);
    expect(result.links).toBe(1);
    expect(result.duplicates).toBe(0);
    expect(document.store.get(claimId)?.source).toBe('extractor');
    expect(document.graph.resolveClaim(claimId).map((f) => f.id)).toEqual([factId]);
  });

  it('should leave the store unchanged when any entry is invalid', () => {
    const document = createDocument(TEXT);
    const batch = document.createBatch('extractor');

    batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
    batch.add({ kind: 'claim', span: { begin: 27, end: 99 }, value: 'flood' });

    expect(() => batch.commit()).toThrow(InvalidSpanError);
    expect(document.store.count()).toBe(0);
  });

  it.each([1.5, Number.NaN])(
    'should reject the whole batch for a consistency of %s',
    (consistency) => {
      const document = createDocument(TEXT);
      const batch = document.createBatch('extractor');

      const claimId = batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
      const factId = batch.add({ kind: 'fact', span: { begin: 0, end: 0 }, value: 'forecast' });
      batch.link(claimId, [factId]);
      batch.add({
        kind: 'fact_check_verdict',
        span: { begin: 0, end: 26 },
        claimId,
        factId,
        consistency,
      });

      expect(() => batch.commit()).toThrow(InvalidScoreError);
      expect(document.store.count()).toBe(0);
      expect(document.graph.resolveClaim(claimId)).toEqual([]);
    },
  );

  it('should reject a duplicate of a stored annotation without applying the batch', () => {
    const document = createDocument(TEXT);
    document.store.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
    const batch = document.createBatch('extractor');

    batch.add({ kind: 'claim', span: { begin: 27, end: 43 }, value: 'flood' });
    batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });

    expect(() => batch.commit()).toThrow(DuplicateAnnotationError);
    expect(document.store.count()).toBe(1);
  });

  it('should reject duplicates within the batch', () => {
    const document = createDocument(TEXT);
    const batch = document.createBatch('extractor');

    batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
    batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });

    expect(() => batch.commit()).toThrow(DuplicateAnnotationError);
    expect(document.store.count()).toBe(0);
  });

  it('should remap dropped duplicates under the ignore policy', () => {
    const document = createDocument(TEXT, 'en', { duplicatePolicy: 'ignore' });
    const existing = document.store.add({ kind: 'fact', span: { begin: 0, end: 0 }, value: 'forecast' });
    const batch = document.createBatch('extractor');

    const claimId = batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
    const factId = batch.add({ kind: 'fact', span: { begin: 0, end: 0 }, value: 'forecast' });
    batch.link(claimId, [factId]);
    batch.add({
      kind: 'fact_check_verdict',
      span: { begin: 0, end: 26 },
      claimId,
      factId,
      consistency: 0.4,
    });

    const result = batch.commit();

    expect(result.duplicates).toBe(1);
    expect(result.added).toHaveLength(2);
    expect(document.store.has(factId)).toBe(false);
    expect(document.graph.resolveFact(existing).map((c) => c.id)).toEqual([claimId]);
    const [verdict] = [...document.store.queryByType('fact_check_verdict')];
    expect(verdict?.factId).toBe(existing.id);
  });

  it('should reject verdicts that reference later entries', () => {
    const document = createDocument(TEXT);
    const batch = document.createBatch('extractor');

    const claimId = batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
    // The fact added after the verdict will receive the next id but one
    const factId = claimId + 2;
    batch.add({
      kind: 'fact_check_verdict',
      span: { begin: 0, end: 26 },
      claimId,
      factId,
      consistency: 0.4,
    });
    batch.add({ kind: 'fact', span: { begin: 0, end: 0 }, value: 'forecast' });

    expect(() => batch.commit()).toThrow(UnknownAnnotationError);
    expect(document.store.count()).toBe(0);
  });

  it('should refuse empty links immediately', () => {
    const document = createDocument(TEXT);
    const batch = document.createBatch('extractor');
    const claimId = batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });

    expect(() => batch.link(claimId, [])).toThrow(EmptyLinkError);
  });

  it('should refuse links to annotations that are not facts', () => {
    const document = createDocument(TEXT);
    const batch = document.createBatch('extractor');
    const claimId = batch.add({ kind: 'claim', span: { begin: 0, end: 26 }, value: 'rain' });
    const otherId = batch.add({ kind: 'claim', span: { begin: 27, end: 43 }, value: 'flood' });
    batch.link(claimId, [otherId]);

    expect(() => batch.commit()).toThrow(UnknownAnnotationError);
    expect(document.store.count()).toBe(0);
  });

  it('should not accept writes after commit or discard', () => {
    const document = createDocument(TEXT);
    const committed = document.createBatch('a');
    committed.commit();
    const discarded = document.createBatch('b');
    discarded.discard();

    expect(() =>
      committed.add({ kind: 'claim', span: { begin: 0, end: 4 }, value: 'rain' }),
    ).toThrow("Batch for 'a' is already committed");
    expect(() => discarded.commit()).toThrow(AnnotationError);
  });
});
