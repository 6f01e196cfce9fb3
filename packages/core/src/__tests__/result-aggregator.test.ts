import { describe, it, expect } from 'vitest';

import { aggregateResults, classifyConsistency } from '../aggregate/result-aggregator.js';
import { createDocument } from '../document/document.js';

describe('classifyConsistency', () => {
  it.each([
    [0.95, 'supported'],
    [0.71, 'supported'],
    [0.7, 'partially_supported'],
    [0.51, 'partially_supported'],
    [0.5, 'weakly_supported'],
    [0.31, 'weakly_supported'],
    [0.3, 'contradicted'],
    [0, 'contradicted'],
  ])('should classify %s as %s', (score, expected) => {
    expect(classifyConsistency(score)).toBe(expected);
  });
});

describe('aggregateResults', () => {
  const TEXT = 'Prices fell sharply. Shops were busy. Everyone was happy.';

  it('should report zero counts for every kind of an empty document', () => {
    const summary = aggregateResults(createDocument(TEXT));

    expect(summary.total).toBe(0);
    expect(summary.counts).toEqual({
      sentiment: 0,
      hate_verdict: 0,
      claim: 0,
      fact: 0,
      fact_check_verdict: 0,
    });
    expect(summary.status).toBeUndefined();
  });

  it('should summarise claims, verdicts and hate scores', () => {
    const document = createDocument(TEXT);
    const { claim, facts } = document.seedClaim({
      value: 'prices fell sharply',
      span: { begin: 0, end: 20 },
      facts: [{ value: 'prices fell 0.2%' }, { value: 'prices fell 9%' }],
    });
    const [small, large] = facts;
    if (!small || !large) throw new Error('expected two facts');

    document.store.add({
      kind: 'fact_check_verdict',
      span: claim.span,
      claimId: claim.id,
      factId: small.id,
      consistency: 0.2,
    });
    document.store.add({
      kind: 'fact_check_verdict',
      span: claim.span,
      claimId: claim.id,
      factId: large.id,
      consistency: 0.85,
    });
    document.store.add({ kind: 'hate_verdict', span: { begin: 21, end: 37 }, hate: 0.6, nonHate: 0.4 });
    document.store.add({ kind: 'hate_verdict', span: { begin: 0, end: 20 }, hate: 0.5, nonHate: 0.5 });

    const summary = aggregateResults(document);

    expect(summary.total).toBe(7);
    expect(summary.factChecks.map((f) => [f.fact, f.assessment])).toEqual([
      ['prices fell 0.2%', 'contradicted'],
      ['prices fell 9%', 'supported'],
    ]);
    expect(summary.claims).toEqual([
      {
        id: claim.id,
        value: 'prices fell sharply',
        span: { begin: 0, end: 20 },
        facts: ['prices fell 0.2%', 'prices fell 9%'],
        verdicts: 2,
      },
    ]);
    expect(summary.hateVerdicts.map((h) => h.flagged)).toEqual([false, true]);
  });
});
