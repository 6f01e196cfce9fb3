import { createDocument } from '@annotext/core';
import { createMockFetch, createStageContext } from '@annotext/test-utils';
import { describe, it, expect } from 'vitest';

import { DEFAULT_HATE_CHECK_CONFIG, HateCheckClient } from '../clients/hate-check.js';

const TEXT = 'You people are awful. Have a nice day.';

describe('HateCheckClient', () => {
  it('should have correct default values', () => {
    expect(DEFAULT_HATE_CHECK_CONFIG.endpoint).toBe('http://localhost:9002');
    expect(DEFAULT_HATE_CHECK_CONFIG.timeoutMs).toBe(60000);
  });

  it('should send the document without model fields', async () => {
    const mock = createMockFetch({
      routes: { 'POST /v1/process': { body: { hate: [0.3], non_hate: [0.7] } } },
    });
    const client = new HateCheckClient({ fetch: mock.fetch });
    const document = createDocument(TEXT, 'en');
    const context = createStageContext(document, client.name);

    await client.run(context);
    context.output.commit();

    expect(mock.requests[0]?.body).toEqual({
      selections: [{ selection: 'text', sentences: [{ text: TEXT, begin: 0, end: 38 }] }],
      lang: 'en',
      doc_len: 38,
    });
    const verdicts = [...document.store.queryByType('hate_verdict')];
    expect(verdicts.map((v) => [v.span.begin, v.span.end, v.hate, v.nonHate])).toEqual([
      [0, 38, 0.3, 0.7],
    ]);
  });

  it('should add one verdict per sentence in sentence mode', async () => {
    const mock = createMockFetch({
      routes: { 'POST /v1/process': { body: { hate: [0.8, 0.01], non_hate: [0.2, 0.99] } } },
    });
    const client = new HateCheckClient({ fetch: mock.fetch }, { selection: 'sentence' });
    const context = createStageContext(createDocument(TEXT), client.name);

    await client.run(context);

    expect(context.output.pending).toEqual([
      { kind: 'hate_verdict', span: { begin: 0, end: 21 }, hate: 0.8, nonHate: 0.2 },
      { kind: 'hate_verdict', span: { begin: 22, end: 38 }, hate: 0.01, nonHate: 0.99 },
    ]);
  });

  it('should reject score arrays that do not match the sentences', async () => {
    const mock = createMockFetch({
      routes: { 'POST /v1/process': { body: { hate: [0.8], non_hate: [] } } },
    });
    const client = new HateCheckClient({ fetch: mock.fetch });
    const context = createStageContext(createDocument(TEXT), client.name);

    await expect(client.run(context)).rejects.toThrow(
      "Stage 'hate_check' returned an invalid response: expected 1 hate/non_hate scores, got 1/0",
    );
  });
});
