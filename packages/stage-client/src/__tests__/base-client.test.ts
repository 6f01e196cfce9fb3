import { createDocument } from '@annotext/core';
import { createMockFetch, createStageContext } from '@annotext/test-utils';
import { describe, it, expect, vi } from 'vitest';

import { HateCheckClient } from '../clients/hate-check.js';
import {
  StageResponseError,
  StageTimeoutError,
  StageUnavailableError,
} from '../errors.js';

const TEXT = 'A calm and friendly message.';
const OK_BODY = { hate: [0.05], non_hate: [0.95] };

/**
 * A fetch whose error response carries a body that records being cancelled
 */
function errorResponseFetch(status: number) {
  const cancel = vi.fn();
  const fetch = vi.fn(
    async () => new Response(new ReadableStream<Uint8Array>({ cancel }), { status }),
  );
  return { fetch, cancel };
}

function runAgainst(routes: Parameters<typeof createMockFetch>[0], timeoutMs = 1000) {
  const mock = createMockFetch(routes);
  const client = new HateCheckClient({ fetch: mock.fetch, timeoutMs });
  const context = createStageContext(createDocument(TEXT), client.name);
  return { client, context, mock };
}

describe('BaseStageClient', () => {
  describe('error mapping', () => {
    it('should report an unreachable service as unavailable', async () => {
      const { client, context } = runAgainst({});

      await expect(client.run(context)).rejects.toThrow(StageUnavailableError);
      await expect(client.run(context)).rejects.toThrow(
        "Stage 'hate_check' is unavailable: fetch failed: connect ECONNREFUSED localhost:9002",
      );
    });

    it.each([
      [502, StageUnavailableError],
      [503, StageUnavailableError],
      [408, StageTimeoutError],
      [504, StageTimeoutError],
      [500, StageResponseError],
      [404, StageResponseError],
    ])('should map HTTP %i', async (status, expected) => {
      const { client, context } = runAgainst({
        routes: { 'POST /v1/process': { status, statusText: 'Nope' } },
      });

      await expect(client.run(context)).rejects.toThrow(expected);
    });

    it('should include the status in other HTTP failures', async () => {
      const { client, context } = runAgainst({
        routes: { 'POST /v1/process': { status: 500, statusText: 'Internal Server Error' } },
      });

      const error = await client.run(context).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(StageResponseError);
      if (error instanceof StageResponseError) {
        expect(error.status).toBe(500);
        expect(error.stage).toBe('hate_check');
        expect(error.message).toBe(
          "Stage 'hate_check' returned an invalid response: HTTP 500: Internal Server Error",
        );
      }
    });

    it('should release the body of an HTTP failure', async () => {
      const { fetch, cancel } = errorResponseFetch(500);
      const client = new HateCheckClient({ fetch });
      const context = createStageContext(createDocument(TEXT), client.name);

      await expect(client.run(context)).rejects.toThrow(StageResponseError);
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('should time out slow services', async () => {
      const { client, context } = runAgainst(
        { routes: { 'POST /v1/process': { body: OK_BODY, latencyMs: 500 } } },
        20,
      );

      await expect(client.run(context)).rejects.toThrow("Stage 'hate_check' timed out after 20ms");
    });

    it('should reject bodies that are not JSON', async () => {
      const { client, context } = runAgainst({
        routes: { 'POST /v1/process': { rawBody: 'not json' } },
      });

      await expect(client.run(context)).rejects.toThrow(/body is not valid JSON/);
    });

    it('should reject bodies that fail the schema', async () => {
      const { client, context } = runAgainst({
        routes: { 'POST /v1/process': { body: { hate: 'high', non_hate: [0.1] } } },
      });

      await expect(client.run(context)).rejects.toThrow(
        "Stage 'hate_check' returned an invalid response: hate: Expected array, received string",
      );
    });

    it('should reject scores outside [0, 1]', async () => {
      const { client, context } = runAgainst({
        routes: { 'POST /v1/process': { body: { hate: [1.5], non_hate: [0.1] } } },
      });

      await expect(client.run(context)).rejects.toThrow(StageResponseError);
    });

    it('should surface the run abort reason', async () => {
      const mock = createMockFetch({
        routes: { 'POST /v1/process': { body: OK_BODY, latencyMs: 500 } },
      });
      const client = new HateCheckClient({ fetch: mock.fetch });
      const controller = new AbortController();
      const context = createStageContext(createDocument(TEXT), client.name, controller.signal);

      const pending = client.run(context);
      setTimeout(() => controller.abort(new Error('run over')), 10);

      await expect(pending).rejects.toThrow('run over');
    });
  });

  describe('healthCheck', () => {
    it('should report a healthy service', async () => {
      const mock = createMockFetch({ routes: { 'GET /v1/typesystem': { body: {} } } });
      const client = new HateCheckClient({ fetch: mock.fetch });

      const health = await client.healthCheck();

      expect(health.healthy).toBe(true);
      expect(health.name).toBe('hate_check');
      expect(health.latencyMs).toBeGreaterThanOrEqual(0);
      expect(mock.requests[0]?.url).toBe('http://localhost:9002/v1/typesystem');
    });

    it('should report HTTP errors', async () => {
      const mock = createMockFetch({ routes: { 'GET /v1/typesystem': { status: 500 } } });
      const client = new HateCheckClient({ fetch: mock.fetch });

      const health = await client.healthCheck();

      expect(health).toMatchObject({ healthy: false, error: 'HTTP 500' });
    });

    it('should release the body of a failed health check', async () => {
      const { fetch, cancel } = errorResponseFetch(503);
      const client = new HateCheckClient({ fetch });

      const health = await client.healthCheck();

      expect(health).toMatchObject({ healthy: false, error: 'HTTP 503' });
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('should report unreachable services', async () => {
      const client = new HateCheckClient({ fetch: createMockFetch().fetch });

      const health = await client.healthCheck();

      expect(health.healthy).toBe(false);
      expect(health.error).toBe('fetch failed: connect ECONNREFUSED localhost:9002');
    });
  });
});
