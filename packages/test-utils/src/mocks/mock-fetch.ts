/**
 * In-process stand-in for `fetch`
 *
 * Routes requests by method and path to canned responses, records every
 * request, and honours the request's AbortSignal so client timeouts can
 * be exercised without a server.
 */

import { vi } from 'vitest';

/**
 * A request as seen by the mock
 */
export interface RecordedRequest {
  method: string;
  url: string;
  path: string;
  /** Parsed JSON body, or undefined for requests without one */
  body: unknown;
}

/**
 * Canned reply
 */
export interface MockReply {
  /** HTTP status (default: 200) */
  status?: number;
  statusText?: string;
  /** Serialized as JSON */
  body?: unknown;
  /** Sent as-is instead of `body` */
  rawBody?: string;
  /** Delay before replying; aborting the request cancels it */
  latencyMs?: number;
  /** Reject the fetch with this error instead of replying */
  error?: Error;
}

export type MockRoute = MockReply | ((request: RecordedRequest) => MockReply);

export interface MockFetchConfig {
  /** Keyed by "METHOD /path", e.g. "POST /v1/process" */
  routes?: Record<string, MockRoute>;
}

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

function wait(ms: number, signal: AbortSignal | null | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function parseBody(body: RequestInit['body']): unknown {
  if (typeof body !== 'string') return undefined;
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

/**
 * Create a mock fetch. Unrouted requests fail like a refused connection.
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockFetch(config: MockFetchConfig = {}) {
  const routes = config.routes ?? {};
  const requests: RecordedRequest[] = [];

  const fetch = vi.fn(async (input: string, init: RequestInit): Promise<Response> => {
    const method = (init.method ?? 'GET').toUpperCase();
    const path = new URL(input).pathname;
    const request: RecordedRequest = { method, url: input, path, body: parseBody(init.body) };
    requests.push(request);

    const route = routes[`${method} ${path}`];
    if (route === undefined) {
      throw new TypeError(`fetch failed: connect ECONNREFUSED ${new URL(input).host}`);
    }

    const reply = typeof route === 'function' ? route(request) : route;
    if (reply.latencyMs !== undefined && reply.latencyMs > 0) {
      await wait(reply.latencyMs, init.signal);
    } else if (init.signal?.aborted) {
      throw abortError();
    }
    if (reply.error) {
      throw reply.error;
    }

    const status = reply.status ?? 200;
    const payload = reply.rawBody ?? JSON.stringify(reply.body ?? {});
    return new Response(payload, {
      status,
      statusText: reply.statusText ?? '',
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { fetch, requests };
}

export type MockFetch = ReturnType<typeof createMockFetch>;
