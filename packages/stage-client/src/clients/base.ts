/**
 * Base HTTP client for remote analysis stages
 */

import type { Stage, StageContext } from '@annotext/core';
import type { z } from 'zod';

import { mapWithConcurrency } from '../concurrency.js';
import {
  StageError,
  StageResponseError,
  StageTimeoutError,
  StageUnavailableError,
  mapHttpStatus,
} from '../errors.js';
import type { FetchFunction, StageClientConfig, StageHealth } from '../types/common.js';

/**
 * Path every service processes documents on
 */
export const PROCESS_PATH = '/v1/process';

/**
 * Path used for the liveness check
 */
export const HEALTH_PATH = '/v1/typesystem';

/**
 * Deadline of a health check in milliseconds
 */
export const HEALTH_CHECK_TIMEOUT_MS = 5000;

/**
 * Render zod issues as a single line
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for remote stages with common request handling
 */
export abstract class BaseStageClient implements Stage {
  protected readonly config: Required<Omit<StageClientConfig, 'fetch'>>;
  private readonly fetchFn: FetchFunction;

  constructor(config: StageClientConfig) {
    if (!Number.isInteger(config.scale) || config.scale < 1) {
      throw new RangeError(`Stage '${config.name}' scale must be an integer >= 1, got ${config.scale}`);
    }
    this.config = {
      name: config.name,
      endpoint: config.endpoint.replace(/\/+$/, ''),
      scale: config.scale,
      timeoutMs: config.timeoutMs,
      parameters: { ...config.parameters },
      continueOnError: config.continueOnError,
    };
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  get name(): string {
    return this.config.name;
  }

  get continueOnError(): boolean {
    return this.config.continueOnError;
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  get scale(): number {
    return this.config.scale;
  }

  abstract run(context: StageContext): Promise<void>;

  /**
   * Check the service's type system endpoint
   */
  async healthCheck(): Promise<StageHealth> {
    const start = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), HEALTH_CHECK_TIMEOUT_MS);

    try {
      const response = await this.fetchFn(`${this.config.endpoint}${HEALTH_PATH}`, {
        method: 'GET',
        signal: controller.signal,
      });
      const latencyMs = Date.now() - start;
      if (!response.ok) {
        await response.body?.cancel();
        return { name: this.name, healthy: false, latencyMs, error: `HTTP ${response.status}` };
      }
      return { name: this.name, healthy: true, latencyMs };
    } catch (error) {
      return {
        name: this.name,
        healthy: false,
        latencyMs: Date.now() - start,
        error: controller.signal.aborted
          ? `No response within ${HEALTH_CHECK_TIMEOUT_MS}ms`
          : errorMessage(error),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Body with the passthrough parameters added. Typed fields win over a
   * parameter of the same name.
   */
  protected withParameters<T extends object>(body: T): Record<string, string> & T {
    return { ...this.config.parameters, ...body };
  }

  /**
   * Run `fn` over the stage's work units with at most `scale` in flight
   */
  protected fanOut<T, R>(units: readonly T[], fn: (unit: T, index: number) => Promise<R>): Promise<R[]> {
    return mapWithConcurrency(units, this.config.scale, fn);
  }

  /**
   * POST a JSON body to the process endpoint and validate the reply
   *
   * @throws StageUnavailableError if the service cannot be reached
   * @throws StageTimeoutError if no reply arrives within timeoutMs
   * @throws StageResponseError if the reply is not valid JSON or fails the schema
   * @throws the run signal's reason if the run is aborted first
   */
  protected async postJson<T>(
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    runSignal: AbortSignal,
  ): Promise<T> {
    if (runSignal.aborted) {
      throw this.abortReason(runSignal);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onRunAbort = (): void => controller.abort();
    runSignal.addEventListener('abort', onRunAbort, { once: true });

    // Timeouts and run aborts take precedence over whatever error they caused
    const fail = (fallback: StageError): Error => {
      if (runSignal.aborted) return this.abortReason(runSignal);
      if (timedOut) return new StageTimeoutError(this.name, this.config.timeoutMs);
      return fallback;
    };

    try {
      let response: Response;
      try {
        response = await this.fetchFn(`${this.config.endpoint}${PROCESS_PATH}`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        throw fail(new StageUnavailableError(this.name, errorMessage(error)));
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw mapHttpStatus(this.name, response.status, response.statusText, this.config.timeoutMs);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw fail(
          new StageResponseError(this.name, `body is not valid JSON (${errorMessage(error)})`, response.status),
        );
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        throw new StageResponseError(this.name, formatIssues(parsed.error), response.status);
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener('abort', onRunAbort);
    }
  }

  private abortReason(signal: AbortSignal): Error {
    const reason: unknown = signal.reason;
    return reason instanceof Error ? reason : new StageError(`Stage '${this.name}' was aborted`, this.name);
  }
}
