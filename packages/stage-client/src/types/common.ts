/**
 * Types shared by every analysis service
 */

import type { StageEndpointConfig } from '@annotext/types';
import { z } from 'zod';

/**
 * `fetch`-compatible transport. Tests pass an in-process stand-in.
 */
export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Configuration for a remote stage client
 */
export interface StageClientConfig extends StageEndpointConfig {
  /** Stage name, recorded as the source of the stage's annotations */
  name: string;
  /** Transport (default: global fetch) */
  fetch?: FetchFunction;
}

/**
 * Result of a health check
 */
export interface StageHealth {
  name: string;
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

/**
 * A text slice sent to a service
 */
export interface WireSentence {
  text: string;
  begin: number;
  end: number;
}

/**
 * Named group of sentences in a request
 */
export interface WireSelection {
  selection: string;
  sentences: WireSentence[];
}

/**
 * Optional model description echoed by services
 */
export const wireMetaSchema = z
  .object({
    modelName: z.string().optional(),
    version: z.string().optional(),
  })
  .passthrough();

export type WireMeta = z.infer<typeof wireMetaSchema>;

/**
 * Probability-like score
 */
export const scoreSchema = z.number().min(0).max(1);
