/**
 * Claim/fact seed files
 *
 * A seed file is a JSON array of entries such as
 *
 *   { "claim": "The museum opened in 1931", "fact": "The museum opened in 1932." }
 *   { "claim": "...", "facts": ["...", "..."], "anchor": "The museum opened" }
 *   { "claim": "...", "fact": "...", "span": [0, 25] }
 *
 * An entry with an explicit span is placed there; otherwise its anchor (or,
 * without one, the claim text itself) is looked up in the document with the
 * configured span resolver.
 */

import * as fs from 'node:fs';

import {
  AnnotationError,
  type Document,
  type SeedClaim,
  type SeededClaim,
  type SpanResolver,
} from '@annotext/core';
import { z } from 'zod';

import { InputError, SeedError } from '../errors/index.js';

const offsetSchema = z.number().int().min(0);

export const seedEntrySchema = z
  .object({
    claim: z.string().min(1),
    fact: z.string().min(1).optional(),
    facts: z.array(z.string().min(1)).min(1).optional(),
    anchor: z.string().min(1).optional(),
    span: z
      .tuple([offsetSchema, offsetSchema])
      .refine(([begin, end]) => begin <= end, { message: 'span begin must not exceed end' })
      .optional(),
  })
  .strict()
  .refine((entry) => entry.fact !== undefined || entry.facts !== undefined, {
    message: 'either "fact" or "facts" is required',
  });

export const seedFileSchema = z.array(seedEntrySchema);

export type SeedEntry = z.infer<typeof seedEntrySchema>;

/**
 * A seed entry that could not be placed in the document
 */
export interface SkippedSeed {
  /** 1-based position in the seed file */
  entry: number;
  claim: string;
  reason: string;
}

/**
 * A seed entry placed in the document
 */
export interface PlacedSeed extends SeedClaim {
  /** 1-based position in the seed file */
  entry: number;
}

export interface ResolvedSeeds {
  seeds: PlacedSeed[];
  skipped: SkippedSeed[];
}

/**
 * Parse and validate seed file contents
 * @throws SeedError on malformed JSON or a schema violation
 */
export function parseSeeds(content: string): SeedEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new SeedError(
      `Seed file is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
      undefined,
      'A seed file holds a JSON array of { "claim", "fact" | "facts" } objects',
    );
  }

  const result = seedFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const [index, ...rest] = issue?.path ?? [];
    const entry = typeof index === 'number' ? index + 1 : undefined;
    const field = rest.length > 0 ? `${rest.join('.')}: ` : '';
    throw new SeedError(`${field}${issue?.message ?? 'invalid seed file'}`, entry);
  }
  return result.data;
}

/**
 * Read and parse a seed file
 */
export function loadSeedFile(filePath: string): SeedEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`Seed file not found: ${filePath}`, 'Check the --seed path and try again');
  }
  return parseSeeds(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Place seed entries in the document text
 */
export function resolveSeeds(
  text: string,
  entries: readonly SeedEntry[],
  resolver: SpanResolver,
): ResolvedSeeds {
  const seeds: PlacedSeed[] = [];
  const skipped: SkippedSeed[] = [];

  entries.forEach((entry, index) => {
    const facts = [...(entry.fact !== undefined ? [entry.fact] : []), ...(entry.facts ?? [])].map(
      (value) => ({ value }),
    );

    if (entry.span) {
      const [begin, end] = entry.span;
      seeds.push({ entry: index + 1, value: entry.claim, span: { begin, end }, facts });
      return;
    }

    const anchor = entry.anchor ?? entry.claim;
    const span = resolver.resolve(text, anchor);
    if (!span) {
      skipped.push({ entry: index + 1, claim: entry.claim, reason: `anchor "${anchor}" not found` });
      return;
    }
    seeds.push({ entry: index + 1, value: entry.claim, span, facts });
  });

  return { seeds, skipped };
}

/**
 * Seed claims and facts into the document store and graph
 * @throws SeedError when the store rejects a seed
 */
export function applySeeds(document: Document, seeds: readonly PlacedSeed[]): SeededClaim[] {
  return seeds.map((seed) => {
    try {
      return document.seedClaim({ value: seed.value, span: seed.span, facts: seed.facts });
    } catch (error) {
      if (error instanceof AnnotationError) {
        throw new SeedError(error.message, seed.entry);
      }
      throw error;
    }
  });
}
