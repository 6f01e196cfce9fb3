/**
 * Fluent builder for test documents
 */

import {
  createDocument,
  type Document,
  type DuplicatePolicy,
  type SeedClaim,
  type StageContext,
} from '@annotext/core';
import type { Span } from '@annotext/types';

const DEFAULT_TEXT =
  'The museum reopened last spring. Visitors praised the new wing. Tickets cost ten euros.';

/**
 * Fluent builder for creating documents with seeded claims
 */
export class DocumentBuilder {
  private text = DEFAULT_TEXT;
  private lang = 'en';
  private policy: DuplicatePolicy = 'reject';
  private readonly seeds: SeedClaim[] = [];

  /**
   * Set the document text
   */
  withText(text: string): this {
    this.text = text;
    return this;
  }

  withLanguage(language: string): this {
    this.lang = language;
    return this;
  }

  withDuplicatePolicy(policy: DuplicatePolicy): this {
    this.policy = policy;
    return this;
  }

  /**
   * Seed a claim checked against external facts
   */
  withClaim(value: string, span: Span, ...facts: string[]): this {
    this.seeds.push({ value, span, facts: facts.map((fact) => ({ value: fact })) });
    return this;
  }

  /**
   * Seed a claim covering the first occurrence of `anchor`
   */
  withClaimAt(anchor: string, ...facts: string[]): this {
    const begin = this.text.indexOf(anchor);
    if (begin < 0) {
      throw new Error(`Anchor not found in test document: ${anchor}`);
    }
    return this.withClaim(anchor, { begin, end: begin + anchor.length }, ...facts);
  }

  build(): Document {
    const document = createDocument(this.text, this.lang, { duplicatePolicy: this.policy });
    for (const seed of this.seeds) {
      document.seedClaim(seed);
    }
    return document;
  }
}

/**
 * Create a new DocumentBuilder
 */
export function testDocument(): DocumentBuilder {
  return new DocumentBuilder();
}

/**
 * Context for calling a stage's run() directly, writing into a fresh batch
 */
export function createStageContext(
  document: Document,
  stageName: string,
  signal: AbortSignal = new AbortController().signal,
): StageContext {
  return {
    document: { text: document.text, language: document.language },
    store: document.store,
    graph: document.graph,
    output: document.createBatch(stageName),
    signal,
  };
}
