/**
 * @annotext/core - Annotation store and pipeline executor
 *
 * This package contains:
 * - The document, its annotation store and claim/fact graph
 * - Per-stage annotation batches
 * - Span resolution for seeded claims
 * - The sequential pipeline executor and result aggregator
 */

export const VERSION = '0.1.0';

export * from './errors.js';

export * from './document/span.js';
export * from './document/document.js';

export * from './store/annotation-key.js';
export * from './store/annotation-store.js';
export * from './store/annotation-batch.js';
export * from './graph/annotation-graph.js';

export * from './span/span-resolver.js';

export * from './pipeline/stage.js';
export * from './pipeline/pipeline-executor.js';

export * from './aggregate/result-aggregator.js';
