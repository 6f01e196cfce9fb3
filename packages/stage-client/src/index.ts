/**
 * @annotext/stage-client - HTTP clients for the analysis services
 *
 * This package provides stages for:
 * - Sentiment service (polarity per sentence)
 * - Hate-check service (hate / non-hate scores)
 * - Fact-check service (claim/fact consistency)
 */

export const VERSION = '0.1.0';

export * from './clients/index.js';
export * from './types/index.js';
export * from './errors.js';
export { mapWithConcurrency, chunk } from './concurrency.js';
export { buildSentenceUnits } from './selection.js';
