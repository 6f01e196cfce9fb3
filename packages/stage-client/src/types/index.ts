/**
 * Wire type exports
 */

export * from './common.js';
export * from './sentiment.js';
export * from './hate-check.js';
export * from './fact-check.js';
