/**
 * @annotext/types - Shared type definitions for annotext
 *
 * Usage:
 *   import type { Annotation, Span } from '@annotext/types';
 */

export * from './annotation/index.js';
export * from './stages/index.js';
