/**
 * Orchestrator module exports
 */

export type { ConfiguredStage, ServiceOptions, StageServiceStatus } from './services.js';
export { STAGE_TYPES, buildStages, performHealthChecks } from './services.js';

export type { SeedEntry, SkippedSeed, PlacedSeed, ResolvedSeeds } from './seeds.js';
export { seedEntrySchema, parseSeeds, loadSeedFile, resolveSeeds, applySeeds } from './seeds.js';

export type { RunInput, RunOptions, RunReport } from './orchestrator.js';
export { orchestrateRun } from './orchestrator.js';
