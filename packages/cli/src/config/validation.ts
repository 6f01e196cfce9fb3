/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { AnnotextConfig } from './schema.js';

/**
 * Positive integer milliseconds
 */
const durationSchema = z.number().int().min(1);

export const stageKeySchema = z.enum(['sentiment', 'hateCheck', 'factCheck']);

export const selectionModeSchema = z.enum(['text', 'sentence']);

/**
 * Settings shared by every stage
 */
const stageSettingsShape = {
  enabled: z.boolean(),
  endpoint: z.string().url(),
  scale: z.number().int().min(1),
  timeoutMs: durationSchema,
  parameters: z.record(z.string()),
  continueOnError: z.boolean(),
};

export const sentimentStageSchema = z.object({
  ...stageSettingsShape,
  modelName: z.string().min(1),
  selection: selectionModeSchema,
  batchSize: z.number().int().min(1),
  ignoreMaxLengthTruncationPadding: z.boolean(),
});

export const hateCheckStageSchema = z.object({
  ...stageSettingsShape,
  selection: selectionModeSchema,
});

export const factCheckStageSchema = z.object(stageSettingsShape);

/**
 * Pipeline configuration schema
 */
export const pipelineConfigSchema = z.object({
  language: z.string().min(2),
  deadlineMs: durationSchema,
  duplicatePolicy: z.enum(['reject', 'ignore']),
  spanStrategy: z.enum(['exact', 'sentence']),
  order: z
    .array(stageKeySchema)
    .refine((order) => new Set(order).size === order.length, {
      message: 'stages may appear only once',
    }),
});

export const outputConfigSchema = z.object({
  json: z.boolean(),
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  pipeline: pipelineConfigSchema,
  stages: z.object({
    sentiment: sentimentStageSchema,
    hateCheck: hateCheckStageSchema,
    factCheck: factCheckStageSchema,
  }),
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files). Unknown keys are
 * rejected so that a misspelt option does not go unnoticed.
 */
export const partialConfigSchema = z
  .object({
    pipeline: pipelineConfigSchema.partial().strict().optional(),
    stages: z
      .object({
        sentiment: sentimentStageSchema.partial().strict().optional(),
        hateCheck: hateCheckStageSchema.partial().strict().optional(),
        factCheck: factCheckStageSchema.partial().strict().optional(),
      })
      .strict()
      .optional(),
    output: outputConfigSchema.partial().strict().optional(),
  })
  .strict();

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    public readonly source?: string,
  ) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed${source ? ` (${source})` : ''}:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      `Configuration validation failed${this.source ? ` (${this.source})` : ''}:`,
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError, source?: string): ConfigValidationError {
  const errors = error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
  return new ConfigValidationError(errors, source);
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): AnnotextConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown, source?: string): void {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error, source);
  }
}
