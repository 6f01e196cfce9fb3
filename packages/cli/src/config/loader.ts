/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { AnnotextConfig, CliOptions } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

type EnvValueType = 'string' | 'number' | 'boolean';

/**
 * Environment variable mapping
 * Maps env var names to config paths and value types
 */
const ENV_VAR_MAP: Record<string, { path: string; type: EnvValueType }> = {
  // Pipeline
  ANNOTEXT_LANGUAGE: { path: 'pipeline.language', type: 'string' },
  ANNOTEXT_DEADLINE_MS: { path: 'pipeline.deadlineMs', type: 'number' },
  ANNOTEXT_DUPLICATE_POLICY: { path: 'pipeline.duplicatePolicy', type: 'string' },
  ANNOTEXT_SPAN_STRATEGY: { path: 'pipeline.spanStrategy', type: 'string' },

  // Sentiment
  ANNOTEXT_SENTIMENT_ENABLED: { path: 'stages.sentiment.enabled', type: 'boolean' },
  ANNOTEXT_SENTIMENT_ENDPOINT: { path: 'stages.sentiment.endpoint', type: 'string' },
  ANNOTEXT_SENTIMENT_SCALE: { path: 'stages.sentiment.scale', type: 'number' },
  ANNOTEXT_SENTIMENT_MODEL: { path: 'stages.sentiment.modelName', type: 'string' },

  // Hate check
  ANNOTEXT_HATE_CHECK_ENABLED: { path: 'stages.hateCheck.enabled', type: 'boolean' },
  ANNOTEXT_HATE_CHECK_ENDPOINT: { path: 'stages.hateCheck.endpoint', type: 'string' },
  ANNOTEXT_HATE_CHECK_SCALE: { path: 'stages.hateCheck.scale', type: 'number' },

  // Fact check
  ANNOTEXT_FACT_CHECK_ENABLED: { path: 'stages.factCheck.enabled', type: 'boolean' },
  ANNOTEXT_FACT_CHECK_ENDPOINT: { path: 'stages.factCheck.endpoint', type: 'string' },
  ANNOTEXT_FACT_CHECK_SCALE: { path: 'stages.factCheck.scale', type: 'number' },
};

const SEARCH_PLACES = [
  'package.json',
  '.annotextrc',
  '.annotextrc.json',
  '.annotextrc.yaml',
  '.annotextrc.yml',
  '.annotextrc.js',
  '.annotextrc.cjs',
  'annotext.config.js',
  'annotext.config.cjs',
];

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two config layers
 * Source values override target values; arrays are replaced, not merged
 */
function deepMerge(target: object, source: object): ConfigLayer {
  const result: ConfigLayer = {};

  for (const [key, value] of Object.entries(target)) {
    result[key] = isPlainObject(value) ? deepMerge({}, value) : value;
  }

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }

  return result;
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: ConfigLayer, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: ConfigLayer = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]!] = value;
}

/**
 * Parse environment variable value based on expected type.
 * Unparseable values are kept as strings so validation reports them.
 */
function parseEnvValue(value: string, type: EnvValueType): unknown {
  switch (type) {
    case 'boolean':
      return value.toLowerCase() === 'true' || value === '1';
    case 'number': {
      const num = Number(value);
      return isNaN(num) ? value : num;
    }
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const config: ConfigLayer = {};

  for (const [envVar, { path, type }] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, path, parseEnvValue(value, type));
    }
  }

  return config;
}

/**
 * Load configuration from config file using cosmiconfig.
 * Without an explicit path a missing file is not an error.
 */
async function loadConfigFile(configPath?: string): Promise<ConfigLayer | null> {
  const explorer = cosmiconfig('annotext', { searchPlaces: SEARCH_PLACES });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Could not read config file${configPath ? ` ${configPath}` : ''}: ${reason}`,
      'Check that the file exists and contains valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }

  validatePartialConfig(result.config, result.filepath);
  return isPlainObject(result.config) ? result.config : null;
}

/**
 * Map CLI options to a config layer
 */
export function mapCliToConfig(options: CliOptions): ConfigLayer {
  const pipeline: ConfigLayer = {};
  const output: ConfigLayer = {};
  const config: ConfigLayer = { pipeline, output };

  if (options.lang !== undefined) pipeline['language'] = options.lang;
  if (options.deadline !== undefined) pipeline['deadlineMs'] = options.deadline;
  if (options.json !== undefined) output['json'] = options.json;
  if (options.noColor) output['color'] = false;

  if (options.continueOnError) {
    config['stages'] = {
      sentiment: { continueOnError: true },
      hateCheck: { continueOnError: true },
      factCheck: { continueOnError: true },
    };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<AnnotextConfig> {
  let config = deepMerge({}, DEFAULT_CONFIG);

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: AnnotextConfig): string {
  return JSON.stringify(config, null, 2);
}
