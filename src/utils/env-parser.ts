/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access; each parser takes the environment as an
 * argument so callers (and tests) decide where values come from.
 */

import {
  logConfigSchema,
  scraperConfigSchema,
  llmConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type ScraperConfig,
  type LlmConfig,
} from './config-schemas.js';

export type Env = Record<string, string | undefined>;

/** Empty strings count as unset */
function read(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: read(env, 'LOG_LEVEL'),
    prettyPrint: read(env, 'LOG_PRETTY'),
  };
}

function mapEnvToScraperConfig(env: Env) {
  return {
    wikiBaseUrl: read(env, 'SCRAPER_WIKI_BASE_URL'),
    wikiApiUrl: read(env, 'SCRAPER_WIKI_API_URL'),
    outputRoot: read(env, 'SCRAPER_OUTPUT_ROOT'),
    concurrency: read(env, 'SCRAPER_CONCURRENCY'),
    timeoutMs: read(env, 'SCRAPER_TIMEOUT_MS'),
    maxAttempts: read(env, 'SCRAPER_MAX_ATTEMPTS'),
    backoffBase: read(env, 'SCRAPER_BACKOFF_BASE'),
    userAgent: read(env, 'SCRAPER_USER_AGENT'),
  };
}

function mapEnvToLlmConfig(env: Env) {
  return {
    apiKey: read(env, 'OPENAI_API_KEY'),
    model: read(env, 'OPENAI_MODEL'),
    temperature: read(env, 'OPENAI_TEMPERATURE'),
    maxTokens: read(env, 'OPENAI_MAX_TOKENS'),
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate scraper configuration. Explicit overrides (CLI flags)
 * take precedence over environment values.
 */
export function parseScraperConfig(
  env: Env = process.env,
  overrides: Partial<Record<keyof ScraperConfig, string | number>> = {}
): ScraperConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = scraperConfigSchema.safeParse({ ...mapEnvToScraperConfig(env), ...defined });
  if (!result.success) {
    throw new ConfigValidationError('scraper', result.error);
  }
  return result.data;
}

/**
 * Parse and validate LLM configuration. Throws when no API key is set.
 */
export function parseLlmConfig(env: Env = process.env): LlmConfig {
  const result = llmConfigSchema.safeParse(mapEnvToLlmConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('llm', result.error);
  }
  return result.data;
}
