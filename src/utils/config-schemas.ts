/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for runtime configuration validation.
 * All environment variable parsing goes through these schemas.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds and a default.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return schema.default(options.default);
}

/**
 * Schema for parsing a string as a positive float with a default.
 */
export function positiveNumberStringSchema(defaultVal: number) {
  return z.coerce.number().positive().default(defaultVal);
}

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// SCRAPER CONFIGURATION
// ============================================

export const DEFAULT_USER_AGENT =
  'bio-extract/1.0 (biography field extraction; contact: maintainer@example.com)';

export const scraperConfigSchema = z.object({
  wikiBaseUrl: z.string().url().default('https://en.wikipedia.org/wiki/'),
  wikiApiUrl: z.string().url().default('https://en.wikipedia.org/w/api.php'),
  outputRoot: z.string().min(1).default('wikipedia_pages'),
  concurrency: integerStringSchema({ min: 1, max: 32, default: 8 }),
  timeoutMs: integerStringSchema({ min: 1000, max: 300000, default: 25000 }),
  maxAttempts: integerStringSchema({ min: 1, max: 10, default: 3 }),
  backoffBase: positiveNumberStringSchema(1.6),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type ScraperConfig = z.infer<typeof scraperConfigSchema>;

// ============================================
// LLM CONFIGURATION
// ============================================

export const llmConfigSchema = z.object({
  apiKey: z
    .string({ required_error: 'OPENAI_API_KEY is required for the llm backend' })
    .min(1, 'OPENAI_API_KEY is required for the llm backend'),
  model: z.string().min(1).default('gpt-4o-2024-08-06'),
  temperature: z.coerce.number().min(0).max(2).default(0),
  maxTokens: integerStringSchema({ min: 64, max: 16384, default: 1500 }),
});

export type LlmConfig = z.infer<typeof llmConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Configuration validation error with formatted issues.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables.`
    );
    this.name = 'ConfigValidationError';
  }
}
