/**
 * LLM Field Extractor
 *
 * Alternative backend that asks an OpenAI chat model for the same fields the
 * pattern-based FieldExtractor produces. Configuration (API key, model) is an
 * explicit value passed in by the caller; there is no module-level client.
 *
 * @example
 * ```typescript
 * const extractor = createLlmFieldExtractor(parseLlmConfig());
 * const profile = await extractor.extract(biographyText);
 * ```
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { ExtractedProfile, ExtractionBackend } from '../types/biography.js';
import type { LlmConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { freezeResult } from './field-extractor.js';
import { buildExtractionMessages } from './llm-prompts.js';

const log = logger.llm;

// ============================================
// TYPES
// ============================================

export interface CompletionRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  temperature: number;
  maxTokens: number;
}

/**
 * The one call the extractor needs from a chat API: JSON-mode completion
 * returning the raw message content.
 */
export interface CompletionClient {
  completeJson(request: CompletionRequest): Promise<string | null>;
}

export class LlmExtractionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LlmExtractionError';
  }
}

// ============================================
// RESPONSE SCHEMA
// ============================================

const trimmedOrNull = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const stringList = z
  .array(z.unknown())
  .nullish()
  .transform((items) =>
    (items ?? []).flatMap((item) => (typeof item === 'string' && item.trim() ? [item.trim()] : []))
  );

const yearSchema = z
  .union([z.number().int(), z.string().regex(/^\d{4}$/).transform(Number)])
  .nullish()
  .transform((value) => value ?? null);

const ageSchema = z
  .union([z.number().int(), z.string().regex(/^\s*\d{1,3}\s*$/).transform(Number)])
  .pipe(z.number().min(0).max(150))
  .nullish()
  .transform((value) => value ?? null);

export const educationItemSchema = z.object({
  institution: trimmedOrNull,
  year: yearSchema,
  qualification: trimmedOrNull,
});

export const llmProfileSchema = z.object({
  name: trimmedOrNull,
  degrees: stringList,
  education: z
    .array(educationItemSchema)
    .nullish()
    .transform((items) =>
      (items ?? []).filter(
        (entry) => entry.institution !== null || entry.year !== null || entry.qualification !== null
      )
    ),
  occupations: stringList,
  time_in_space: trimmedOrNull,
  interests: stringList,
  nationality: trimmedOrNull,
  age: ageSchema,
});

export type LlmProfile = z.infer<typeof llmProfileSchema>;

/**
 * Validate raw model output into an ExtractedProfile
 */
export function parseLlmResponse(content: string | null): ExtractedProfile {
  if (!content) {
    throw new LlmExtractionError('Model returned an empty response');
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new LlmExtractionError('Model response is not valid JSON', error);
  }

  const result = llmProfileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new LlmExtractionError(`Model response does not match the schema: ${issues}`, result.error);
  }

  const { name, ...fields } = result.data;
  return { ...freezeResult(fields), name };
}

// ============================================
// OPENAI CLIENT
// ============================================

/**
 * CompletionClient backed by the OpenAI SDK
 */
export function createOpenAiCompletionClient(apiKey: string): CompletionClient {
  const openai = new OpenAI({ apiKey });

  return {
    async completeJson(request) {
      const completion = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages.map((message) =>
          message.role === 'system'
            ? { role: 'system' as const, content: message.content }
            : { role: 'user' as const, content: message.content }
        ),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: { type: 'json_object' },
      });
      log.debug('Completion received', {
        model: completion.model,
        totalTokens: completion.usage?.total_tokens,
      });
      return completion.choices[0]?.message.content ?? null;
    },
  };
}

// ============================================
// EXTRACTOR
// ============================================

export class LlmFieldExtractor implements ExtractionBackend {
  readonly kind = 'llm' as const;

  constructor(
    private readonly config: LlmConfig,
    private readonly client: CompletionClient
  ) {}

  async extract(text: string): Promise<ExtractedProfile> {
    const startTime = Date.now();
    const content = await this.client.completeJson({
      model: this.config.model,
      messages: buildExtractionMessages(text),
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });
    const profile = parseLlmResponse(content);
    log.timed('Biography extracted', startTime, { model: this.config.model });
    return profile;
  }
}

export function createLlmFieldExtractor(
  config: LlmConfig,
  client: CompletionClient = createOpenAiCompletionClient(config.apiKey)
): LlmFieldExtractor {
  return new LlmFieldExtractor(config, client);
}
