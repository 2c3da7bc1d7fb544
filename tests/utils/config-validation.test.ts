/**
 * Tests for configuration validation
 *
 * Zod schemas plus the environment parsers built on them.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  booleanStringSchema,
  integerStringSchema,
  formatConfigErrors,
  ConfigValidationError,
  DEFAULT_USER_AGENT,
} from '../../src/utils/config-schemas.js';
import { parseLlmConfig, parseLogConfig, parseScraperConfig } from '../../src/utils/env-parser.js';

describe('Configuration Validation', () => {
  describe('helper schemas', () => {
    it('should parse boolean strings', () => {
      expect(booleanStringSchema.parse('TRUE')).toBe(true);
      expect(booleanStringSchema.parse('1')).toBe(true);
      expect(booleanStringSchema.parse('no')).toBe(false);
      expect(booleanStringSchema.parse(undefined)).toBe(false);
    });

    it('should coerce and bound integers', () => {
      const schema = integerStringSchema({ min: 1, max: 4, default: 2 });
      expect(schema.parse('3')).toBe(3);
      expect(schema.parse(undefined)).toBe(2);
      expect(schema.safeParse('5').success).toBe(false);
      expect(schema.safeParse('2.5').success).toBe(false);
    });
  });

  describe('parseLogConfig', () => {
    it('should default to info without pretty printing', () => {
      expect(parseLogConfig({})).toEqual({ level: 'info', prettyPrint: false });
    });

    it('should read LOG_LEVEL and LOG_PRETTY', () => {
      expect(parseLogConfig({ LOG_LEVEL: 'debug', LOG_PRETTY: 'yes' })).toEqual({
        level: 'debug',
        prettyPrint: true,
      });
    });

    it('should reject an unknown level', () => {
      expect(() => parseLogConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigValidationError);
    });
  });

  describe('parseScraperConfig', () => {
    it('should apply defaults', () => {
      expect(parseScraperConfig({})).toEqual({
        wikiBaseUrl: 'https://en.wikipedia.org/wiki/',
        wikiApiUrl: 'https://en.wikipedia.org/w/api.php',
        outputRoot: 'wikipedia_pages',
        concurrency: 8,
        timeoutMs: 25000,
        maxAttempts: 3,
        backoffBase: 1.6,
        userAgent: DEFAULT_USER_AGENT,
      });
    });

    it('should read and coerce environment values', () => {
      const config = parseScraperConfig({
        SCRAPER_CONCURRENCY: '4',
        SCRAPER_BACKOFF_BASE: '2',
        SCRAPER_OUTPUT_ROOT: 'pages',
        SCRAPER_USER_AGENT: 'test-agent/1.0',
      });

      expect(config.concurrency).toBe(4);
      expect(config.backoffBase).toBe(2);
      expect(config.outputRoot).toBe('pages');
      expect(config.userAgent).toBe('test-agent/1.0');
    });

    it('should treat empty values as unset', () => {
      expect(parseScraperConfig({ SCRAPER_OUTPUT_ROOT: '  ' }).outputRoot).toBe('wikipedia_pages');
    });

    it('should let explicit overrides win over the environment', () => {
      const config = parseScraperConfig(
        { SCRAPER_CONCURRENCY: '4', SCRAPER_OUTPUT_ROOT: 'env-pages' },
        { concurrency: '6', outputRoot: undefined }
      );

      expect(config.concurrency).toBe(6);
      expect(config.outputRoot).toBe('env-pages');
    });

    it('should report every invalid value', () => {
      let caught: unknown;
      try {
        parseScraperConfig({ SCRAPER_CONCURRENCY: '64', SCRAPER_WIKI_BASE_URL: 'not a url' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      if (caught instanceof ConfigValidationError) {
        expect(caught.section).toBe('scraper');
        expect(caught.message).toContain('  - wikiBaseUrl: Invalid url');
        expect(caught.message).toContain('  - concurrency: ');
      }
    });
  });

  describe('parseLlmConfig', () => {
    it('should require an API key', () => {
      expect(() => parseLlmConfig({})).toThrow('  - apiKey: OPENAI_API_KEY is required for the llm backend');
    });

    it('should apply model defaults', () => {
      expect(parseLlmConfig({ OPENAI_API_KEY: 'test-secret' })).toEqual({
        apiKey: 'test-secret',
        model: 'gpt-4o-2024-08-06',
        temperature: 0,
        maxTokens: 1500,
      });
    });

    it('should read model overrides', () => {
      const config = parseLlmConfig({
        OPENAI_API_KEY: 'test-secret',
        OPENAI_MODEL: 'test-model',
        OPENAI_TEMPERATURE: '0.2',
        OPENAI_MAX_TOKENS: '800',
      });

      expect(config).toMatchObject({ model: 'test-model', temperature: 0.2, maxTokens: 800 });
    });
  });

  describe('formatConfigErrors', () => {
    it('should list one issue per line with its path', () => {
      const result = z.object({ port: z.number() }).safeParse({ port: 'x' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatConfigErrors(result.error)).toBe('  - port: Expected number, received string');
      }
    });
  });
});
