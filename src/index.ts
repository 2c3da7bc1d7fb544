/**
 * bio-extract
 *
 * Structured biography fields from free text, plus the pipeline that feeds
 * it: Wikipedia scraping, per-person page storage and JSON Lines batches.
 *
 * @example
 * ```typescript
 * import { extractFields } from 'bio-extract';
 *
 * const result = extractFields('- Occupation(s): Cosmonaut, Test pilot\n');
 * // result.occupations -> ['Cosmonaut', 'Test pilot']
 * ```
 */

export * from './types/index.js';

export {
  FieldExtractor,
  createFieldExtractor,
  createRegexBackend,
  extractFields,
  freezeResult,
  type FieldExtractorOptions,
} from './core/field-extractor.js';
export {
  computeAge,
  matchBirthDate,
  matchExplicitAge,
  matchInterests,
  matchNationality,
  matchOccupations,
  matchTimeInSpace,
  type CalendarDate,
} from './core/biography-matchers.js';
export { extractDegreesAndEducation, formatDegree } from './core/education-extractor.js';
export {
  LlmExtractionError,
  LlmFieldExtractor,
  createLlmFieldExtractor,
  createOpenAiCompletionClient,
  parseLlmResponse,
  type CompletionClient,
  type CompletionRequest,
} from './core/llm-field-extractor.js';
export {
  RosterError,
  guessPersonId,
  loadRoster,
  normalizeName,
  sanitizeFilename,
} from './core/roster.js';
export { extractBiographyText, getPageTitle, isDisambiguationPage } from './core/wikipedia-page.js';
export {
  WikipediaScraper,
  articleUrl,
  type FetchFn,
  type FetchedPage,
  type WikipediaScraperOptions,
} from './core/wikipedia-scraper.js';
export { PageStore, nameFromFolder } from './core/page-store.js';
export { runBatch, type BatchOptions, type BatchSummary } from './core/batch-extractor.js';

export {
  ConfigValidationError,
  type LlmConfig,
  type LogConfig,
  type ScraperConfig,
} from './utils/config-schemas.js';
export { parseLlmConfig, parseLogConfig, parseScraperConfig } from './utils/env-parser.js';
export { configureLogger, logger } from './utils/logger.js';
