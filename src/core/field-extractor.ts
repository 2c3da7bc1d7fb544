/**
 * Field Extractor
 *
 * Turns raw biography text into an ExtractionResult using pattern matching.
 * Pure and synchronous: no I/O, no shared mutable state, and it never throws
 * on sparse or malformed text; every field that cannot be matched comes back
 * as null or an empty list.
 *
 * @example
 * ```typescript
 * import { createFieldExtractor } from 'bio-extract';
 *
 * const extractor = createFieldExtractor();
 * const result = extractor.extract(biographyText);
 * console.log(result.occupations, result.age);
 * ```
 */

import type { EducationEntry, ExtractionBackend, ExtractionResult } from '../types/biography.js';
import {
  calendarDateOf,
  computeAge,
  matchBirthDate,
  matchExplicitAge,
  matchInterests,
  matchNationality,
  matchOccupations,
  matchTimeInSpace,
  type CalendarDate,
} from './biography-matchers.js';
import { extractDegreesAndEducation } from './education-extractor.js';

export interface FieldExtractorOptions {
  /**
   * Clock used when age has to be derived from a birth date.
   * @default () => new Date()
   */
  now?: () => Date;
}

/**
 * An ExtractionResult whose arrays and entries cannot be modified
 */
export function freezeResult(result: ExtractionResult): ExtractionResult {
  return Object.freeze({
    ...result,
    degrees: Object.freeze([...result.degrees]),
    education: Object.freeze(
      result.education.map((entry): EducationEntry => Object.freeze({ ...entry }))
    ),
    occupations: Object.freeze([...result.occupations]),
    interests: Object.freeze([...result.interests]),
  });
}

export class FieldExtractor {
  private readonly now: () => Date;

  constructor(options: FieldExtractorOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  extract(text: string): ExtractionResult {
    const normalized = text.replace(/\r\n?/g, '\n');
    const { degrees, education } = extractDegreesAndEducation(normalized);

    return freezeResult({
      degrees,
      education,
      occupations: matchOccupations(normalized),
      time_in_space: matchTimeInSpace(normalized),
      interests: matchInterests(normalized),
      nationality: matchNationality(normalized),
      age: this.resolveAge(normalized),
    });
  }

  /**
   * The birth date found in the text, if any
   */
  birthDate(text: string): CalendarDate | null {
    return matchBirthDate(text.replace(/\r\n?/g, '\n'));
  }

  /**
   * An explicit "(age N)" wins over a birth date
   */
  private resolveAge(text: string): number | null {
    const explicit = matchExplicitAge(text);
    if (explicit !== null) return explicit;

    const birth = matchBirthDate(text);
    return birth ? computeAge(birth, calendarDateOf(this.now())) : null;
  }
}

export function createFieldExtractor(options?: FieldExtractorOptions): FieldExtractor {
  return new FieldExtractor(options);
}

const defaultExtractor = new FieldExtractor();

/**
 * Extract fields with the system clock
 */
export function extractFields(text: string): ExtractionResult {
  return defaultExtractor.extract(text);
}

/**
 * The pattern-based extractor as a batch backend
 */
export function createRegexBackend(extractor: FieldExtractor = defaultExtractor): ExtractionBackend {
  return {
    kind: 'regex',
    extract: async (text) => extractor.extract(text),
  };
}
