/**
 * Education Extractor
 *
 * Joint extraction of degrees and education entries. Bullet lines that
 * mention graduating or qualifying are mined for an institution, a year and
 * a qualification; each line with a qualification also yields a degree
 * string such as "Engineer-Physicist (Moscow Institute of Electronic
 * Technology, 1989)".
 */

import type { EducationEntry } from '../types/biography.js';
import { matchFirst } from './biography-matchers.js';

export interface DegreesAndEducation {
  degrees: string[];
  education: EducationEntry[];
}

const BULLET_LINE = /^\s*-/;
const TRIGGER = /graduated|post-graduate|qualified as/i;

const INSTITUTION_AFTER_FROM = /\b[Ff]rom [Tt]he ([A-Z][A-Za-z0-9 .\-()']+)/;
const INSTITUTION_AFTER_AT = /\b[Aa]t [Tt]he ([A-Z][A-Za-z0-9 .\-()']+)/;
// Any four digits, no plausibility range
const YEAR = /(?:\bin|,)\s*(\d{4})(?!\d)/i;
const QUALIFICATION = /qualified as (?:an? )?([A-Za-z \-]+?)(?:[.,;(]|$)/i;
const EXPLICIT_DEGREE = /Candidate of [A-Za-z ]+ \(\d{4}\)/gi;

/** Lower-case words that may sit inside an institution name */
const NAME_CONNECTORS = new Set(['of', 'for', 'the', 'and', 'at', 'de', 'la', 'named', 'after']);

// ============================================
// CANDIDATE LINES
// ============================================

/**
 * Bullet lines mentioning a trigger phrase, trimmed, each distinct line once
 * in order of first appearance.
 */
export function findCandidateLines(text: string): string[] {
  const lines = text
    .split('\n')
    .filter((line) => BULLET_LINE.test(line) && TRIGGER.test(line))
    .map((line) => line.trim());
  return [...new Set(lines)];
}

// ============================================
// PER-LINE MATCHERS
// ============================================

/**
 * Trim a greedy capture down to the proper name at its start: capitalized
 * words joined by connectors, stopping at the first other lower-case word.
 */
export function trimToProperName(phrase: string): string | null {
  const kept: string[] = [];
  for (const word of phrase.split(/\s+/).filter(Boolean)) {
    if (/^[A-Z0-9(']/.test(word) || NAME_CONNECTORS.has(word)) {
      kept.push(word);
    } else {
      break;
    }
  }
  while (kept.length > 0 && NAME_CONNECTORS.has(kept[kept.length - 1])) {
    kept.pop();
  }
  const name = kept.join(' ').replace(/[.\s]+$/, '');
  return name.length > 0 ? name : null;
}

/**
 * Institution after "from the", falling back to "at the"
 */
export function matchInstitution(line: string): string | null {
  for (const pattern of [INSTITUTION_AFTER_FROM, INSTITUTION_AFTER_AT]) {
    const raw = matchFirst(pattern, line);
    const name = raw ? trimToProperName(raw) : null;
    if (name) return name;
  }
  return null;
}

export function matchYear(line: string): number | null {
  const value = matchFirst(YEAR, line);
  return value === null ? null : Number.parseInt(value, 10);
}

export function matchQualification(line: string): string | null {
  return matchFirst(QUALIFICATION, line);
}

/**
 * Degree strings stated outright, e.g. "Candidate of Pedagogic Sciences (2013)"
 */
export function matchExplicitDegrees(text: string): string[] {
  return Array.from(text.matchAll(EXPLICIT_DEGREE), (match) => match[0].trim());
}

// ============================================
// COMPOSITION
// ============================================

export function formatDegree(
  qualification: string,
  institution: string | null,
  year: number | null
): string {
  if (institution && year !== null) return `${qualification} (${institution}, ${year})`;
  if (institution) return `${qualification} (${institution})`;
  if (year !== null) return `${qualification} (${year})`;
  return qualification;
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Degrees (normalized, deduplicated in order of first occurrence) and
 * education entries with at least one resolved field.
 */
export function extractDegreesAndEducation(text: string): DegreesAndEducation {
  const degrees: string[] = [];
  const education: EducationEntry[] = [];

  for (const line of findCandidateLines(text)) {
    const institution = matchInstitution(line);
    const year = matchYear(line);
    const qualification = matchQualification(line);

    if (institution !== null || year !== null || qualification !== null) {
      education.push({ institution, year, qualification });
    }

    if (qualification) {
      degrees.push(formatDegree(qualification, institution, year));
    }
  }

  degrees.push(...matchExplicitDegrees(text));

  return {
    degrees: [...new Set(degrees.map(normalizeWhitespace))],
    education,
  };
}
