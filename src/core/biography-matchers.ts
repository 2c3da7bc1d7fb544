/**
 * Biography Matchers
 *
 * Small, independent pattern matchers over biography text. Each returns the
 * matched value or null (or an empty list) and never throws; the
 * FieldExtractor composes them.
 *
 * Biography text is line oriented:
 *
 * ```text
 * - Nationality: Russian
 * - Occupation(s): Cosmonaut, Lieutenant Colonel
 * - Time in space: 124 days 23 hours 52 minutes
 * - He graduated from the Moscow Institute of Electronic Technology in 1989.
 * ```
 */

// ============================================
// TYPES
// ============================================

/**
 * A calendar date without time or timezone
 */
export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
}

export type DateMatcher = (text: string) => CalendarDate | null;

// ============================================
// PATTERNS
// ============================================

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const MONTHS = MONTH_NAMES.join('|');

/** Optional leading bullet before a "Label: value" line */
const LINE_START = String.raw`^[ \t]*(?:-+[ \t]*)?`;

const ISO_BIRTH_DATE = /Born:\s*\(\s*(\d{4})-(\d{2})-(\d{2})\s*\)/i;
const MONTH_DAY_YEAR = new RegExp(String.raw`\b(${MONTHS})\s+(\d{1,2}),\s+(\d{4})\b`, 'i');
const DAY_MONTH_YEAR = new RegExp(String.raw`\b(\d{1,2})\s+(${MONTHS})\s+(\d{4})\b`, 'i');
const EXPLICIT_AGE = /\(age\s*(\d{1,3})\)/i;

const OCCUPATIONS_LINE = new RegExp(
  String.raw`${LINE_START}Occupation(?:\(s\)|s)?:[ \t]*([^\n]+)$`,
  'im'
);
const NATIONALITY_LINE = new RegExp(String.raw`${LINE_START}Nationality:[ \t]*([A-Za-z \-]+)$`, 'im');
const TIME_IN_SPACE_LINE = new RegExp(String.raw`${LINE_START}Time in space:[ \t]*([^\n]+)$`, 'im');
const ENJOYS = /\benjoys[ \t]+([^.\n]+)/i;

// ============================================
// GENERIC HELPERS
// ============================================

/**
 * First capture group of the first match, trimmed. Blank captures count as
 * no match.
 */
export function matchFirst(pattern: RegExp, text: string): string | null {
  const match = pattern.exec(text);
  const value = match?.[1]?.trim();
  return value ? value : null;
}

/**
 * Split a free-text enumeration on commas and the word "and", keeping
 * multi-word phrases ("water skiing") whole.
 */
export function splitPhraseList(value: string): string[] {
  return value
    .split(/,|\band\b/)
    .map((part) => part.replace(/^[\s.;:]+|[\s.;:]+$/g, ''))
    .filter((part) => part.length > 0);
}

// ============================================
// LABELLED LINES
// ============================================

/**
 * "Occupation(s): Cosmonaut, Lieutenant Colonel" -> ["Cosmonaut", "Lieutenant Colonel"]
 */
export function matchOccupations(text: string): string[] {
  const line = matchFirst(OCCUPATIONS_LINE, text);
  if (!line) return [];
  return line
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function matchNationality(text: string): string | null {
  return matchFirst(NATIONALITY_LINE, text);
}

export function matchTimeInSpace(text: string): string | null {
  return matchFirst(TIME_IN_SPACE_LINE, text);
}

/**
 * Hobbies from the first "enjoys ..." clause, up to the end of its sentence.
 */
export function matchInterests(text: string): string[] {
  const clause = matchFirst(ENJOYS, text);
  return clause ? splitPhraseList(clause) : [];
}

// ============================================
// DATES AND AGE
// ============================================

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Build a CalendarDate, or null when the parts do not name a real day.
 */
export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }
  const lastDay = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day <= lastDay ? { year, month, day } : null;
}

function monthNumber(name: string): number {
  const lower = name.toLowerCase();
  return MONTH_NAMES.findIndex((month) => month.toLowerCase() === lower) + 1;
}

/**
 * "Born: (1966-01-12)"
 */
export const matchIsoBirthDate: DateMatcher = (text) => {
  const match = ISO_BIRTH_DATE.exec(text);
  if (!match) return null;
  return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
};

/**
 * "January 12, 1966"
 */
export const matchMonthDayYear: DateMatcher = (text) => {
  const match = MONTH_DAY_YEAR.exec(text);
  if (!match) return null;
  return toCalendarDate(Number(match[3]), monthNumber(match[1]), Number(match[2]));
};

/**
 * "12 January 1966"
 */
export const matchDayMonthYear: DateMatcher = (text) => {
  const match = DAY_MONTH_YEAR.exec(text);
  if (!match) return null;
  return toCalendarDate(Number(match[3]), monthNumber(match[2]), Number(match[1]));
};

/**
 * Date matchers in priority order. Only the first match of each pattern is
 * considered; an impossible date moves on to the next pattern.
 */
export const BIRTH_DATE_MATCHERS: readonly DateMatcher[] = [
  matchIsoBirthDate,
  matchMonthDayYear,
  matchDayMonthYear,
];

export function matchBirthDate(text: string): CalendarDate | null {
  for (const matcher of BIRTH_DATE_MATCHERS) {
    const date = matcher(text);
    if (date) return date;
  }
  return null;
}

/**
 * "(age 59)" -> 59
 */
export function matchExplicitAge(text: string): number | null {
  const value = matchFirst(EXPLICIT_AGE, text);
  return value === null ? null : Number.parseInt(value, 10);
}

/**
 * Whole years between a birth date and today, one less while this year's
 * birthday is still ahead.
 */
export function computeAge(birth: CalendarDate, today: CalendarDate): number {
  const beforeBirthday =
    today.month < birth.month || (today.month === birth.month && today.day < birth.day);
  return today.year - birth.year - (beforeBirthday ? 1 : 0);
}

/**
 * Local calendar date of a Date
 */
export function calendarDateOf(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}
