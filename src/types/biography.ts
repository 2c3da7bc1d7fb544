/**
 * Biography record types shared by the extractors, the scraper and the batch
 * pipeline.
 */

/**
 * One education line resolved from a biography.
 * At least one field is non-null on every entry that reaches a result.
 */
export interface EducationEntry {
  institution: string | null;
  /** Four-digit year as written; not range-checked */
  year: number | null;
  qualification: string | null;
}

/**
 * Fields extracted from one biography text.
 * List-valued fields are always arrays, never null.
 */
export interface ExtractionResult {
  readonly degrees: readonly string[];
  readonly education: readonly EducationEntry[];
  readonly occupations: readonly string[];
  readonly time_in_space: string | null;
  readonly interests: readonly string[];
  readonly nationality: string | null;
  readonly age: number | null;
}

/**
 * ExtractionResult plus the person's name when the backend found one
 */
export type ExtractedProfile = ExtractionResult & { readonly name?: string | null };

/**
 * A batch backend: anything that turns biography text into an
 * ExtractionResult under the same output contract.
 */
export interface ExtractionBackend {
  readonly kind: 'regex' | 'llm';
  extract(text: string): Promise<ExtractedProfile>;
}

/**
 * A JSON Lines record for one person
 */
export type PersonRecord = { name: string } & ExtractionResult;

/**
 * Outcome of extracting one person in a batch
 */
export type BatchItemResult =
  | { ok: true; name: string; folder: string; record: PersonRecord }
  | { ok: false; name: string; folder: string; error: string };

/**
 * One roster row after name normalization
 */
export interface RosterEntry {
  /** Folder-safe identifier */
  id: string;
  /** Name exactly as it appears in the roster */
  rawName: string;
  /** "First Middle Last" form */
  name: string;
}

/**
 * Scrape metadata persisted as meta.json next to each saved page.
 * Keys are snake_case to match the on-disk format.
 */
export interface ScrapeMeta {
  raw_name: string;
  normalized_name: string;
  attempted_titles: string[];
  requested_url: string | null;
  final_url: string | null;
  /** "ok", "search_failed", "http_<status>" or "http_noresp" */
  status: string | null;
  notes: string[];
}

/**
 * Result of scraping one person
 */
export interface ScrapeOutcome {
  id: string;
  name: string;
  status: string;
  /** Folder the page and meta.json were written to */
  folder: string;
  title?: string;
}
