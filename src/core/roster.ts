/**
 * Roster - the list of people to scrape
 *
 * Reads a CSV roster, normalizes "Last, First" names and derives a
 * folder-safe id per person.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RosterEntry } from '../types/biography.js';
import { logger } from '../utils/logger.js';
import { missingNameColumnError } from '../utils/error-messages.js';

const log = logger.roster;

export type RosterRow = Record<string, string>;

/** Columns that may hold the person's name, in preference order */
export const NAME_COLUMNS = ['Profile.Name', 'Name', 'FullName'] as const;

/** Columns that may hold a stable id, in preference order */
export const ID_COLUMNS = [
  'Profile.ID', 'Profile.Id', 'ProfileId', 'ID', 'Id', 'id',
  'AstronautID', 'Astronaut.Id', 'PersonID',
] as const;

export class RosterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RosterError';
  }
}

const rowsSchema = z.array(z.record(z.string()));

/**
 * Strip characters that are not allowed in file names
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[\\/*?:"<>|]/g, '');
}

/**
 * "Last, First Middle" -> "First Middle Last". Names without a comma are
 * returned trimmed.
 */
export function normalizeName(name: string): string {
  const trimmed = name.trim();
  const comma = trimmed.indexOf(',');
  if (comma === -1) return trimmed;

  const last = trimmed.slice(0, comma).trim();
  const first = trimmed.slice(comma + 1).trim();
  return first && last ? `${first} ${last}` : trimmed;
}

export function pickRawName(row: RosterRow): string {
  for (const column of NAME_COLUMNS) {
    const value = row[column];
    if (value) return value;
  }
  return '';
}

/**
 * First non-empty id column, else the sanitized normalized name, else "unknown"
 */
export function guessPersonId(row: RosterRow): string {
  for (const column of ID_COLUMNS) {
    const value = row[column]?.trim();
    if (value) return value;
  }
  return sanitizeFilename(normalizeName(pickRawName(row))) || 'unknown';
}

/**
 * Parse roster CSV text into entries. Rows without a name are skipped.
 *
 * @throws RosterError when the header has none of the name columns
 */
export function loadRoster(csvText: string): RosterEntry[] {
  const parsed: unknown = parse(csvText, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
  });
  const rows = rowsSchema.parse(parsed);

  const header = rows.length > 0 ? Object.keys(rows[0]) : headerOf(csvText);
  if (!NAME_COLUMNS.some((column) => header.includes(column))) {
    throw new RosterError(missingNameColumnError(NAME_COLUMNS));
  }

  const entries: RosterEntry[] = [];
  for (const row of rows) {
    const rawName = pickRawName(row);
    const name = normalizeName(rawName);
    const id = guessPersonId(row);
    if (!name) {
      log.warn('Skipping row with empty name', { personId: id });
      continue;
    }
    entries.push({ id, rawName, name });
  }

  log.info('Roster loaded', { rows: rows.length, people: entries.length });
  return entries;
}

function headerOf(csvText: string): string[] {
  const parsed: unknown = parse(csvText, { to_line: 1, bom: true });
  const [first] = z.array(z.array(z.string())).parse(parsed);
  return first ?? [];
}
