/**
 * Batch Extractor
 *
 * Runs an ExtractionBackend over every saved person folder and writes one
 * JSON line per person. A failed extraction becomes a `{ name, error }`
 * line; it never stops the batch.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  BatchItemResult,
  ExtractedProfile,
  ExtractionBackend,
  PersonRecord,
} from '../types/biography.js';
import { logger } from '../utils/logger.js';
import { nameFromFolder, type PageStore } from './page-store.js';

const log = logger.batch;

export interface BatchOptions {
  store: PageStore;
  backend: ExtractionBackend;
  /** JSON Lines output path; truncated before the first record */
  output: string;
  /** Called after each person, in folder order */
  onItem?: (item: BatchItemResult, index: number, total: number) => void;
}

export interface BatchSummary {
  items: BatchItemResult[];
  succeeded: number;
  failed: number;
}

/**
 * A profile as a JSON Lines record, name first. The folder name stands in
 * when the backend found none.
 */
export function toPersonRecord(profile: ExtractedProfile, folder: string): PersonRecord {
  return {
    name: profile.name || nameFromFolder(folder),
    degrees: profile.degrees,
    education: profile.education,
    occupations: profile.occupations,
    time_in_space: profile.time_in_space,
    interests: profile.interests,
    nationality: profile.nationality,
    age: profile.age,
  };
}

/**
 * The JSON line written for a batch item
 */
export function toJsonLine(item: BatchItemResult): string {
  const value = item.ok ? item.record : { name: item.name, error: item.error };
  return JSON.stringify(value) + '\n';
}

export async function extractPerson(
  backend: ExtractionBackend,
  folder: string,
  text: string
): Promise<BatchItemResult> {
  try {
    const record = toPersonRecord(await backend.extract(text), folder);
    return { ok: true, name: record.name, folder, record };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn('Extraction failed', { name: nameFromFolder(folder), backend: backend.kind, error: message });
    return { ok: false, name: nameFromFolder(folder), folder, error: message };
  }
}

/**
 * Extract every person folder that has a biography.txt
 */
export async function runBatch(options: BatchOptions): Promise<BatchSummary> {
  const { store, backend, output, onItem } = options;
  const startTime = Date.now();
  const folders = await store.listPeople();

  await fs.mkdir(path.dirname(path.resolve(output)), { recursive: true });
  const handle = await fs.open(output, 'w');
  const items: BatchItemResult[] = [];

  try {
    for (const folder of folders) {
      const text = await store.readBiography(folder);
      if (!text) {
        log.debug('No biography, skipping', { folder });
        continue;
      }

      const item = await extractPerson(backend, folder, text);
      await handle.write(toJsonLine(item), null, 'utf-8');
      items.push(item);
      onItem?.(item, items.length, folders.length);
    }
  } finally {
    await handle.close();
  }

  const succeeded = items.filter((item) => item.ok).length;
  log.timed('Batch finished', startTime, {
    backend: backend.kind,
    output,
    succeeded,
    failed: items.length - succeeded,
  });

  return { items, succeeded, failed: items.length - succeeded };
}
