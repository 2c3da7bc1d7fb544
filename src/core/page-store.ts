/**
 * Page Store - per-person folders on disk
 *
 * Layout under the root directory:
 *
 * ```text
 * wikipedia_pages/
 *   <person id>/
 *     index.html
 *     <Article Title>.html
 *     biography.txt
 *     meta.json
 * ```
 *
 * Every file is written atomically (temp file + rename).
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { ScrapeMeta } from '../types/biography.js';
import { logger } from '../utils/logger.js';
import { sanitizeFilename } from './roster.js';

const log = logger.pageStore;

export const BIOGRAPHY_FILE = 'biography.txt';
export const META_FILE = 'meta.json';
export const INDEX_FILE = 'index.html';

export const scrapeMetaSchema = z.object({
  raw_name: z.string(),
  normalized_name: z.string(),
  attempted_titles: z.array(z.string()),
  requested_url: z.string().nullable(),
  final_url: z.string().nullable(),
  status: z.string().nullable(),
  notes: z.array(z.string()),
});

/**
 * "Sergey_Revin" -> "Sergey Revin"
 */
export function nameFromFolder(folder: string): string {
  return path.basename(folder).replace(/_/g, ' ').trim();
}

async function atomicWrite(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    log.error('Failed to write file', { path: filePath, error });
    throw error;
  }
}

export class PageStore {
  constructor(readonly root: string) {}

  /**
   * Folder for a person id
   */
  folderFor(personId: string): string {
    return path.join(this.root, sanitizeFilename(personId) || 'unknown');
  }

  async writeMeta(personId: string, meta: ScrapeMeta): Promise<void> {
    await atomicWrite(path.join(this.folderFor(personId), META_FILE), JSON.stringify(meta, null, 2));
  }

  async readMeta(personId: string): Promise<ScrapeMeta | null> {
    const content = await readIfExists(path.join(this.folderFor(personId), META_FILE));
    if (content === null) return null;
    return scrapeMetaSchema.parse(JSON.parse(content));
  }

  /**
   * Save the article as index.html and under its title.
   * Returns the path of the titled copy.
   */
  async writePage(personId: string, title: string, html: string): Promise<string> {
    const folder = this.folderFor(personId);
    const indexPath = path.join(folder, INDEX_FILE);
    const titledPath = path.join(folder, sanitizeFilename(`${title}.html`) || 'page.html');

    await atomicWrite(indexPath, html);
    if (titledPath !== indexPath) {
      await atomicWrite(titledPath, html);
    }

    log.debug('Page saved', { personId, path: titledPath });
    return titledPath;
  }

  async writeBiography(personId: string, text: string): Promise<void> {
    await atomicWrite(path.join(this.folderFor(personId), BIOGRAPHY_FILE), text);
  }

  /**
   * Person folders under the root, sorted by name. A missing root is empty.
   */
  async listPeople(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.root, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw error;
    }

    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => path.join(this.root, entry.name))
      .sort();
  }

  /**
   * biography.txt of a person folder, or null when there is none
   */
  async readBiography(folder: string): Promise<string | null> {
    return readIfExists(path.join(folder, BIOGRAPHY_FILE));
  }
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw error;
  }
}
