/**
 * Wikipedia Scraper
 *
 * Fetches the Wikipedia article for every roster entry and saves it through
 * the PageStore. The direct title is tried first; a 404, a disambiguation
 * page or any other failure falls back to the MediaWiki search API.
 *
 * Politeness:
 * - at most `concurrency` people in flight (FIFO limiter)
 * - 50-200ms of jitter before each person's first request
 * - 429 and 5xx responses retried with exponential backoff
 * - descriptive User-Agent on every request
 *
 * @example
 * ```typescript
 * const scraper = new WikipediaScraper(parseScraperConfig());
 * const outcomes = await scraper.scrapeAll(loadRoster(csvText));
 * ```
 */

import { z } from 'zod';
import type { RosterEntry, ScrapeMeta, ScrapeOutcome } from '../types/biography.js';
import type { ScraperConfig } from '../utils/config-schemas.js';
import { ConcurrencyLimiter } from '../utils/concurrency-limiter.js';
import { logger } from '../utils/logger.js';
import { HttpStatusError, RETRYABLE_STATUS_CODES, sleep as defaultSleep, withRetry } from '../utils/retry.js';
import { PageStore } from './page-store.js';
import { extractBiographyText, getPageTitle, isDisambiguationPage } from './wikipedia-page.js';

const log = logger.scraper;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * A response whose body has been dealt with: read for a 200, cancelled
 * otherwise.
 */
export interface FetchedPage {
  status: number;
  /** URL after redirects; empty when the fetch implementation gives none */
  url: string;
  /** Body text of a 200 response, null for any other status */
  body: string | null;
}

export interface WikipediaScraperOptions {
  /** Where pages are written. Defaults to a store at config.outputRoot */
  store?: PageStore;
  /** fetch implementation, replaceable for tests */
  fetchFn?: FetchFn;
  /** Random source in [0, 1) for request and backoff jitter */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/** Jitter before each person's first request, in milliseconds */
export const REQUEST_JITTER_MS = { min: 50, max: 200 } as const;

const searchResponseSchema = z.object({
  query: z
    .object({
      search: z.array(z.object({ title: z.string() })).default([]),
    })
    .optional(),
});

/**
 * Article URL for a title: spaces become underscores, the rest is
 * percent-encoded.
 */
export function articleUrl(baseUrl: string, title: string): string {
  return `${baseUrl}${encodeURIComponent(title.replace(/ /g, '_'))}`;
}

function statusOf(page: FetchedPage | null): string {
  return `http_${page ? page.status : 'noresp'}`;
}

/**
 * Read a body as text, rejecting with a TimeoutError once the signal aborts.
 * Fetch implementations that ignore the signal while streaming are covered
 * by the race.
 */
async function readBody(response: Response, signal: AbortSignal, timeoutMs: number): Promise<string> {
  let rejectAborted: (error: Error) => void = () => {};
  const aborted = new Promise<never>((_resolve, reject) => {
    rejectAborted = reject;
  });
  const onAbort = () =>
    rejectAborted(Object.assign(new Error(`Body not read within ${timeoutMs}ms`), { name: 'TimeoutError' }));

  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }

  try {
    return await Promise.race([response.text(), aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Release a response body that will not be read
 */
async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

export class WikipediaScraper {
  readonly store: PageStore;
  private readonly fetchFn: FetchFn;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: ScraperConfig,
    options: WikipediaScraperOptions = {}
  ) {
    this.store = options.store ?? new PageStore(config.outputRoot);
    this.fetchFn = options.fetchFn ?? fetch;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * GET a URL, following redirects. Retryable statuses, network errors and
   * timeouts (headers or body) are retried; returns null once attempts are
   * exhausted.
   */
  async fetchPage(url: string): Promise<FetchedPage | null> {
    try {
      return await withRetry(
        async () => {
          const page = await this.fetchWithTimeout(url);
          if (RETRYABLE_STATUS_CODES.includes(page.status)) {
            throw new HttpStatusError(page.status, url);
          }
          return page;
        },
        {
          maxAttempts: this.config.maxAttempts,
          backoffBase: this.config.backoffBase,
          random: this.random,
          sleep: this.sleep,
        }
      );
    } catch (error) {
      log.warn('No usable response', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Top MediaWiki search hit for a query, or null. Never throws.
   */
  async searchBestTitle(query: string): Promise<string | null> {
    const params = new URLSearchParams({
      action: 'query',
      list: 'search',
      srsearch: query,
      srlimit: '1',
      format: 'json',
      utf8: '1',
    });
    const url = `${this.config.wikiApiUrl}?${params.toString()}`;

    try {
      const page = await this.fetchWithTimeout(url);
      if (page.body === null) {
        log.debug('Search request failed', { url, status: page.status });
        return null;
      }

      const parsed = searchResponseSchema.safeParse(JSON.parse(page.body));
      if (!parsed.success) {
        log.warn('Unexpected search response shape', { url });
        return null;
      }

      const title = parsed.data.query?.search[0]?.title.trim();
      return title || null;
    } catch (error) {
      log.warn('Search request errored', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Scrape one person. Failures are recorded in meta.json and in the
   * returned outcome; they are never thrown.
   */
  async scrapePerson(entry: RosterEntry): Promise<ScrapeOutcome> {
    const personLog = log.child({ personId: entry.id });
    const folder = this.store.folderFor(entry.id);
    const meta: ScrapeMeta = {
      raw_name: entry.rawName,
      normalized_name: entry.name,
      attempted_titles: [],
      requested_url: null,
      final_url: null,
      status: null,
      notes: [],
    };

    const fail = async (status: string): Promise<ScrapeOutcome> => {
      meta.status = status;
      await this.store.writeMeta(entry.id, meta);
      personLog.warn('Failed to retrieve page', { name: entry.name, status });
      return { id: entry.id, name: entry.name, status, folder };
    };

    await this.sleep(REQUEST_JITTER_MS.min + this.random() * (REQUEST_JITTER_MS.max - REQUEST_JITTER_MS.min));

    let url = articleUrl(this.config.wikiBaseUrl, entry.name);
    meta.requested_url = url;
    meta.attempted_titles.push(entry.name);

    let page = await this.fetchPage(url);
    personLog.info('Direct page fetched', { url, status: page?.status ?? 'no response' });

    let html: string | null = null;
    if (page?.body != null) {
      if (isDisambiguationPage(page.body)) {
        meta.notes.push('Disambiguation detected; using search fallback.');
      } else {
        html = page.body;
      }
    } else if (page?.status === 404) {
      meta.notes.push('Direct page 404; using search fallback.');
    }

    if (html === null) {
      const bestTitle = await this.searchBestTitle(entry.name);
      if (!bestTitle) {
        meta.notes.push('Wikipedia search returned no results.');
        return fail('search_failed');
      }

      meta.attempted_titles.push(bestTitle);
      url = articleUrl(this.config.wikiBaseUrl, bestTitle);
      page = await this.fetchPage(url);
      personLog.info('Fallback page fetched', { url, status: page?.status ?? 'no response' });

      if (page?.body == null) {
        return fail(statusOf(page));
      }
      html = page.body;
    }

    meta.final_url = page?.url || url;
    meta.status = 'ok';

    const title = getPageTitle(html, entry.name);
    await this.store.writePage(entry.id, title, html);
    await this.store.writeBiography(entry.id, extractBiographyText(html, title));
    await this.store.writeMeta(entry.id, meta);

    personLog.info('Saved', { name: entry.name, folder });
    return { id: entry.id, name: entry.name, status: 'ok', folder, title };
  }

  /**
   * Scrape every entry with bounded concurrency. A person whose scrape
   * throws (a disk error, say) is reported with status "error".
   */
  async scrapeAll(entries: readonly RosterEntry[]): Promise<ScrapeOutcome[]> {
    const limiter = new ConcurrencyLimiter(this.config.concurrency);
    const startTime = Date.now();

    const outcomes = await Promise.all(
      entries.map((entry) =>
        limiter.run(async (): Promise<ScrapeOutcome> => {
          try {
            return await this.scrapePerson(entry);
          } catch (error) {
            log.error('Scrape failed', { personId: entry.id, name: entry.name, error });
            return {
              id: entry.id,
              name: entry.name,
              status: 'error',
              folder: this.store.folderFor(entry.id),
            };
          }
        })
      )
    );

    log.timed('Scrape finished', startTime, {
      people: outcomes.length,
      ok: outcomes.filter((outcome) => outcome.status === 'ok').length,
    });
    return outcomes;
  }

  /**
   * Fetch with timeout using AbortController. The timer covers reading the
   * body as well as the headers.
   */
  private async fetchWithTimeout(url: string): Promise<FetchedPage> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/json;q=0.9,*/*;q=0.8',
        },
      });

      if (response.status !== 200) {
        await discardBody(response);
        return { status: response.status, url: response.url, body: null };
      }
      const body = await readBody(response, controller.signal, this.config.timeoutMs);
      return { status: response.status, url: response.url, body };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
