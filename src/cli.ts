#!/usr/bin/env node
/**
 * bio-extract command line
 *
 * Usage:
 *   bio-extract <input.txt>                 extract fields from a biography file
 *   cat input.txt | bio-extract             extract fields from stdin
 *   bio-extract scrape --csv=people.csv     save Wikipedia pages for a roster
 *   bio-extract batch --backend=llm         write JSON Lines for saved pages
 *
 * Results go to stdout; logs and errors go to stderr.
 */

import 'dotenv/config';
import { realpathSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { runBatch } from './core/batch-extractor.js';
import { createFieldExtractor, createRegexBackend } from './core/field-extractor.js';
import { createLlmFieldExtractor, type CompletionClient } from './core/llm-field-extractor.js';
import { PageStore } from './core/page-store.js';
import { loadRoster } from './core/roster.js';
import { WikipediaScraper, type FetchFn } from './core/wikipedia-scraper.js';
import type { ExtractionBackend } from './types/biography.js';
import { parseLlmConfig, parseLogConfig, parseScraperConfig, type Env } from './utils/env-parser.js';
import {
  missingApiKeyError,
  missingCsvError,
  missingInputError,
  unknownOptionError,
  USAGE,
} from './utils/error-messages.js';
import { configureLogger, logger } from './utils/logger.js';

const log = logger.cli;

export const DEFAULT_BATCH_OUTPUT = 'biographies.jsonl';

interface Writable {
  write(chunk: string): unknown;
}

/**
 * Process streams and environment, replaceable for tests
 */
export interface CliIo {
  stdin: AsyncIterable<string | Buffer> & { isTTY?: boolean };
  stdout: Writable;
  stderr: Writable;
  env: Env;
  /** Clock for age computation */
  now?: () => Date;
  fetchFn?: FetchFn;
  completionClient?: CompletionClient;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

interface ParsedArgs {
  positional: string[];
  options: Record<string, string | undefined>;
}

/**
 * Split `--key=value` options from positional arguments
 *
 * @throws CliUsageError for options outside `allowed`
 */
export function parseArgs(command: string, args: string[], allowed: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const options: Record<string, string | undefined> = {};

  for (const arg of args) {
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!allowed.includes(key)) {
      throw new CliUsageError(unknownOptionError(command, arg));
    }
    options[key] = eq === -1 ? 'true' : arg.slice(eq + 1);
  }

  return { positional, options };
}

async function readAll(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
  }
  return chunks.join('');
}

// ============================================
// COMMANDS
// ============================================

async function extractCommand(args: string[], io: CliIo): Promise<number> {
  const { positional } = parseArgs('extract', args, []);
  const [file] = positional;

  let text: string;
  if (file) {
    text = await fs.readFile(file, 'utf-8');
  } else if (io.stdin.isTTY) {
    io.stderr.write(missingInputError() + '\n');
    return 1;
  } else {
    text = await readAll(io.stdin);
  }

  const result = createFieldExtractor({ now: io.now }).extract(text);
  io.stdout.write(JSON.stringify(result, null, 2) + '\n');
  return 0;
}

async function scrapeCommand(args: string[], io: CliIo): Promise<number> {
  const { options } = parseArgs('scrape', args, ['csv', 'out', 'concurrency']);
  const csvPath = options.csv;
  if (!csvPath) {
    io.stderr.write(missingCsvError() + '\n');
    return 1;
  }

  const config = parseScraperConfig(io.env, {
    outputRoot: options.out,
    concurrency: options.concurrency,
  });
  const roster = loadRoster(await fs.readFile(csvPath, 'utf-8'));
  const scraper = new WikipediaScraper(config, { fetchFn: io.fetchFn });
  const outcomes = await scraper.scrapeAll(roster);

  const saved = outcomes.filter((outcome) => outcome.status === 'ok').length;
  io.stdout.write(`Saved ${saved}/${outcomes.length} pages to ${config.outputRoot}\n`);
  for (const outcome of outcomes) {
    if (outcome.status !== 'ok') {
      io.stdout.write(`  ${outcome.name}: ${outcome.status}\n`);
    }
  }
  return 0;
}

function createBackend(kind: string, io: CliIo): ExtractionBackend {
  switch (kind) {
    case 'regex':
      return createRegexBackend(createFieldExtractor({ now: io.now }));
    case 'llm': {
      if (!io.env.OPENAI_API_KEY?.trim()) {
        throw new CliUsageError(missingApiKeyError());
      }
      const config = parseLlmConfig(io.env);
      return createLlmFieldExtractor(config, io.completionClient);
    }
    default:
      throw new CliUsageError(unknownOptionError('batch', `--backend=${kind}`));
  }
}

async function batchCommand(args: string[], io: CliIo): Promise<number> {
  const { options } = parseArgs('batch', args, ['root', 'out', 'backend']);
  const root = options.root ?? parseScraperConfig(io.env).outputRoot;
  const output = options.out ?? DEFAULT_BATCH_OUTPUT;
  const backend = createBackend(options.backend ?? 'regex', io);

  const summary = await runBatch({ store: new PageStore(root), backend, output });
  io.stdout.write(
    `Wrote ${summary.items.length} records to ${output} (${summary.failed} failed)\n`
  );
  return 0;
}

// ============================================
// ENTRY POINT
// ============================================

/**
 * Run the CLI and return the exit code
 */
export async function run(argv: string[], io: CliIo): Promise<number> {
  const [command, ...rest] = argv;

  try {
    const logConfig = parseLogConfig(io.env);
    configureLogger({ level: logConfig.level, prettyPrint: logConfig.prettyPrint });

    switch (command) {
      case '--help':
      case '-h':
        io.stdout.write(USAGE + '\n');
        return 0;
      case 'scrape':
        return await scrapeCommand(rest, io);
      case 'batch':
        return await batchCommand(rest, io);
      case 'extract':
        return await extractCommand(rest, io);
      default:
        return await extractCommand(argv, io);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr.write(error.message + '\n');
      return 1;
    }
    log.error('Command failed', { command, error });
    io.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  run(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
