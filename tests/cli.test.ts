import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { parseArgs, run, CliUsageError, type CliIo } from '../src/cli.js';
import { PageStore } from '../src/core/page-store.js';
import type { CompletionClient } from '../src/core/llm-field-extractor.js';
import {
  missingApiKeyError,
  missingCsvError,
  missingInputError,
  unknownOptionError,
  USAGE,
} from '../src/utils/error-messages.js';

const ARTICLE_HTML =
  '<html><body><h1 id="firstHeading">Sergey Revin</h1>' +
  '<div id="mw-content-text"><div class="mw-parser-output">' +
  '<p>Sergey Revin is a Russian cosmonaut.</p>' +
  '</div></div></body></html>';

interface TestIo extends CliIo {
  out: string[];
  err: string[];
}

function createIo(overrides: Partial<CliIo> = {}): TestIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    stdin: Object.assign(Readable.from([]), { isTTY: true }),
    stdout: { write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) },
    env: { LOG_LEVEL: 'silent' },
    now: () => new Date(2024, 5, 1),
    out,
    err,
    ...overrides,
  };
}

describe('cli', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bio-cli-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('parseArgs', () => {
    it('should separate options from positional arguments', () => {
      expect(parseArgs('scrape', ['--csv=a.csv', 'extra', '--out'], ['csv', 'out'])).toEqual({
        positional: ['extra'],
        options: { csv: 'a.csv', out: 'true' },
      });
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs('batch', ['--verbose'], ['root'])).toThrow(CliUsageError);
    });
  });

  describe('extract', () => {
    it('should print the fields of a biography file as indented JSON', async () => {
      const file = path.join(dir, 'bio.txt');
      await fs.writeFile(file, '- Born: (1966-01-12)\n- Nationality: Russian\n');
      const io = createIo();

      const code = await run([file], io);

      expect(code).toBe(0);
      expect(io.out.join('')).toBe(
        [
          '{',
          '  "degrees": [],',
          '  "education": [],',
          '  "occupations": [],',
          '  "time_in_space": null,',
          '  "interests": [],',
          '  "nationality": "Russian",',
          '  "age": 58',
          '}',
          '',
        ].join('\n')
      );
    });

    it('should accept the explicit extract command', async () => {
      const file = path.join(dir, 'bio.txt');
      await fs.writeFile(file, '- Occupation(s): Cosmonaut\n');
      const io = createIo();

      await expect(run(['extract', file], io)).resolves.toBe(0);
      expect(JSON.parse(io.out.join(''))).toMatchObject({ occupations: ['Cosmonaut'] });
    });

    it('should read piped stdin', async () => {
      const io = createIo({ stdin: Readable.from(['- Nationality: ', 'Russian\n']) });

      await expect(run([], io)).resolves.toBe(0);
      expect(JSON.parse(io.out.join(''))).toMatchObject({ nationality: 'Russian' });
    });

    it('should print usage when there is no input', async () => {
      const io = createIo();

      await expect(run([], io)).resolves.toBe(1);
      expect(io.err.join('')).toBe(missingInputError() + '\n');
      expect(io.out).toEqual([]);
    });

    it('should fail on a missing file', async () => {
      const io = createIo();

      await expect(run([path.join(dir, 'missing.txt')], io)).resolves.toBe(1);
      expect(io.err.join('')).toMatch(/^Error: ENOENT/);
    });

    it('should fail on an unknown option', async () => {
      const io = createIo();

      await expect(run(['--verbose'], io)).resolves.toBe(1);
      expect(io.err.join('')).toBe(unknownOptionError('extract', '--verbose') + '\n');
    });
  });

  it('should print usage for --help', async () => {
    const io = createIo();
    await expect(run(['--help'], io)).resolves.toBe(0);
    expect(io.out.join('')).toBe(USAGE + '\n');
  });

  describe('scrape', () => {
    it('should require a roster file', async () => {
      const io = createIo();
      await expect(run(['scrape'], io)).resolves.toBe(1);
      expect(io.err.join('')).toBe(missingCsvError() + '\n');
    });

    it('should save pages for every roster entry', async () => {
      const csv = path.join(dir, 'people.csv');
      await fs.writeFile(csv, 'Profile.Name,Profile.ID\n"Revin, Sergey",Sergey_Revin\n');
      const pages = path.join(dir, 'pages');
      const requested: string[] = [];
      const io = createIo({
        fetchFn: async (url) => {
          requested.push(url);
          return new Response(ARTICLE_HTML, { status: 200 });
        },
      });

      const code = await run(['scrape', `--csv=${csv}`, `--out=${pages}`, '--concurrency=2'], io);

      expect(code).toBe(0);
      expect(requested).toEqual(['https://en.wikipedia.org/wiki/Sergey_Revin']);
      expect(io.out.join('')).toBe(`Saved 1/1 pages to ${pages}\n`);
      await expect(fs.readFile(path.join(pages, 'Sergey_Revin', 'biography.txt'), 'utf-8')).resolves.toBe(
        'Sergey Revin\n- Sergey Revin is a Russian cosmonaut.\n'
      );
    });

    it('should reject an invalid concurrency', async () => {
      const csv = path.join(dir, 'people.csv');
      await fs.writeFile(csv, 'Name\nYuri Gagarin\n');
      const io = createIo();

      await expect(run(['scrape', `--csv=${csv}`, '--concurrency=0'], io)).resolves.toBe(1);
      expect(io.err.join('')).toContain('Configuration validation failed for scraper:');
    });
  });

  describe('batch', () => {
    let pages: string;
    let output: string;

    beforeEach(async () => {
      pages = path.join(dir, 'pages');
      output = path.join(dir, 'records.jsonl');
      await new PageStore(pages).writeBiography('Sergey_Revin', '- Nationality: Russian\n');
    });

    it('should run the regex backend by default', async () => {
      const io = createIo();

      await expect(run(['batch', `--root=${pages}`, `--out=${output}`], io)).resolves.toBe(0);
      expect(io.out.join('')).toBe(`Wrote 1 records to ${output} (0 failed)\n`);
      const line = (await fs.readFile(output, 'utf-8')).trim();
      expect(JSON.parse(line)).toMatchObject({ name: 'Sergey Revin', nationality: 'Russian' });
    });

    it('should require an API key for the llm backend', async () => {
      const io = createIo();

      await expect(run(['batch', `--root=${pages}`, `--out=${output}`, '--backend=llm'], io)).resolves.toBe(1);
      expect(io.err.join('')).toBe(missingApiKeyError() + '\n');
    });

    it('should use the completion client for the llm backend', async () => {
      const client: CompletionClient = {
        async completeJson() {
          return JSON.stringify({ name: 'Sergey Nikolayevich Revin', nationality: 'Russian' });
        },
      };
      const io = createIo({
        env: { LOG_LEVEL: 'silent', OPENAI_API_KEY: 'test-secret' },
        completionClient: client,
      });

      await expect(run(['batch', `--root=${pages}`, `--out=${output}`, '--backend=llm'], io)).resolves.toBe(0);
      const line = (await fs.readFile(output, 'utf-8')).trim();
      expect(JSON.parse(line)).toMatchObject({ name: 'Sergey Nikolayevich Revin', nationality: 'Russian' });
    });

    it('should reject an unknown backend', async () => {
      const io = createIo();

      await expect(run(['batch', '--backend=xml'], io)).resolves.toBe(1);
      expect(io.err.join('')).toBe(unknownOptionError('batch', '--backend=xml') + '\n');
    });
  });
});
