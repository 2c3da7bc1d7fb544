/**
 * Error messages with suggestions for the CLI and batch pipeline
 */

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Command to run */
  command?: string;
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.command) {
    parts.push(`Run: ${options.command}`);
  }

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach((s) => parts.push(`  - ${s}`));
    }
  }

  return parts.join('\n');
}

export const USAGE = [
  'Usage: bio-extract <input.txt>',
  '   or: cat input.txt | bio-extract',
  '   or: bio-extract scrape --csv=<people.csv> [--out=<dir>] [--concurrency=<n>]',
  '   or: bio-extract batch [--root=<dir>] [--out=<file.jsonl>] [--backend=regex|llm]',
].join('\n');

/**
 * No file argument and nothing piped on stdin
 */
export function missingInputError(): string {
  return buildErrorMessage({
    message: 'No biography text to read.',
    suggestions: [USAGE],
  });
}

export function unknownOptionError(command: string, option: string): string {
  return buildErrorMessage({
    message: `Unknown option for ${command}: ${option}`,
    suggestions: [USAGE],
  });
}

export function missingCsvError(): string {
  return buildErrorMessage({
    message: 'The scrape command needs a roster file.',
    command: 'bio-extract scrape --csv=people.csv',
  });
}

export function missingApiKeyError(): string {
  return buildErrorMessage({
    message: 'The llm backend needs an OpenAI API key.',
    suggestions: [
      'Set OPENAI_API_KEY in the environment or in a .env file',
      'Use --backend=regex to run the pattern-based extractor instead',
    ],
  });
}

export function missingNameColumnError(candidates: readonly string[]): string {
  return buildErrorMessage({
    message: `Expected one of ${candidates.join(', ')} in the roster header.`,
  });
}
