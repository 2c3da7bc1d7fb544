/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr (stdout carries CLI results and JSON Lines)
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  personId?: string;
  name?: string;
  url?: string;
  status?: number | string;
  attempt?: number;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function envLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: envLogLevel(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
};

/**
 * Paths to redact from logs so API keys never reach log files.
 * Uses Pino's path syntax (wildcards with *)
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'apiKey',
  '*.apiKey',
  '*.api_key',
  '*.token',
  '*.password',
  '*.secret',
  'config.apiKey',
];

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'bio-extract',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, process.stderr);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component-specific logger wrapper
 *
 * Resolves the current baseLogger on every call, so configureLogger()
 * also affects loggers created at module load.
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string) {
    this.component = component;
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Error level. Accepts unknown for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  roster: new Logger('Roster'),
  scraper: new Logger('WikipediaScraper'),
  pageStore: new Logger('PageStore'),
  batch: new Logger('BatchExtractor'),
  llm: new Logger('LlmFieldExtractor'),
  retry: new Logger('Retry'),
  cli: new Logger('Cli'),

  create: (component: string) => new Logger(component),
};
