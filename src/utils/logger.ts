/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr (stdout is left to the CLI's result summary)
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  url?: string;
  year?: number;
  issue?: number;
  operation?: string;
  strategy?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

function levelFromEnv(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: levelFromEnv(process.env.LOG_LEVEL),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'journal-issue-crawler',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
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
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
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
   * Error level - accepts unknown for `error` since catch blocks provide unknown
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
  crawler: new Logger('IssueCrawler'),
  selector: new Logger('SelectorStrategy'),
  extractor: new Logger('PaperRowExtractor'),
  enricher: new Logger('DetailEnricher'),
  detail: new Logger('PaperDetailFetcher'),
  browser: new Logger('BrowserManager'),
  config: new Logger('ConfigLoader'),
  cli: new Logger('Cli'),

  create: (component: string) => new Logger(component),
};

export default logger;
