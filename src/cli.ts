#!/usr/bin/env node
/**
 * journal-crawl: crawl article lists of journal issues from the command line.
 *
 * Usage:
 *   journal-crawl -u <URL> -y <YEAR> -i <ISSUES> [options]
 *
 * Exit codes: 0 success (also when no article was found), 1 invalid input
 * or crawl error, 130 interrupted.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { isTimeoutError } from './core/crawl-page.js';
import { CrawlAbortedError, IssueSpecError } from './core/errors.js';
import { IssueCrawler, type IssueCrawlerDeps, type IssueCrawlerOptions } from './core/issue-crawler.js';
import { formatIssueSpec, parseIssueSpec } from './core/issue-spec.js';
import { formatResults, saveResults } from './core/results-writer.js';
import type { ArticleRecord, CrawlProgressEvent } from './types/index.js';
import {
  generateSampleConfig,
  getConfigFilePath,
  getMergedCrawlerConfig,
  getMergedLogConfig,
} from './utils/config-loader.js';
import {
  ConfigValidationError,
  httpUrlSchema,
  parseConfig,
  yearSchema,
  type CrawlerConfig,
} from './utils/config-schemas.js';
import {
  crawlFailedError,
  invalidIssueSpecError,
  missingArgumentsError,
  navigationTimeoutError,
  unknownArgumentError,
} from './utils/error-messages.js';
import { configureLogger, logger } from './utils/logger.js';

const log = logger.cli;

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `
Usage: journal-crawl -u <URL> -y <YEAR> -i <ISSUES> [options]

Options:
  -u, --url <url>        Journal navigation page (required)
  -y, --year <year>      Publication year (required)
  -i, --issue <issues>   Issues to crawl (required): 6, 1-3, 1,5,7 or 1-3,5,7-9
  -d, --details          Fetch abstract, keywords, DOI and fund (default)
      --no-details       Only read the article lists
      --no-headless      Show the browser window
  -t, --timeout <ms>     Page load timeout in milliseconds (default 30000)
  -o, --output <file>    Output file (default results.json)
      --print-config     Print a sample .journalcrawlrc and exit
  -h, --help             Show this help

Examples:
  journal-crawl -u "https://navi.example.org/journals/ABCD/detail" -y 2025 -i 6
  journal-crawl -u "https://navi.example.org/journals/ABCD/detail" -y 2025 -i "1-3,5" --no-details
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

// ============================================
// ARGUMENT PARSING
// ============================================

export const cliArgsSchema = z.object({
  url: httpUrlSchema,
  year: z.coerce.number().pipe(yearSchema),
  issue: z.string().trim().min(1),
  details: z.boolean().optional(),
  headless: z.boolean().optional(),
  timeout: z.coerce.number().int().min(1000).max(300000).optional(),
  output: z.string().min(1).optional(),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

export type ParsedCli = { kind: 'help' } | { kind: 'print-config' } | { kind: 'run'; args: CliArgs };

const VALUE_FLAGS: Record<string, 'url' | 'year' | 'issue' | 'timeout' | 'output'> = {
  '-u': 'url',
  '--url': 'url',
  '-y': 'year',
  '--year': 'year',
  '-i': 'issue',
  '--issue': 'issue',
  '-t': 'timeout',
  '--timeout': 'timeout',
  '-o': 'output',
  '--output': 'output',
};

const BOOLEAN_FLAGS: Record<string, { key: 'details' | 'headless'; value: boolean }> = {
  '-d': { key: 'details', value: true },
  '--details': { key: 'details', value: true },
  '--no-details': { key: 'details', value: false },
  '--headless': { key: 'headless', value: true },
  '--no-headless': { key: 'headless', value: false },
};

const REQUIRED = ['url', 'year', 'issue'] as const;

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @throws CliUsageError for unknown flags, missing values or missing required flags
 * @throws ConfigValidationError for values of the wrong shape
 */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const raw: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }
    if (arg === '--print-config') {
      return { kind: 'print-config' };
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;

    const valueKey = VALUE_FLAGS[flag];
    if (valueKey) {
      const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
      if (value === undefined) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      raw[valueKey] = value;
      continue;
    }

    const booleanFlag = BOOLEAN_FLAGS[flag];
    if (booleanFlag && eq < 0) {
      raw[booleanFlag.key] = booleanFlag.value;
      continue;
    }

    throw new CliUsageError(unknownArgumentError(arg));
  }

  const missing = REQUIRED.filter((key) => raw[key] === undefined).map((key) => `--${key}`);
  if (missing.length > 0) {
    throw new CliUsageError(missingArgumentsError(missing));
  }

  return { kind: 'run', args: parseConfig(cliArgsSchema, 'arguments', raw) };
}

// ============================================
// RUN
// ============================================

export interface CliDeps {
  /** Result listing and summary lines */
  stdout?: (text: string) => void;
  /** Error lines */
  stderr?: (text: string) => void;
  signal?: AbortSignal;
  loadConfig?: () => CrawlerConfig;
  crawlerDeps?: IssueCrawlerDeps;
}

function progressPrinter(print: (text: string) => void): (event: CrawlProgressEvent) => void {
  return (event) => {
    switch (event.stage) {
      case 'selecting_issue':
        if (event.total !== undefined && event.total > 1) {
          print(`\n${'='.repeat(50)}\n${event.message} (${event.index}/${event.total})\n${'='.repeat(50)}`);
        } else {
          print(event.message);
        }
        break;
      case 'navigating':
      case 'enriching':
      case 'issue_complete':
      case 'issue_failed':
        print(event.message);
        break;
      default:
        break;
    }
  };
}

function describeCrawlError(error: unknown, url: string, timeout: number): string {
  if (isTimeoutError(error)) {
    return navigationTimeoutError(url, timeout);
  }
  return crawlFailedError(error instanceof Error ? error.message : String(error));
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => console.log(text));
  const stderr = deps.stderr ?? ((text: string) => console.error(text));

  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError || error instanceof ConfigValidationError) {
      stderr(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  if (parsed.kind === 'help') {
    stdout(USAGE.trim());
    return EXIT_SUCCESS;
  }

  if (parsed.kind === 'print-config') {
    stdout(generateSampleConfig());
    return EXIT_SUCCESS;
  }

  const { args } = parsed;

  let issues: number[];
  try {
    issues = parseIssueSpec(args.issue);
  } catch (error) {
    if (error instanceof IssueSpecError) {
      stderr(`Error: ${invalidIssueSpecError(args.issue, error.message)}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
  stdout(`Issues: ${args.issue} -> [${issues.join(', ')}]`);

  let config: CrawlerConfig;
  try {
    config = (deps.loadConfig ?? getMergedCrawlerConfig)();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      stderr(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const options: IssueCrawlerOptions = {
    url: args.url,
    year: args.year,
    issues,
    getDetails: args.details ?? config.details,
    headless: args.headless ?? config.headless,
    timeout: args.timeout ?? config.timeout,
    userAgent: config.userAgent,
    waitAttempts: config.waitAttempts,
    pollIntervalMs: config.pollIntervalMs,
    detailDelayMs: config.detailDelayMs,
    signal: deps.signal,
    onProgress: progressPrinter(stdout),
  };
  const output = args.output ?? config.output;
  const timeout = options.timeout ?? config.timeout;

  let records: ArticleRecord[];
  try {
    const crawler = new IssueCrawler(options, deps.crawlerDeps);
    if (issues.length > 1) {
      stdout(`Crawling ${args.year} issues ${formatIssueSpec(issues)} (${issues.length} issues)`);
    }
    records = issues.length === 1
      ? await crawler.runSingle()
      : (await crawler.runAll()).records;
  } catch (error) {
    if (error instanceof CrawlAbortedError) {
      stderr('\nInterrupted by user');
      return EXIT_INTERRUPTED;
    }
    if (error instanceof ConfigValidationError || error instanceof IssueSpecError) {
      stderr(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    log.error('Crawl failed', { error });
    stderr(`\nError: ${describeCrawlError(error, args.url, timeout)}`);
    return EXIT_FAILURE;
  }

  if (records.length === 0) {
    stdout('\nWarning: no articles found');
    return EXIT_SUCCESS;
  }

  stdout(formatResults(records));
  try {
    const path = await saveResults(records, output);
    stdout(`\nResults saved to ${path}`);
  } catch (error) {
    stderr(`\nError: could not write ${output}: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }

  stdout(`\nCrawled ${records.length} articles`);
  return EXIT_SUCCESS;
}

/**
 * Process entry: wires SIGINT to an abort and sets the exit code.
 * A second SIGINT exits at once.
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  configureLogger(getMergedLogConfig());
  log.debug('Configuration loaded', { configFile: getConfigFilePath() ?? 'none' });

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    controller.abort();
  };

  process.on('SIGINT', onSigint);
  try {
    process.exitCode = await runCli(argv, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onSigint);
  }
}

function isDirectRun(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  main().catch((error: unknown) => {
    log.error('Fatal error', { error });
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(EXIT_FAILURE);
  });
}
