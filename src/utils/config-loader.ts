/**
 * Configuration File Loader
 *
 * Loads configuration from a .journalcrawlrc file.
 * Configuration precedence: CLI flags > Environment Variables > Config File > Defaults
 * (CLI flags are applied by the caller on top of what this module returns.)
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory
 *
 * Supported file names:
 * - .journalcrawlrc (JSON format, comments allowed)
 * - .journalcrawlrc.json
 * - journalcrawlrc.json
 *
 * @example
 * // .journalcrawlrc in project root
 * {
 *   "log": { "level": "debug", "prettyPrint": true },
 *   "crawler": { "headless": false, "timeout": 60000 }
 * }
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import {
  crawlerConfigSchema,
  logConfigSchema,
  parseConfig,
  type CrawlerConfig,
  type LogConfig,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use env vars or defaults.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    prettyPrint: z.boolean().optional(),
  }).strict().optional(),

  crawler: z.object({
    headless: z.boolean().optional(),
    timeout: z.number().int().min(1000).max(300000).optional(),
    details: z.boolean().optional(),
    output: z.string().min(1).optional(),
    waitAttempts: z.number().int().min(1).max(120).optional(),
    pollIntervalMs: z.number().int().min(0).max(60000).optional(),
    detailDelayMs: z.number().int().min(0).max(60000).optional(),
    userAgent: z.string().min(1).optional(),
  }).strict().optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

export const CONFIG_FILE_NAMES = [
  '.journalcrawlrc',
  '.journalcrawlrc.json',
  'journalcrawlrc.json',
];

function getSearchPaths(): string[] {
  const paths = [process.cwd()];

  try {
    const home = homedir();
    if (home && !paths.includes(home)) {
      paths.push(home);
    }
  } catch (error) {
    log.debug('Home directory unavailable', { error: String(error) });
  }

  return paths;
}

/**
 * Find the first existing config file.
 */
export function findConfigFile(searchPaths: string[] = getSearchPaths()): string | null {
  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Load and parse a config file. An unreadable or invalid file yields an
 * empty config and a warning.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  try {
    const content = readFileSync(filePath, 'utf-8');

    // .journalcrawlrc may carry // and /* */ comments
    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    const parsed: unknown = JSON.parse(stripped);
    const result = configFileSchema.safeParse(parsed);

    if (!result.success) {
      log.warn('Config file validation failed', {
        path: filePath,
        errors: result.error.issues.map(i => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      });
      return {};
    }

    log.info('Loaded config file', { path: filePath });
    return result.data;
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', { path: filePath, error: error.message });
    } else {
      log.warn('Failed to read config file', { path: filePath, error: String(error) });
    }
    return {};
  }
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;
let cachedConfigFilePath: string | null = null;

/**
 * Get the loaded config file (cached after first load).
 */
export function getConfigFile(): ConfigFile {
  if (!cachedConfigFile) {
    cachedConfigFilePath = findConfigFile();
    cachedConfigFile = cachedConfigFilePath ? loadConfigFile(cachedConfigFilePath) : {};
  }
  return cachedConfigFile;
}

export function getConfigFilePath(): string | null {
  getConfigFile();
  return cachedConfigFilePath;
}

/**
 * Clear the config file cache.
 */
export function clearConfigFileCache(): void {
  cachedConfigFile = null;
  cachedConfigFilePath = null;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function numToEnvString(value: number | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

/**
 * Get merged log configuration.
 */
export function getMergedLogConfig(file: ConfigFile = getConfigFile()): LogConfig {
  const section = file.log ?? {};

  return parseConfig(logConfigSchema, 'log', {
    level: process.env.LOG_LEVEL ?? section.level,
    prettyPrint: process.env.LOG_PRETTY ?? boolToEnvString(section.prettyPrint),
  });
}

/**
 * Get merged crawler configuration.
 */
export function getMergedCrawlerConfig(file: ConfigFile = getConfigFile()): CrawlerConfig {
  const section = file.crawler ?? {};

  return parseConfig(crawlerConfigSchema, 'crawler', {
    headless: process.env.CRAWLER_HEADLESS ?? boolToEnvString(section.headless),
    timeout: process.env.CRAWLER_TIMEOUT ?? numToEnvString(section.timeout),
    details: process.env.CRAWLER_DETAILS ?? boolToEnvString(section.details),
    output: process.env.CRAWLER_OUTPUT ?? section.output,
    waitAttempts: process.env.CRAWLER_WAIT_ATTEMPTS ?? numToEnvString(section.waitAttempts),
    pollIntervalMs: process.env.CRAWLER_POLL_INTERVAL_MS ?? numToEnvString(section.pollIntervalMs),
    detailDelayMs: process.env.CRAWLER_DETAIL_DELAY_MS ?? numToEnvString(section.detailDelayMs),
    userAgent: process.env.CRAWLER_USER_AGENT ?? section.userAgent,
  });
}

/**
 * Sample config file contents with every option at its default.
 */
export function generateSampleConfig(): string {
  const sample: ConfigFile = {
    log: {
      level: 'info',
      prettyPrint: false,
    },
    crawler: {
      headless: true,
      timeout: 30000,
      details: true,
      output: 'results.json',
      waitAttempts: 10,
      pollIntervalMs: 1000,
      detailDelayMs: 300,
    },
  };
  return JSON.stringify(sample, null, 2);
}
