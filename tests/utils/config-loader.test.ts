/**
 * Configuration Loader Tests
 *
 * Tests for the .journalcrawlrc configuration file loading system.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  configFileSchema,
  clearConfigFileCache,
  findConfigFile,
  generateSampleConfig,
  getMergedCrawlerConfig,
  getMergedLogConfig,
  loadConfigFile,
} from '../../src/utils/config-loader.js';
import { ConfigValidationError } from '../../src/utils/config-schemas.js';

const originalEnv = { ...process.env };

const CRAWLER_ENV = [
  'CRAWLER_HEADLESS',
  'CRAWLER_TIMEOUT',
  'CRAWLER_DETAILS',
  'CRAWLER_OUTPUT',
  'CRAWLER_WAIT_ATTEMPTS',
  'CRAWLER_POLL_INTERVAL_MS',
  'CRAWLER_DETAIL_DELAY_MS',
  'CRAWLER_USER_AGENT',
];

describe('ConfigLoader', () => {
  let testDir: string;

  beforeEach(() => {
    clearConfigFileCache();
    process.env = { ...originalEnv };
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_PRETTY;
    for (const name of CRAWLER_ENV) {
      delete process.env[name];
    }
    testDir = mkdtempSync(join(tmpdir(), 'journalcrawl-config-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    process.env = { ...originalEnv };
  });

  describe('configFileSchema', () => {
    it('should accept a valid configuration', () => {
      const result = configFileSchema.safeParse({
        log: { level: 'debug', prettyPrint: true },
        crawler: { headless: false, timeout: 60000, output: 'out/results.json' },
      });
      expect(result.success).toBe(true);
    });

    it('should accept an empty configuration', () => {
      expect(configFileSchema.safeParse({}).success).toBe(true);
    });

    it('should reject unknown keys', () => {
      expect(configFileSchema.safeParse({ crawler: { headles: false } }).success).toBe(false);
    });

    it('should reject a timeout below one second', () => {
      expect(configFileSchema.safeParse({ crawler: { timeout: 10 } }).success).toBe(false);
    });
  });

  describe('findConfigFile', () => {
    it('should find the first file name in the first directory that has one', () => {
      const other = mkdtempSync(join(tmpdir(), 'journalcrawl-config-home-'));
      try {
        writeFileSync(join(testDir, 'journalcrawlrc.json'), '{}');
        writeFileSync(join(testDir, '.journalcrawlrc.json'), '{}');
        writeFileSync(join(other, '.journalcrawlrc'), '{}');

        expect(findConfigFile([testDir, other])).toBe(join(testDir, '.journalcrawlrc.json'));
        expect(findConfigFile([other, testDir])).toBe(join(other, '.journalcrawlrc'));
      } finally {
        rmSync(other, { recursive: true, force: true });
      }
    });

    it('should return null when no directory has a config file', () => {
      expect(findConfigFile([testDir])).toBeNull();
    });
  });

  describe('loadConfigFile', () => {
    it('should strip comments before parsing', () => {
      const path = join(testDir, '.journalcrawlrc');
      writeFileSync(
        path,
        [
          '/* crawler defaults */',
          '{',
          '  // slower machine',
          '  "crawler": { "timeout": 60000 }',
          '}',
        ].join('\n')
      );

      expect(loadConfigFile(path)).toEqual({ crawler: { timeout: 60000 } });
    });

    it('should return an empty config for invalid JSON', () => {
      const path = join(testDir, '.journalcrawlrc');
      writeFileSync(path, '{ "crawler": ');

      expect(loadConfigFile(path)).toEqual({});
    });

    it('should return an empty config when validation fails', () => {
      const path = join(testDir, '.journalcrawlrc');
      writeFileSync(path, JSON.stringify({ crawler: { waitAttempts: 0 } }));

      expect(loadConfigFile(path)).toEqual({});
    });

    it('should return an empty config for a missing file', () => {
      expect(loadConfigFile(join(testDir, 'missing.json'))).toEqual({});
    });
  });

  describe('getMergedLogConfig', () => {
    it('should use defaults without file or env', () => {
      expect(getMergedLogConfig({})).toEqual({ level: 'info', prettyPrint: false });
    });

    it('should take values from the file', () => {
      expect(getMergedLogConfig({ log: { level: 'debug', prettyPrint: true } })).toEqual({
        level: 'debug',
        prettyPrint: true,
      });
    });

    it('should let env vars override the file', () => {
      process.env.LOG_LEVEL = 'error';
      process.env.LOG_PRETTY = 'no';

      expect(getMergedLogConfig({ log: { level: 'debug', prettyPrint: true } })).toEqual({
        level: 'error',
        prettyPrint: false,
      });
    });

    it('should reject an unknown level from env', () => {
      process.env.LOG_LEVEL = 'verbose';

      expect(() => getMergedLogConfig({})).toThrow(ConfigValidationError);
    });
  });

  describe('getMergedCrawlerConfig', () => {
    it('should use defaults without file or env', () => {
      expect(getMergedCrawlerConfig({})).toEqual({
        headless: true,
        timeout: 30000,
        details: true,
        output: 'results.json',
        waitAttempts: 10,
        pollIntervalMs: 1000,
        detailDelayMs: 300,
      });
    });

    it('should take values from the file', () => {
      const config = getMergedCrawlerConfig({
        crawler: { headless: false, timeout: 45000, details: false, userAgent: 'TestAgent/1.0' },
      });

      expect(config.headless).toBe(false);
      expect(config.timeout).toBe(45000);
      expect(config.details).toBe(false);
      expect(config.userAgent).toBe('TestAgent/1.0');
    });

    it('should let env vars override the file', () => {
      process.env.CRAWLER_TIMEOUT = '90000';
      process.env.CRAWLER_HEADLESS = 'true';
      process.env.CRAWLER_OUTPUT = 'env.json';

      const config = getMergedCrawlerConfig({
        crawler: { headless: false, timeout: 45000, output: 'file.json' },
      });

      expect(config.timeout).toBe(90000);
      expect(config.headless).toBe(true);
      expect(config.output).toBe('env.json');
    });

    it('should reject an out-of-range env value', () => {
      process.env.CRAWLER_WAIT_ATTEMPTS = '500';

      expect(() => getMergedCrawlerConfig({})).toThrow(ConfigValidationError);
    });
  });

  describe('generateSampleConfig', () => {
    it('should produce a config the schema accepts', () => {
      const parsed: unknown = JSON.parse(generateSampleConfig());
      expect(configFileSchema.safeParse(parsed).success).toBe(true);
    });
  });
});
