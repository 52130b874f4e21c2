/**
 * Browser Manager - Handles Playwright browser lifecycle
 *
 * Playwright is loaded lazily so the parsing, extraction and enrichment
 * code can be imported (and tested) without a browser installed.
 */

import type { Browser, BrowserContext } from 'playwright';
import { BrowserUnavailableError } from './errors.js';
import { PlaywrightCrawlPage, type BrowserSession, type CrawlPage } from './crawl-page.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';

const log = logger.browser;

let playwrightModule: typeof import('playwright') | null = null;
let playwrightLoadError: string | null = null;

async function tryLoadPlaywright(): Promise<typeof import('playwright') | null> {
  if (playwrightModule || playwrightLoadError) {
    return playwrightModule;
  }

  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    playwrightLoadError = error instanceof Error ? error.message : 'Failed to load Playwright';
    log.error('Playwright not available', { error });
    return null;
  }
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface BrowserConfig {
  headless: boolean;
  /** Default timeout applied to every page operation */
  timeout: number;
  userAgent: string;
  slowMo: number;
}

const DEFAULT_CONFIG: BrowserConfig = {
  headless: true,
  timeout: TIMEOUTS.PAGE_LOAD,
  userAgent: DEFAULT_USER_AGENT,
  slowMo: 0,
};

/**
 * Acquires a browser session. Injected into the crawler so tests can hand
 * it an in-process session instead.
 */
export type BrowserLauncher = () => Promise<BrowserSession>;

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    readonly page: CrawlPage,
    private readonly timeout: number
  ) {}

  async newPage(options: { timeout?: number } = {}): Promise<CrawlPage> {
    const page = await this.context.newPage();
    page.setDefaultTimeout(options.timeout ?? this.timeout);
    return new PlaywrightCrawlPage(page);
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
      log.debug('Browser closed');
    }
  }
}

export class BrowserManager {
  private config: BrowserConfig;

  constructor(config: Partial<BrowserConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getConfig(): BrowserConfig {
    return { ...this.config };
  }

  /**
   * Launch Chromium with one context and one primary page.
   */
  async launch(): Promise<BrowserSession> {
    const pw = await tryLoadPlaywright();
    if (!pw) {
      throw new BrowserUnavailableError(playwrightLoadError ?? undefined);
    }

    const browser = await pw.chromium.launch({
      headless: this.config.headless,
      slowMo: this.config.slowMo,
    });

    try {
      const context = await browser.newContext({ userAgent: this.config.userAgent });
      const page = await context.newPage();
      page.setDefaultTimeout(this.config.timeout);

      log.debug('Browser launched', { headless: this.config.headless });
      return new PlaywrightSession(browser, context, new PlaywrightCrawlPage(page), this.config.timeout);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  /**
   * Bind launch() so it can be passed around as a BrowserLauncher.
   */
  launcher(): BrowserLauncher {
    return () => this.launch();
  }
}

/**
 * Run `fn` with a freshly acquired session and close it on every path,
 * including errors thrown by `fn`.
 */
export async function withBrowserSession<T>(
  launch: BrowserLauncher,
  fn: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await launch();
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (error) {
      log.warn('Failed to close browser session', { error: String(error) });
    }
  }
}
