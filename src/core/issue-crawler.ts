/**
 * Issue Crawler
 *
 * Walks one journal year issue by issue:
 *
 *   navigate -> expand year -> [select issue -> wait -> extract -> (enrich)]*
 *
 * A failure loading the journal page ends the crawl. A failure inside one
 * issue is logged, that issue is recorded with no articles, and the crawl
 * moves on to the next issue. The browser is closed on every path.
 */

import { BrowserManager, withBrowserSession, type BrowserLauncher } from './browser-manager.js';
import { isTimeoutError, type BrowserSession, type CrawlPage } from './crawl-page.js';
import { enrichPapers, type DetailFetcher } from './detail-enricher.js';
import { CrawlAbortedError, IssueSpecFormatError, throwIfAborted } from './errors.js';
import { formatIssueSpec, resolveIssues, type IssueInput } from './issue-spec.js';
import type { PageLayout } from './page-layout.js';
import { PaperDetailFetcher } from './paper-detail-fetcher.js';
import { extractPapers } from './paper-row-extractor.js';
import { expandYear, selectIssue, waitForContent } from './selector-strategy.js';
import {
  createProgressEvent,
  type ArticleRecord,
  type CrawlProgressEvent,
  type CrawlProgressStage,
  type OnCrawlProgress,
} from '../types/index.js';
import { crawlOptionsSchema, parseConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';

const log = logger.crawler;

export interface IssueCrawlerOptions {
  /** Journal navigation page */
  url: string;
  year: number;
  /** "1-3,5", a single issue, or a list */
  issues: IssueInput;
  /** Fetch abstract and other details for each article */
  getDetails?: boolean;
  headless?: boolean;
  /** Navigation and per-operation timeout in ms */
  timeout?: number;
  userAgent?: string;
  layout?: Partial<PageLayout>;
  waitAttempts?: number;
  pollIntervalMs?: number;
  yearSettleMs?: number;
  issueSettleMs?: number;
  detailDelayMs?: number;
  /** Aborting stops the crawl with CrawlAbortedError */
  signal?: AbortSignal;
  onProgress?: OnCrawlProgress;
}

export interface IssueCrawlerDeps {
  launcher?: BrowserLauncher;
  detailFetcher?: DetailFetcher;
}

/**
 * Everything one crawl produced. Returned by value; the crawler keeps no
 * reference to it.
 */
export interface CrawlSession {
  readonly url: string;
  readonly year: number;
  readonly issues: readonly number[];
  readonly getDetails: boolean;
  readonly headless: boolean;
  readonly timeout: number;
  /** All articles, issue by issue in ascending order */
  readonly records: ArticleRecord[];
  /** Articles per issue; a failed issue maps to [] */
  readonly byIssue: Map<number, ArticleRecord[]>;
}

interface IssuePosition {
  index: number;
  total: number;
}

export class IssueCrawler {
  readonly url: string;
  readonly year: number;
  readonly issues: readonly number[];
  readonly getDetails: boolean;
  readonly headless: boolean;
  readonly timeout: number;

  private readonly launcher: BrowserLauncher;
  private readonly detailFetcher: DetailFetcher;
  private startTime = Date.now();

  constructor(
    private readonly options: IssueCrawlerOptions,
    deps: IssueCrawlerDeps = {}
  ) {
    const validated = parseConfig(crawlOptionsSchema, 'crawl options', {
      url: options.url,
      year: options.year,
      getDetails: options.getDetails,
      headless: options.headless,
      timeout: options.timeout,
    });

    const issues = resolveIssues(options.issues);
    if (issues.length === 0) {
      throw new IssueSpecFormatError('No issue numbers given', String(options.issues));
    }

    this.url = validated.url;
    this.year = validated.year;
    this.issues = issues;
    this.getDetails = validated.getDetails;
    this.headless = validated.headless;
    this.timeout = validated.timeout;

    this.launcher = deps.launcher ?? new BrowserManager({
      headless: this.headless,
      timeout: this.timeout,
      ...(options.userAgent ? { userAgent: options.userAgent } : {}),
    }).launcher();
    this.detailFetcher = deps.detailFetcher ?? new PaperDetailFetcher({ timeout: this.timeout });
  }

  /**
   * Crawl exactly one issue (the first resolved issue by default) in its
   * own browser session. Every error propagates once the browser is closed.
   */
  async runSingle(issue: number = this.issues[0]): Promise<ArticleRecord[]> {
    const [target] = resolveIssues(issue);
    this.startTime = Date.now();

    const records = await this.withSession(async (browser) => {
      await this.openJournal(browser.page);
      return this.crawlIssue(browser, target, { index: 1, total: 1 });
    });

    this.emit('complete', `Crawled ${records.length} articles`, { articleCount: records.length });
    return records;
  }

  /**
   * Crawl every resolved issue (or `issues`, when given) in ascending order
   * within one browser session.
   */
  async runAll(issues: IssueInput = this.issues): Promise<CrawlSession> {
    const targets = resolveIssues(issues);
    const session = this.createSession(targets);

    if (targets.length === 0) {
      log.warn('No issues to crawl');
      return session;
    }

    if (targets.length === 1) {
      const records = await this.runSingle(targets[0]);
      session.byIssue.set(targets[0], records);
      session.records.push(...records);
      return session;
    }

    this.startTime = Date.now();
    log.info('Crawling issues', {
      year: this.year,
      issues: formatIssueSpec(targets),
      count: targets.length,
    });

    await this.withSession(async (browser) => {
      await this.openJournal(browser.page);

      for (const [i, issue] of targets.entries()) {
        const position = { index: i + 1, total: targets.length };
        try {
          const records = await this.crawlIssue(browser, issue, position);
          session.byIssue.set(issue, records);
          session.records.push(...records);
        } catch (error) {
          if (error instanceof CrawlAbortedError || this.options.signal?.aborted) {
            throw error;
          }
          log.error(`Issue ${position.index}/${position.total} failed`, {
            year: this.year,
            issue,
            error,
          });
          session.byIssue.set(issue, []);
          this.emit('issue_failed', `Issue ${issue} failed`, { issue, ...position });
        }
      }
    });

    this.emit('complete', `Crawled ${session.records.length} articles`, {
      articleCount: session.records.length,
      total: targets.length,
    });
    return session;
  }

  createSession(issues: readonly number[] = this.issues): CrawlSession {
    return {
      url: this.url,
      year: this.year,
      issues: [...issues],
      getDetails: this.getDetails,
      headless: this.headless,
      timeout: this.timeout,
      records: [],
      byIssue: new Map(),
    };
  }

  /**
   * Acquire a browser for `fn`. Aborting the signal closes the browser at
   * once, so a pending navigation or click fails fast; whatever error that
   * produces surfaces as CrawlAbortedError.
   */
  private async withSession<T>(fn: (browser: BrowserSession) => Promise<T>): Promise<T> {
    const { signal } = this.options;
    throwIfAborted(signal);

    try {
      return await withBrowserSession(this.launcher, async (browser) => {
        const onAbort = (): void => {
          log.warn('Abort requested, closing browser');
          browser.close().catch((error: unknown) => {
            log.debug('Closing browser after abort failed', { error: String(error) });
          });
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        try {
          const result = await fn(browser);
          // Steps that recover from their own failures may have masked the abort.
          throwIfAborted(signal);
          return result;
        } finally {
          signal?.removeEventListener('abort', onAbort);
        }
      });
    } catch (error) {
      if (signal?.aborted && !(error instanceof CrawlAbortedError)) {
        throw new CrawlAbortedError();
      }
      throw error;
    }
  }

  private async openJournal(page: CrawlPage): Promise<void> {
    throwIfAborted(this.options.signal);
    this.emit('navigating', `Opening ${this.url}`);
    log.info('Opening journal page', { url: this.url });

    try {
      await page.goto(this.url, { timeout: this.timeout, waitUntil: 'networkidle' });
    } catch (error) {
      if (isTimeoutError(error)) {
        log.error('Journal page load timed out', { url: this.url, timeoutMs: this.timeout });
      }
      throw error;
    }

    throwIfAborted(this.options.signal);
    this.emit('expanding_year', `Expanding ${this.year}`);
    await expandYear(page, this.year, {
      layout: this.options.layout,
      settleMs: this.options.yearSettleMs,
      signal: this.options.signal,
    });
    throwIfAborted(this.options.signal);
  }

  private async crawlIssue(
    browser: BrowserSession,
    issue: number,
    position: IssuePosition
  ): Promise<ArticleRecord[]> {
    const { signal, layout } = this.options;
    const page = browser.page;
    const issueLog = log.child({ year: this.year, issue });

    throwIfAborted(signal);
    this.emit('selecting_issue', `Selecting ${this.year} issue ${issue}`, { issue, ...position });
    issueLog.debug('Crawling issue', { index: position.index, total: position.total });
    await selectIssue(page, this.year, issue, {
      layout,
      settleMs: this.options.issueSettleMs,
      signal,
    });

    throwIfAborted(signal);
    this.emit('waiting', 'Waiting for article list', { issue, ...position });
    await waitForContent(page, {
      layout,
      maxAttempts: this.options.waitAttempts,
      pollIntervalMs: this.options.pollIntervalMs,
      signal,
    });

    throwIfAborted(signal);
    this.emit('extracting', 'Reading article rows', { issue, ...position });
    const records = await extractPapers(page, {
      year: this.year,
      issue,
      getDetails: this.getDetails,
      layout,
      signal,
    });
    throwIfAborted(signal);

    if (this.getDetails && records.length > 0) {
      this.emit('enriching', `Fetching details of ${records.length} articles`, {
        issue,
        ...position,
        articleCount: records.length,
      });
      await enrichPapers(browser, records, {
        fetcher: this.detailFetcher,
        timeout: this.timeout,
        delayMs: this.options.detailDelayMs ?? TIMEOUTS.DETAIL_DELAY,
        signal,
      });
    }

    issueLog.info('Issue crawled', { articleCount: records.length });
    this.emit('issue_complete', `Issue ${issue}: ${records.length} articles`, {
      issue,
      ...position,
      articleCount: records.length,
    });
    return records;
  }

  private emit(
    stage: CrawlProgressStage,
    message: string,
    details: Omit<CrawlProgressEvent, 'stage' | 'message' | 'elapsedMs'> = {}
  ): void {
    this.options.onProgress?.(createProgressEvent(stage, message, this.startTime, details));
  }
}
