/**
 * journal-issue-crawler
 *
 * Crawls article lists (and optionally article details) of journal issues
 * from a JavaScript-rendered journal navigation page.
 *
 * Usage:
 * ```typescript
 * import { IssueCrawler } from 'journal-issue-crawler';
 *
 * const crawler = new IssueCrawler({
 *   url: 'https://navi.example.org/journals/ABCD/detail',
 *   year: 2025,
 *   issues: '1-3',
 *   getDetails: true,
 * });
 * const session = await crawler.runAll();
 * console.log(session.byIssue.get(2));
 * ```
 */

export {
  IssueCrawler,
  type CrawlSession,
  type IssueCrawlerDeps,
  type IssueCrawlerOptions,
} from './core/issue-crawler.js';
export {
  parseIssueSpec,
  resolveIssues,
  formatIssueSpec,
  MIN_ISSUE,
  MAX_ISSUE,
  type IssueInput,
} from './core/issue-spec.js';
export {
  expandYear,
  selectIssue,
  waitForContent,
  runStrategies,
  yearStrategies,
  issueStrategies,
  type SelectionOutcome,
  type SelectionOptions,
  type SelectorStrategy,
  type StrategyAttempt,
  type WaitForContentOptions,
} from './core/selector-strategy.js';
export { extractPapers, type ExtractOptions } from './core/paper-row-extractor.js';
export {
  enrichPapers,
  applyDetail,
  type DetailFetcher,
  type EnrichOptions,
  type EnrichSummary,
} from './core/detail-enricher.js';
export { PaperDetailFetcher, parseDetailHtml } from './core/paper-detail-fetcher.js';
export { DEFAULT_LAYOUT, resolveLayout, type PageLayout } from './core/page-layout.js';
export {
  BrowserManager,
  withBrowserSession,
  type BrowserConfig,
  type BrowserLauncher,
} from './core/browser-manager.js';
export {
  PlaywrightCrawlPage,
  isTimeoutError,
  type BrowserSession,
  type CrawlPage,
  type PageElement,
} from './core/crawl-page.js';
export {
  IssueSpecError,
  IssueSpecFormatError,
  IssueSpecRangeError,
  CrawlAbortedError,
  BrowserUnavailableError,
} from './core/errors.js';
export { abstractValue, toSerializable, saveResults, formatResults } from './core/results-writer.js';
export { ConfigValidationError } from './utils/config-schemas.js';
export { configureLogger, logger } from './utils/logger.js';

export type {
  AbstractState,
  ArticleRecord,
  PaperDetail,
  SerializedArticle,
  CrawlProgressEvent,
  CrawlProgressStage,
  OnCrawlProgress,
} from './types/index.js';
