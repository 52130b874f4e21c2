/**
 * Progress Event Types for IssueCrawler
 *
 * Provides progress updates while a crawl walks through its issues.
 * The CLI turns these into console lines; library users can ignore them.
 */

/**
 * Progress stages during a crawl
 */
export type CrawlProgressStage =
  | 'navigating'        // Loading the journal page
  | 'expanding_year'    // Opening the year's issue list
  | 'selecting_issue'   // Clicking the issue link
  | 'waiting'           // Polling for article rows
  | 'extracting'        // Reading article rows
  | 'enriching'         // Fetching detail pages
  | 'issue_complete'    // One issue finished
  | 'issue_failed'      // One issue failed and was recorded empty
  | 'complete';         // Whole crawl finished

/**
 * Progress event emitted during a crawl
 */
export interface CrawlProgressEvent {
  /** Current stage of the crawl */
  stage: CrawlProgressStage;

  /** Human-readable description of current activity */
  message: string;

  /** Issue being processed, when the stage is issue-scoped */
  issue?: number;

  /** 1-based position of the issue in the crawl */
  index?: number;

  /** Number of issues in the crawl */
  total?: number;

  /** Articles found so far for the issue */
  articleCount?: number;

  /** Elapsed time in milliseconds since the crawl started */
  elapsedMs: number;
}

/**
 * Callback function for receiving progress events
 */
export type OnCrawlProgress = (event: CrawlProgressEvent) => void;

/**
 * Helper to create progress events with consistent structure
 */
export function createProgressEvent(
  stage: CrawlProgressStage,
  message: string,
  startTime: number,
  details: Omit<CrawlProgressEvent, 'stage' | 'message' | 'elapsedMs'> = {}
): CrawlProgressEvent {
  return {
    stage,
    message,
    ...details,
    elapsedMs: Date.now() - startTime,
  };
}
