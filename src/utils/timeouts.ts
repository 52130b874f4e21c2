/**
 * Central Timeout Configuration
 *
 * All timeout and settle-delay values are imported from this module so the
 * crawl pipeline and its tests agree on them.
 *
 * Timeout categories:
 * - PAGE_LOAD: navigation to the journal page and to detail pages
 * - *_SETTLE: pauses after a click while client-side rendering catches up
 * - CONTENT_POLL: interval between article-row polls
 * - DETAIL_DELAY: polite pause between detail-page fetches
 */

export const TIMEOUTS = {
  /**
   * Full page load timeout (navigation, detail pages)
   */
  PAGE_LOAD: 30000,

  /**
   * Wait after clicking a year header
   */
  YEAR_SETTLE: 500,

  /**
   * Wait after clicking an issue link
   */
  ISSUE_SETTLE: 1000,

  /**
   * Interval between article-row count checks
   */
  CONTENT_POLL: 1000,

  /**
   * Number of article-row polls before giving up
   */
  CONTENT_POLL_ATTEMPTS: 10,

  /**
   * Pause between two detail-page fetches
   */
  DETAIL_DELAY: 300,

  /**
   * Wait after a detail page reports DOMContentLoaded
   */
  DETAIL_SETTLE: 500,
} as const;

export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 */
export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
