/**
 * Selector Strategies
 *
 * Locates and clicks one control on a page whose markup varies between
 * visits. Each target (a year header, an issue link) has an ordered list
 * of strategies from most to least specific; the first one that finds an
 * element wins. A strategy that throws counts as a miss and the next one
 * runs, unless the caller's signal has been aborted.
 *
 * Nothing here throws for a missing control. Callers get a
 * SelectionOutcome and decide what absence means at their level; the
 * crawler carries on with whatever the page already shows.
 */

import type { CrawlPage, PageElement } from './crawl-page.js';
import {
  hasIssueLabel,
  issueIdentifier,
  issueLabel,
  padIssue,
  resolveLayout,
  type PageLayout,
} from './page-layout.js';
import { throwIfAborted } from './errors.js';
import { logger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';

const log = logger.selector;

export interface SelectorStrategy {
  name: string;
  find(page: CrawlPage): Promise<PageElement | null>;
}

export interface StrategyAttempt {
  strategy: string;
  /** Set when the strategy threw instead of returning no match */
  error?: string;
}

export type SelectionOutcome =
  | { status: 'activated'; strategy: string; attempts: StrategyAttempt[] }
  | { status: 'not-found'; attempts: StrategyAttempt[] };

export interface SelectionOptions {
  layout?: Partial<PageLayout>;
  /** Pause after the click so client-side rendering can settle */
  settleMs?: number;
  /** Once aborted, a failing strategy rethrows instead of counting as a miss */
  signal?: AbortSignal;
}

export interface WaitForContentOptions {
  layout?: Partial<PageLayout>;
  maxAttempts?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

async function firstElement(page: CrawlPage, selector: string): Promise<PageElement | null> {
  const [element] = await page.locateAll(selector);
  return element ?? null;
}

async function firstWithText(
  elements: PageElement[],
  matches: (text: string) => boolean
): Promise<PageElement | null> {
  for (const element of elements) {
    const text = await element.innerText();
    if (matches(text)) {
      return element;
    }
  }
  return null;
}

/**
 * Try each strategy in order and click the first element found.
 */
export async function runStrategies(
  page: CrawlPage,
  strategies: readonly SelectorStrategy[],
  settleMs: number,
  signal?: AbortSignal
): Promise<SelectionOutcome> {
  const attempts: StrategyAttempt[] = [];

  for (const strategy of strategies) {
    try {
      const element = await strategy.find(page);
      if (!element) {
        attempts.push({ strategy: strategy.name });
        continue;
      }
      await element.click();
    } catch (error) {
      throwIfAborted(signal);
      const message = error instanceof Error ? error.message : String(error);
      log.debug('Selector strategy failed', { strategy: strategy.name, error: message });
      attempts.push({ strategy: strategy.name, error: message });
      continue;
    }

    // Already clicked: a failed pause must not fall through to the next strategy.
    try {
      await page.pause(settleMs);
    } catch (error) {
      throwIfAborted(signal);
      log.warn('Settle pause failed after click', { strategy: strategy.name, error: String(error) });
    }
    return { status: 'activated', strategy: strategy.name, attempts };
  }

  return { status: 'not-found', attempts };
}

// ============================================
// YEAR
// ============================================

export function yearStrategies(year: number, layout: PageLayout): SelectorStrategy[] {
  const label = String(year);

  return [
    {
      name: 'exact-text',
      find: (page) => firstElement(page, `${layout.yearHeader}:has-text("${label}")`),
    },
    {
      name: 'text-scan',
      find: async (page) =>
        firstWithText(await page.locateAll(layout.yearHeader), (text) => text.includes(label)),
    },
    {
      name: 'container-attribute',
      find: async (page) => {
        const [container] = await page.locateAll(`${layout.yearContainer}[id*="${label}"]`);
        if (!container) {
          return null;
        }
        const [header] = await container.locateAll(layout.yearHeader);
        return header ?? null;
      },
    },
  ];
}

/**
 * Expand the issue list of `year`.
 */
export async function expandYear(
  page: CrawlPage,
  year: number,
  options: SelectionOptions = {}
): Promise<SelectionOutcome> {
  const layout = resolveLayout(options.layout);
  const outcome = await runStrategies(
    page,
    yearStrategies(year, layout),
    getTimeout('YEAR_SETTLE', options.settleMs),
    options.signal
  );

  if (outcome.status === 'activated') {
    log.info('Expanded year', { year, strategy: outcome.strategy });
  } else {
    log.warn('Year not found, continuing with the issues already shown', {
      year,
      attempts: outcome.attempts,
    });
  }

  return outcome;
}

// ============================================
// ISSUE
// ============================================

export function issueStrategies(year: number, issue: number, layout: PageLayout): SelectorStrategy[] {
  const id = issueIdentifier(layout, year, issue);
  const padded = padIssue(issue);

  return [
    {
      name: 'identifier',
      find: (page) => firstElement(page, `#${id}`),
    },
    {
      name: 'label-scan',
      find: async (page) =>
        firstWithText(await page.locateAll(layout.issueLink), (text) => hasIssueLabel(text, issue)),
    },
    {
      name: 'fuzzy-identifier',
      find: async (page) => {
        for (const link of await page.locateAll(layout.issueLink)) {
          const linkId = (await link.getAttribute('id')) ?? '';
          if (!linkId.startsWith(`${layout.issueIdPrefix}${year}`)) {
            continue;
          }
          if (linkId.endsWith(padded) || hasIssueLabel(await link.innerText(), issue)) {
            return link;
          }
        }
        return null;
      },
    },
  ];
}

/**
 * Open issue `issue` of `year`.
 */
export async function selectIssue(
  page: CrawlPage,
  year: number,
  issue: number,
  options: SelectionOptions = {}
): Promise<SelectionOutcome> {
  const layout = resolveLayout(options.layout);
  log.debug('Selecting issue', { year, issue, id: issueIdentifier(layout, year, issue) });

  const outcome = await runStrategies(
    page,
    issueStrategies(year, issue, layout),
    getTimeout('ISSUE_SETTLE', options.settleMs),
    options.signal
  );

  if (outcome.status === 'activated') {
    log.info('Selected issue', { year, issue, strategy: outcome.strategy });
  } else {
    log.warn(`${issueLabel(issue)} not found, continuing with the issue already shown`, {
      year,
      issue,
      attempts: outcome.attempts,
    });
  }

  return outcome;
}

// ============================================
// CONTENT
// ============================================

/**
 * Poll for article rows until at least one shows up.
 *
 * @returns the last row count seen; 0 is an empty issue, not an error
 */
export async function waitForContent(
  page: CrawlPage,
  options: WaitForContentOptions = {}
): Promise<number> {
  const layout = resolveLayout(options.layout);
  const maxAttempts = getTimeout('CONTENT_POLL_ATTEMPTS', options.maxAttempts);
  const interval = getTimeout('CONTENT_POLL', options.pollIntervalMs);
  let count = 0;

  try {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      count = (await page.locateAll(layout.row)).length;
      if (count > 0) {
        log.info('Article rows loaded', { count, attempt });
        return count;
      }
      if (attempt < maxAttempts) {
        await page.pause(interval);
      }
    }
    log.warn('No article rows appeared', { maxAttempts });
  } catch (error) {
    throwIfAborted(options.signal);
    log.warn('Polling for article rows failed', { count, error: String(error) });
  }

  return count;
}
