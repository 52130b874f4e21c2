/**
 * Reads article rows of the currently displayed issue.
 *
 * Each field is read on its own: a row without an author cell still
 * yields its title and pages. A row that fails outright is skipped and
 * logged; the rest of the listing is still returned.
 */

import type { CrawlPage, PageElement } from './crawl-page.js';
import { throwIfAborted } from './errors.js';
import { resolveLayout, type PageLayout } from './page-layout.js';
import type { AbstractState, ArticleRecord } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.extractor;

export interface ExtractOptions {
  year: number;
  issue: number;
  /** Whether details will be fetched later; decides the initial abstract state */
  getDetails: boolean;
  layout?: Partial<PageLayout>;
  /** Base for relative article links; defaults to the page URL */
  baseUrl?: string;
  /** Once aborted, a failing row ends the extraction instead of being skipped */
  signal?: AbortSignal;
}

export function initialAbstract(getDetails: boolean): AbstractState {
  return getDetails ? { kind: 'pending' } : { kind: 'not-requested' };
}

/**
 * Resolve `href` against `base`, keeping it untouched when either does not parse.
 */
export function resolveLink(href: string, base: string | undefined): string {
  if (!href) {
    return '';
  }
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

async function readText(row: PageElement, selector: string): Promise<string> {
  const [cell] = await row.locateAll(selector);
  if (!cell) {
    return '';
  }
  return (await cell.innerText()).trim();
}

async function readTitleLink(
  row: PageElement,
  selector: string
): Promise<{ title: string; href: string }> {
  const [link] = await row.locateAll(selector);
  if (!link) {
    return { title: '', href: '' };
  }
  const title = (await link.innerText()).trim();
  const href = ((await link.getAttribute('href')) ?? '').trim();
  return { title, href };
}

async function extractRow(
  row: PageElement,
  layout: PageLayout,
  options: ExtractOptions,
  baseUrl: string | undefined
): Promise<ArticleRecord> {
  const { title, href } = await readTitleLink(row, layout.title);
  const author = await readText(row, layout.author);
  const pages = await readText(row, layout.pages);

  return {
    year: options.year,
    issue: options.issue,
    title,
    author,
    pages,
    abstractUrl: resolveLink(href, baseUrl),
    abstract: initialAbstract(options.getDetails),
  };
}

/**
 * Extract every article row on the page, in document order.
 */
export async function extractPapers(
  page: CrawlPage,
  options: ExtractOptions
): Promise<ArticleRecord[]> {
  const layout = resolveLayout(options.layout);
  const baseUrl = options.baseUrl ?? (page.url() || undefined);
  const rows = await page.locateAll(layout.row);
  const papers: ArticleRecord[] = [];

  log.info('Extracting article rows', { issue: options.issue, rows: rows.length });

  for (const [index, row] of rows.entries()) {
    try {
      papers.push(await extractRow(row, layout, options, baseUrl));
    } catch (error) {
      throwIfAborted(options.signal);
      log.warn(`Skipping row ${index + 1}/${rows.length}`, {
        issue: options.issue,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  log.info('Extracted articles', { issue: options.issue, count: papers.length });
  return papers;
}
