/**
 * Paper Detail Fetcher
 *
 * Default DetailFetcher: opens an article's detail page and reads abstract,
 * keywords, DOI, fund and authors from the rendered HTML.
 */

import * as cheerio from 'cheerio';
import type { CrawlPage } from './crawl-page.js';
import type { DetailFetcher } from './detail-enricher.js';
import type { PaperDetail } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';

const log = logger.detail;

const ABSTRACT_SELECTORS = ['#ChDivSummary', '.abstract-text', '.abstract'];
const KEYWORD_SELECTORS = ['.keywords a', 'p.keywords a'];
const AUTHOR_SELECTORS = ['h3.author a', '#authorpart a'];
const DOI_LABEL = /DOI/i;
const FUND_LABEL = /基金|fund/i;

export interface PaperDetailFetcherOptions {
  timeout?: number;
  /** Pause after DOMContentLoaded before reading the page */
  settleMs?: number;
}

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function stripSeparators(text: string): string {
  return text.replace(/[;；,，\s]+$/u, '').trim();
}

function firstText($: cheerio.CheerioAPI, selectors: string[]): string {
  for (const selector of selectors) {
    const text = clean($(selector).first().text());
    if (text) {
      return text;
    }
  }
  return '';
}

function joinedTexts(
  $: cheerio.CheerioAPI,
  selectors: string[],
  normalize: (text: string) => string
): string {
  for (const selector of selectors) {
    const values = $(selector)
      .toArray()
      .map((el) => normalize(clean($(el).text())))
      .filter(Boolean);
    if (values.length > 0) {
      return values.join('; ');
    }
  }
  return '';
}

/**
 * Values of the labelled rows (`<span class="rowtit">DOI：</span><p>...</p>`).
 */
function labelledValue($: cheerio.CheerioAPI, label: RegExp): string {
  for (const el of $('span.rowtit').toArray()) {
    const title = $(el);
    if (!label.test(title.text())) {
      continue;
    }
    const sibling = clean(title.siblings('p').first().text());
    if (sibling) {
      return stripSeparators(sibling);
    }
    const parentText = clean(title.parent().text()).replace(clean(title.text()), '');
    return stripSeparators(parentText);
  }
  return '';
}

/**
 * Parse a rendered detail page.
 *
 * @returns null when the page carries none of the detail fields
 */
export function parseDetailHtml(html: string): PaperDetail | null {
  const $ = cheerio.load(html);

  const detail: PaperDetail = {
    abstract: firstText($, ABSTRACT_SELECTORS),
    keywords: joinedTexts($, KEYWORD_SELECTORS, stripSeparators),
    doi: labelledValue($, DOI_LABEL),
    fund: labelledValue($, FUND_LABEL) || stripSeparators(clean($('.funds').first().text())),
    // Author links carry affiliation markers ("Li Hua1,2")
    authors: joinedTexts($, AUTHOR_SELECTORS, (text) => text.replace(/[\d,]+$/, '').trim()),
  };

  const found = Object.values(detail).some((value) => value.length > 0);
  return found ? detail : null;
}

export class PaperDetailFetcher implements DetailFetcher {
  private readonly timeout: number;
  private readonly settleMs: number;

  constructor(options: PaperDetailFetcherOptions = {}) {
    this.timeout = getTimeout('PAGE_LOAD', options.timeout);
    this.settleMs = getTimeout('DETAIL_SETTLE', options.settleMs);
  }

  async fetchDetail(page: CrawlPage, url: string): Promise<PaperDetail | null> {
    const startTime = Date.now();
    await page.goto(url, { timeout: this.timeout, waitUntil: 'domcontentloaded' });
    if (this.settleMs > 0) {
      await page.pause(this.settleMs);
    }

    const detail = parseDetailHtml(await page.content());
    if (detail) {
      log.timed('Parsed detail page', startTime, { url });
    } else {
      log.warn('Detail page has no recognizable fields', { url });
    }
    return detail;
  }
}
