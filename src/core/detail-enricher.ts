/**
 * Detail Enricher
 *
 * Visits each article's detail page on a borrowed page of the session and
 * copies abstract, keywords, DOI, fund and author details onto the record.
 * Failures are written into the record's abstract state; the next article
 * is still enriched.
 */

import { isTimeoutError, type BrowserSession, type CrawlPage } from './crawl-page.js';
import { CrawlAbortedError, throwIfAborted } from './errors.js';
import type { ArticleRecord, PaperDetail } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { delay, TIMEOUTS } from '../utils/timeouts.js';

const log = logger.enricher;

export interface DetailFetcher {
  fetchDetail(page: CrawlPage, url: string): Promise<PaperDetail | null>;
}

export interface EnrichOptions {
  fetcher: DetailFetcher;
  /** Default timeout of the borrowed detail page */
  timeout?: number;
  /** Pause between two fetches */
  delayMs?: number;
  signal?: AbortSignal;
}

export interface EnrichSummary {
  fetched: number;
  failed: number;
  skipped: number;
}

export function applyDetail(record: ArticleRecord, detail: PaperDetail): void {
  record.abstract = { kind: 'fetched', text: detail.abstract };
  record.keywords = detail.keywords;
  record.doi = detail.doi;
  record.fund = detail.fund;
  record.authorsDetail = detail.authors;
}

function shortTitle(record: ArticleRecord): string {
  return record.title.length > 30 ? `${record.title.slice(0, 30)}...` : record.title;
}

/**
 * Enrich `records` in place, one detail page at a time.
 */
export async function enrichPapers(
  session: Pick<BrowserSession, 'newPage'>,
  records: ArticleRecord[],
  options: EnrichOptions
): Promise<EnrichSummary> {
  const summary: EnrichSummary = { fetched: 0, failed: 0, skipped: 0 };
  const delayMs = options.delayMs ?? TIMEOUTS.DETAIL_DELAY;
  const total = records.length;
  let visited = 0;

  log.info('Fetching article details', { count: total });

  for (const [index, record] of records.entries()) {
    const position = `${index + 1}/${total}`;
    throwIfAborted(options.signal);

    if (!record.abstractUrl) {
      log.info(`[${position}] Skipped: no detail link`, { title: shortTitle(record) });
      summary.skipped++;
      continue;
    }

    if (visited > 0 && delayMs > 0) {
      await delay(delayMs);
    }
    visited++;

    let detailPage: CrawlPage | null = null;
    try {
      log.info(`[${position}] Fetching`, { title: shortTitle(record) });
      detailPage = await session.newPage({ timeout: options.timeout });

      const detail = await options.fetcher.fetchDetail(detailPage, record.abstractUrl);
      if (detail) {
        applyDetail(record, detail);
        summary.fetched++;
      } else {
        record.abstract = { kind: 'failed' };
        summary.failed++;
      }
    } catch (error) {
      if (error instanceof CrawlAbortedError || options.signal?.aborted) {
        throw error instanceof CrawlAbortedError ? error : new CrawlAbortedError();
      }

      if (isTimeoutError(error)) {
        log.warn(`[${position}] Timed out`, { url: record.abstractUrl });
        record.abstract = { kind: 'failed', reason: 'timeout' };
      } else {
        const message = error instanceof Error ? error.message : String(error);
        log.warn(`[${position}] Failed`, { url: record.abstractUrl, error: message });
        record.abstract = { kind: 'failed', reason: message };
      }
      summary.failed++;
    } finally {
      if (detailPage) {
        await detailPage.close().catch((error: unknown) => {
          log.debug('Failed to close detail page', { error: String(error) });
        });
      }
    }
  }

  log.info('Article details done', { ...summary });
  return summary;
}
