import { describe, it, expect } from 'vitest';
import { applyDetail, enrichPapers, type DetailFetcher } from '../../src/core/detail-enricher.js';
import type { CrawlPage } from '../../src/core/crawl-page.js';
import { CrawlAbortedError } from '../../src/core/errors.js';
import type { ArticleRecord, PaperDetail } from '../../src/types/index.js';
import { FakeBrowserSession, FakePage, PageTimeoutError } from '../helpers/fake-page.js';

function record(title: string, abstractUrl: string): ArticleRecord {
  return {
    year: 2025,
    issue: 1,
    title,
    author: 'Author',
    pages: '1-2',
    abstractUrl,
    abstract: { kind: 'pending' },
  };
}

function detail(abstract: string): PaperDetail {
  return { abstract, keywords: 'k1; k2', doi: '10.1000/test.1', fund: 'Fund A', authors: 'Li Hua' };
}

/**
 * Fetcher answering per URL: a detail, null, or an error to throw.
 */
class ScriptedFetcher implements DetailFetcher {
  readonly visited: string[] = [];

  constructor(private readonly answers: Record<string, PaperDetail | null | Error>) {}

  async fetchDetail(_page: CrawlPage, url: string): Promise<PaperDetail | null> {
    this.visited.push(url);
    const answer = this.answers[url];
    if (answer instanceof Error) {
      throw answer;
    }
    return answer ?? null;
  }
}

describe('enrichPapers', () => {
  it('should copy the fetched fields onto each record', async () => {
    const session = new FakeBrowserSession(new FakePage());
    const records = [record('A', 'https://x.example/a')];
    const fetcher = new ScriptedFetcher({ 'https://x.example/a': detail('About A') });

    const summary = await enrichPapers(session, records, { fetcher, delayMs: 0 });

    expect(summary).toEqual({ fetched: 1, failed: 0, skipped: 0 });
    expect(records[0]).toMatchObject({
      abstract: { kind: 'fetched', text: 'About A' },
      keywords: 'k1; k2',
      doi: '10.1000/test.1',
      fund: 'Fund A',
      authorsDetail: 'Li Hua',
    });
  });

  it('should mark a timed out record and keep enriching the others', async () => {
    const session = new FakeBrowserSession(new FakePage());
    const records = [
      record('A', 'https://x.example/a'),
      record('B', 'https://x.example/b'),
      record('C', 'https://x.example/c'),
    ];
    const fetcher = new ScriptedFetcher({
      'https://x.example/a': detail('About A'),
      'https://x.example/b': new PageTimeoutError('Timeout 30000ms exceeded'),
      'https://x.example/c': detail('About C'),
    });

    const summary = await enrichPapers(session, records, { fetcher, delayMs: 0 });

    expect(summary).toEqual({ fetched: 2, failed: 1, skipped: 0 });
    expect(records.map((r) => r.abstract)).toEqual([
      { kind: 'fetched', text: 'About A' },
      { kind: 'failed', reason: 'timeout' },
      { kind: 'fetched', text: 'About C' },
    ]);
  });

  it('should record the message of any other error', async () => {
    const session = new FakeBrowserSession(new FakePage());
    const records = [record('A', 'https://x.example/a')];
    const fetcher = new ScriptedFetcher({ 'https://x.example/a': new Error('net::ERR_CONNECTION_RESET') });

    await enrichPapers(session, records, { fetcher, delayMs: 0 });

    expect(records[0].abstract).toEqual({ kind: 'failed', reason: 'net::ERR_CONNECTION_RESET' });
    expect(records[0].keywords).toBeUndefined();
  });

  it('should mark a record failed when the page has no detail fields', async () => {
    const session = new FakeBrowserSession(new FakePage());
    const records = [record('A', 'https://x.example/a')];
    const fetcher = new ScriptedFetcher({ 'https://x.example/a': null });

    const summary = await enrichPapers(session, records, { fetcher, delayMs: 0 });

    expect(summary.failed).toBe(1);
    expect(records[0].abstract).toEqual({ kind: 'failed' });
  });

  it('should skip records without a detail link', async () => {
    const session = new FakeBrowserSession(new FakePage());
    const records = [record('No link', ''), record('B', 'https://x.example/b')];
    const fetcher = new ScriptedFetcher({ 'https://x.example/b': detail('About B') });

    const summary = await enrichPapers(session, records, { fetcher, delayMs: 0 });

    expect(summary).toEqual({ fetched: 1, failed: 0, skipped: 1 });
    expect(records[0].abstract).toEqual({ kind: 'pending' });
    expect(fetcher.visited).toEqual(['https://x.example/b']);
    expect(session.detailPages).toHaveLength(1);
  });

  it('should close every borrowed page, including after failures', async () => {
    const session = new FakeBrowserSession(new FakePage());
    const records = [record('A', 'https://x.example/a'), record('B', 'https://x.example/b')];
    const fetcher = new ScriptedFetcher({
      'https://x.example/a': new Error('boom'),
      'https://x.example/b': detail('About B'),
    });

    await enrichPapers(session, records, { fetcher, delayMs: 0 });

    expect(session.detailPages).toHaveLength(2);
    expect(session.detailPages.every((page) => page.closed)).toBe(true);
    expect(session.page.closed).toBe(false);
  });

  it('should stop with CrawlAbortedError once the signal fires', async () => {
    const controller = new AbortController();
    const session = new FakeBrowserSession(new FakePage());
    const records = [record('A', 'https://x.example/a'), record('B', 'https://x.example/b')];
    const fetcher: DetailFetcher = {
      fetchDetail: async () => {
        controller.abort();
        return detail('About A');
      },
    };

    await expect(
      enrichPapers(session, records, { fetcher, delayMs: 0, signal: controller.signal })
    ).rejects.toThrow(CrawlAbortedError);
    expect(records[0].abstract).toEqual({ kind: 'fetched', text: 'About A' });
    expect(records[1].abstract).toEqual({ kind: 'pending' });
  });

  it('should turn an error raised during abort into CrawlAbortedError', async () => {
    const controller = new AbortController();
    const session = new FakeBrowserSession(new FakePage());
    const records = [record('A', 'https://x.example/a')];
    const fetcher: DetailFetcher = {
      fetchDetail: async () => {
        controller.abort();
        throw new Error('Target page, context or browser has been closed');
      },
    };

    await expect(
      enrichPapers(session, records, { fetcher, delayMs: 0, signal: controller.signal })
    ).rejects.toThrow(CrawlAbortedError);
  });
});

describe('applyDetail', () => {
  it('should store the authors under authorsDetail', () => {
    const target = record('A', 'https://x.example/a');

    applyDetail(target, detail(''));

    expect(target.abstract).toEqual({ kind: 'fetched', text: '' });
    expect(target.authorsDetail).toBe('Li Hua');
    expect(target.author).toBe('Author');
  });
});
