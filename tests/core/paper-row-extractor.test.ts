import { describe, it, expect } from 'vitest';
import {
  extractPapers,
  initialAbstract,
  resolveLink,
} from '../../src/core/paper-row-extractor.js';
import { CrawlAbortedError } from '../../src/core/errors.js';
import { articleRow, FakeElement, FakePage } from '../helpers/fake-page.js';

const PAGE_URL = 'https://navi.example.org/journals/ABCD/detail';

describe('extractPapers', () => {
  it('should read title, link, author and pages of each row', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: {
        'dd.row': [
          articleRow({
            title: '  Soil moisture under drip irrigation ',
            href: 'https://navi.example.org/detail?id=1',
            author: 'Li Hua; Wang Fang',
            pages: ' 1-9 ',
          }),
        ],
      },
    });

    const papers = await extractPapers(page, { year: 2025, issue: 3, getDetails: false });

    expect(papers).toEqual([
      {
        year: 2025,
        issue: 3,
        title: 'Soil moisture under drip irrigation',
        author: 'Li Hua; Wang Fang',
        pages: '1-9',
        abstractUrl: 'https://navi.example.org/detail?id=1',
        abstract: { kind: 'not-requested' },
      },
    ]);
  });

  it('should leave a missing author empty and keep the rest of the row', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: {
        'dd.row': [articleRow({ title: 'Editorial', href: '/detail?id=2', pages: '10' })],
      },
    });

    const [paper] = await extractPapers(page, { year: 2025, issue: 3, getDetails: false });

    expect(paper.author).toBe('');
    expect(paper.title).toBe('Editorial');
    expect(paper.pages).toBe('10');
  });

  it('should leave title and link empty when the row has no title link', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: { 'dd.row': [articleRow({ author: 'Anon' })] },
    });

    const [paper] = await extractPapers(page, { year: 2025, issue: 1, getDetails: true });

    expect(paper.title).toBe('');
    expect(paper.abstractUrl).toBe('');
    expect(paper.author).toBe('Anon');
  });

  it('should resolve relative links against the page URL', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: { 'dd.row': [articleRow({ title: 'A', href: '/kcms/detail?id=7' })] },
    });

    const [paper] = await extractPapers(page, { year: 2025, issue: 1, getDetails: true });

    expect(paper.abstractUrl).toBe('https://navi.example.org/kcms/detail?id=7');
  });

  it('should skip a failing row and keep the rows after it', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: {
        'dd.row': [
          articleRow({ title: 'First', href: '/a' }),
          new FakeElement({ failWith: new Error('element is detached') }),
          articleRow({ title: 'Third', href: '/c' }),
        ],
      },
    });

    const papers = await extractPapers(page, { year: 2025, issue: 2, getDetails: false });

    expect(papers.map((p) => p.title)).toEqual(['First', 'Third']);
  });

  it('should stop instead of skipping rows once the signal has fired', async () => {
    const controller = new AbortController();
    const closed = new Error('browser has been closed');
    const page = new FakePage({
      url: PAGE_URL,
      elements: {
        'dd.row': [
          new FakeElement({ onLocate: () => controller.abort(), failWith: closed }),
          articleRow({ title: 'Never read', href: '/detail?id=2', author: 'Li Hua', pages: '1-2' }),
        ],
      },
    });

    await expect(
      extractPapers(page, { year: 2025, issue: 1, getDetails: false, signal: controller.signal })
    ).rejects.toThrow(CrawlAbortedError);
  });

  it('should start abstracts as pending when details are requested', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: {
        'dd.row': [articleRow({ title: 'A', href: '/a' }), articleRow({ title: 'B', href: '/b' })],
      },
    });

    const papers = await extractPapers(page, { year: 2025, issue: 2, getDetails: true });

    expect(papers.map((p) => p.abstract)).toEqual([{ kind: 'pending' }, { kind: 'pending' }]);
  });

  it('should mark every abstract as not requested when details are off', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: {
        'dd.row': [articleRow({ title: 'A', href: '/a' }), articleRow({ title: 'B' })],
      },
    });

    const papers = await extractPapers(page, { year: 2025, issue: 2, getDetails: false });

    for (const paper of papers) {
      expect(paper.abstract).toEqual({ kind: 'not-requested' });
    }
  });

  it('should keep document order and duplicates', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      elements: {
        'dd.row': [
          articleRow({ title: 'Zeta' }),
          articleRow({ title: 'Alpha' }),
          articleRow({ title: 'Zeta' }),
        ],
      },
    });

    const papers = await extractPapers(page, { year: 2025, issue: 4, getDetails: false });

    expect(papers.map((p) => p.title)).toEqual(['Zeta', 'Alpha', 'Zeta']);
  });

  it('should return an empty list when the page has no rows', async () => {
    const page = new FakePage({ url: PAGE_URL });

    await expect(extractPapers(page, { year: 2025, issue: 4, getDetails: false })).resolves.toEqual([]);
  });
});

describe('initialAbstract', () => {
  it('should distinguish not requested from pending', () => {
    expect(initialAbstract(false)).toEqual({ kind: 'not-requested' });
    expect(initialAbstract(true)).toEqual({ kind: 'pending' });
  });
});

describe('resolveLink', () => {
  it('should keep an absolute link', () => {
    expect(resolveLink('https://a.example/x', PAGE_URL)).toBe('https://a.example/x');
  });

  it('should keep a relative link when there is no base', () => {
    expect(resolveLink('/x?id=1', undefined)).toBe('/x?id=1');
  });

  it('should return an empty string for an empty link', () => {
    expect(resolveLink('', PAGE_URL)).toBe('');
  });
});
