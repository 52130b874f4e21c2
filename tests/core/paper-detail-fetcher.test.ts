import { describe, it, expect } from 'vitest';
import { PaperDetailFetcher, parseDetailHtml } from '../../src/core/paper-detail-fetcher.js';
import { FakePage } from '../helpers/fake-page.js';

const DETAIL_HTML = `
<html><body>
  <h1>Soil moisture under drip irrigation</h1>
  <h3 class="author"><a>Li Hua1,2</a><a>Wang Fang3</a></h3>
  <div id="ChDivSummary">  This paper studies
     soil. </div>
  <p class="keywords"><a>soil;</a><a> irrigation ；</a></p>
  <div class="row"><span class="rowtit">DOI：</span><p>10.1000/abc.2025.01</p></div>
  <div class="row"><span class="rowtit">基金资助：</span><p>National Fund (No. 1);</p></div>
</body></html>`;

describe('parseDetailHtml', () => {
  it('should read every detail field', () => {
    expect(parseDetailHtml(DETAIL_HTML)).toEqual({
      abstract: 'This paper studies soil.',
      keywords: 'soil; irrigation',
      doi: '10.1000/abc.2025.01',
      fund: 'National Fund (No. 1)',
      authors: 'Li Hua; Wang Fang',
    });
  });

  it('should fall back to other abstract containers', () => {
    const detail = parseDetailHtml('<div class="abstract-text">Short summary</div>');

    expect(detail?.abstract).toBe('Short summary');
    expect(detail?.keywords).toBe('');
  });

  it('should read a labelled value from the parent row when there is no paragraph', () => {
    const detail = parseDetailHtml('<div><span class="rowtit">DOI:</span>10.1000/xyz</div>');

    expect(detail?.doi).toBe('10.1000/xyz');
  });

  it('should fall back to the funds block', () => {
    const detail = parseDetailHtml('<p class="funds">Fund B；</p>');

    expect(detail?.fund).toBe('Fund B');
  });

  it('should read authors from the author part', () => {
    const detail = parseDetailHtml('<div id="authorpart"><a>Zhao Lei1</a></div>');

    expect(detail?.authors).toBe('Zhao Lei');
  });

  it('should return null for a page without detail fields', () => {
    expect(parseDetailHtml('<html><body><p>Access denied</p></body></html>')).toBeNull();
  });
});

describe('PaperDetailFetcher', () => {
  it('should load the page, settle and parse its content', async () => {
    const page = new FakePage({ html: DETAIL_HTML });
    const fetcher = new PaperDetailFetcher({ timeout: 5000 });

    const detail = await fetcher.fetchDetail(page, 'https://x.example/detail?id=1');

    expect(page.gotoCalls).toEqual([
      { url: 'https://x.example/detail?id=1', options: { timeout: 5000, waitUntil: 'domcontentloaded' } },
    ]);
    expect(page.pauses).toEqual([500]);
    expect(detail?.doi).toBe('10.1000/abc.2025.01');
  });

  it('should not pause when the settle time is zero', async () => {
    const page = new FakePage({ html: '<p>nothing</p>' });
    const fetcher = new PaperDetailFetcher({ settleMs: 0 });

    await expect(fetcher.fetchDetail(page, 'https://x.example/d')).resolves.toBeNull();
    expect(page.pauses).toEqual([]);
    expect(page.gotoCalls[0].options.timeout).toBe(30000);
  });

  it('should propagate navigation errors', async () => {
    const page = new FakePage({ gotoError: new Error('net::ERR_NAME_NOT_RESOLVED') });
    const fetcher = new PaperDetailFetcher({ settleMs: 0 });

    await expect(fetcher.fetchDetail(page, 'https://x.example/d')).rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
  });
});
