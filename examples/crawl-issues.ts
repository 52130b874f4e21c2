/**
 * Crawl Issues Example
 *
 * Crawls three issues of one year with details and prints a short summary
 * per issue. Issues that fail to load show up with no articles.
 *
 * Run with: npx tsx examples/crawl-issues.ts <journal-url> [year]
 */

import { IssueCrawler, saveResults, type CrawlProgressEvent } from '../src/index.js';

function printProgress(event: CrawlProgressEvent): void {
  if (event.stage === 'issue_complete' || event.stage === 'issue_failed') {
    console.log(`  [${event.index}/${event.total}] ${event.message}`);
  }
}

async function crawlIssues(url: string, year: number) {
  console.log(`\n${'='.repeat(60)}`);
  console.log(`Crawling ${url} (${year}, issues 1-3)`);
  console.log('='.repeat(60));

  const crawler = new IssueCrawler({
    url,
    year,
    issues: '1-3',
    getDetails: true,
    onProgress: printProgress,
  });

  const session = await crawler.runAll();

  for (const [issue, records] of session.byIssue) {
    const fetched = records.filter((r) => r.abstract.kind === 'fetched').length;
    console.log(`Issue ${issue}: ${records.length} articles, ${fetched} abstracts`);
  }

  const path = await saveResults(session.records, `results-${year}.json`);
  console.log(`\nSaved to ${path}`);
}

const [url, year] = process.argv.slice(2);
if (!url) {
  console.error('Usage: npx tsx examples/crawl-issues.ts <journal-url> [year]');
  process.exit(1);
}

crawlIssues(url, Number(year ?? new Date().getFullYear())).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
