/**
 * Result output: JSON file and console summary.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { AbstractState, ArticleRecord, SerializedArticle } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.create('ResultsWriter');

const ABSTRACT_PREVIEW_LENGTH = 200;

/**
 * Wire value of an abstract state: null when never requested, "" while
 * pending, the text once fetched, "failed[: reason]" on failure.
 */
export function abstractValue(state: AbstractState): string | null {
  switch (state.kind) {
    case 'not-requested':
      return null;
    case 'pending':
      return '';
    case 'fetched':
      return state.text;
    case 'failed':
      return state.reason ? `failed: ${state.reason}` : 'failed';
  }
}

export function toSerializable(record: ArticleRecord): SerializedArticle {
  const serialized: SerializedArticle = {
    year: record.year,
    issue: record.issue,
    title: record.title,
    author: record.author,
    pages: record.pages,
    abstract_url: record.abstractUrl,
    abstract: abstractValue(record.abstract),
  };

  if (record.keywords !== undefined) serialized.keywords = record.keywords;
  if (record.doi !== undefined) serialized.doi = record.doi;
  if (record.fund !== undefined) serialized.fund = record.fund;
  if (record.authorsDetail !== undefined) serialized.authors_detail = record.authorsDetail;

  return serialized;
}

/**
 * Write records as pretty-printed UTF-8 JSON.
 *
 * @returns the absolute path written
 */
export async function saveResults(records: readonly ArticleRecord[], filePath: string): Promise<string> {
  const outputPath = resolve(filePath);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${JSON.stringify(records.map(toSerializable), null, 2)}\n`, 'utf-8');
  log.info('Results saved', { path: outputPath, articleCount: records.length });
  return outputPath;
}

/**
 * Human-readable listing of the records, one block per article.
 */
export function formatResults(records: readonly ArticleRecord[]): string {
  const blocks = records.map((record, i) => {
    const lines = [
      `[${i + 1}] ${record.title}`,
      `    Year: ${record.year}`,
      `    Issue: ${record.issue}`,
      `    Author: ${record.author}`,
      `    Pages: ${record.pages}`,
    ];

    const abstract = abstractValue(record.abstract);
    if (abstract) {
      const preview = abstract.length > ABSTRACT_PREVIEW_LENGTH
        ? `${abstract.slice(0, ABSTRACT_PREVIEW_LENGTH)}...`
        : abstract;
      lines.push(`    Abstract: ${preview}`);
    }
    if (record.keywords) {
      lines.push(`    Keywords: ${record.keywords}`);
    }

    return lines.join('\n');
  });

  return blocks.join('\n\n');
}
