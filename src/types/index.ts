/**
 * Core types for the journal issue crawler
 */

export * from './progress.js';

/**
 * Where an article's abstract stands.
 *
 * `not-requested` and `pending` must stay distinct: consumers use them to
 * tell "details were never asked for" from "asked for, nothing yet".
 */
export type AbstractState =
  | { kind: 'not-requested' }
  | { kind: 'pending' }
  | { kind: 'fetched'; text: string }
  | { kind: 'failed'; reason?: string };

/**
 * One article row of an issue listing.
 */
export interface ArticleRecord {
  year: number;
  issue: number;
  title: string;
  author: string;
  pages: string;
  /** Empty when the row carried no link; enrichment is then impossible */
  abstractUrl: string;
  abstract: AbstractState;
  /** Set only after a successful detail fetch */
  keywords?: string;
  doi?: string;
  fund?: string;
  authorsDetail?: string;
}

/**
 * Fields read from an article's detail page.
 */
export interface PaperDetail {
  abstract: string;
  keywords: string;
  doi: string;
  fund: string;
  authors: string;
}

/**
 * JSON shape written to the results file. Field names are stable.
 */
export interface SerializedArticle {
  year: number;
  issue: number;
  title: string;
  author: string;
  pages: string;
  abstract_url: string;
  abstract: string | null;
  keywords?: string;
  doi?: string;
  fund?: string;
  authors_detail?: string;
}
