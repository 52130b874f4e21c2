/**
 * Error classes raised by the crawl pipeline.
 *
 * Only the issue-spec errors, navigation failures and aborts ever leave
 * the crawler. Selector misses, row failures, per-issue failures and
 * detail failures are recovered where they happen.
 */

import { playwrightNotInstalledError } from '../utils/error-messages.js';

export class IssueSpecError extends Error {
  constructor(
    message: string,
    public readonly token: string
  ) {
    super(message);
    this.name = 'IssueSpecError';
  }
}

/**
 * A token of the issue specification is not a number or a well-formed range.
 */
export class IssueSpecFormatError extends IssueSpecError {
  constructor(message: string, token: string) {
    super(message, token);
    this.name = 'IssueSpecFormatError';
  }
}

/**
 * An issue number falls outside 1..12, or a range runs backwards.
 */
export class IssueSpecRangeError extends IssueSpecError {
  constructor(
    message: string,
    token: string,
    public readonly value?: number
  ) {
    super(message, token);
    this.name = 'IssueSpecRangeError';
  }
}

export class CrawlAbortedError extends Error {
  constructor(message = 'Crawl aborted by operator') {
    super(message);
    this.name = 'CrawlAbortedError';
  }
}

export class BrowserUnavailableError extends Error {
  constructor(reason?: string) {
    super(playwrightNotInstalledError(reason));
    this.name = 'BrowserUnavailableError';
  }
}

/**
 * Throw a CrawlAbortedError when the signal has fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CrawlAbortedError();
  }
}
