/**
 * Issue specification parsing
 *
 * Turns the caller's issue selection into a strictly ascending list of
 * issue numbers between 1 and 12.
 *
 * Accepted forms:
 * - single:   "3"          -> [3]
 * - range:    "1-3"        -> [1, 2, 3]
 * - discrete: "1,5,7"      -> [1, 5, 7]
 * - mixed:    "1-3,5,7-9"  -> [1, 2, 3, 5, 7, 8, 9]
 */

import { IssueSpecFormatError, IssueSpecRangeError } from './errors.js';

export const MIN_ISSUE = 1;
export const MAX_ISSUE = 12;

const INTEGER_PATTERN = /^\+?\d+$/;

export type IssueInput = string | number | readonly number[];

function isValidIssue(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_ISSUE && value <= MAX_ISSUE;
}

function outOfRange(value: number, token: string): IssueSpecRangeError {
  return new IssueSpecRangeError(
    `Issue ${value} is out of range (${MIN_ISSUE}-${MAX_ISSUE})`,
    token,
    value
  );
}

function parseInteger(raw: string, token: string): number {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new IssueSpecFormatError(`"${trimmed}" is not an issue number`, token);
  }
  return Number.parseInt(trimmed, 10);
}

function parseRange(token: string): number[] {
  const parts = token.split('-');
  if (parts.length !== 2) {
    throw new IssueSpecFormatError(`Invalid range "${token}"`, token);
  }

  const start = parseInteger(parts[0], token);
  const end = parseInteger(parts[1], token);

  if (start > end) {
    throw new IssueSpecRangeError(`Range start is greater than its end: "${token}"`, token);
  }

  const values: number[] = [];
  for (let issue = start; issue <= end; issue++) {
    if (!isValidIssue(issue)) {
      throw outOfRange(issue, token);
    }
    values.push(issue);
  }
  return values;
}

/**
 * Parse an issue specification string.
 *
 * @throws IssueSpecFormatError for tokens that are not numbers or two-part ranges
 * @throws IssueSpecRangeError for values outside 1..12 and backwards ranges
 */
export function parseIssueSpec(spec: string): number[] {
  const issues = new Set<number>();

  for (const part of spec.trim().split(',')) {
    const token = part.trim();
    if (!token) {
      continue;
    }

    if (token.includes('-')) {
      // Validate the whole range before taking any of it
      for (const issue of parseRange(token)) {
        issues.add(issue);
      }
    } else {
      const issue = parseInteger(token, token);
      if (!isValidIssue(issue)) {
        throw outOfRange(issue, token);
      }
      issues.add(issue);
    }
  }

  return [...issues].sort((a, b) => a - b);
}

/**
 * Resolve any accepted issue input (spec string, single number, list) to
 * the canonical ascending list.
 */
export function resolveIssues(input: IssueInput): number[] {
  if (typeof input === 'string') {
    return parseIssueSpec(input);
  }

  const values = typeof input === 'number' ? [input] : input;
  const issues = new Set<number>();

  for (const value of values) {
    if (!Number.isInteger(value)) {
      throw new IssueSpecFormatError(`${value} is not an issue number`, String(value));
    }
    if (!isValidIssue(value)) {
      throw outOfRange(value, String(value));
    }
    issues.add(value);
  }

  return [...issues].sort((a, b) => a - b);
}

/**
 * Render an issue list back into its shortest spec string ("1-3,5").
 */
export function formatIssueSpec(issues: readonly number[]): string {
  const sorted = [...new Set(issues)].sort((a, b) => a - b);
  const parts: string[] = [];
  let index = 0;

  while (index < sorted.length) {
    const start = sorted[index];
    let end = start;
    while (index + 1 < sorted.length && sorted[index + 1] === end + 1) {
      index++;
      end = sorted[index];
    }
    parts.push(start === end ? String(start) : `${start}-${end}`);
    index++;
  }

  return parts.join(',');
}
