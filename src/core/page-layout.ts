/**
 * Selectors describing the journal navigation page.
 *
 * The defaults match the year/issue tree and article list of the journal
 * navigation pages the crawler was built for: each year is a `dl` whose
 * `dt` header expands a list of `a#yq<year><issue>` links, and each article
 * of the selected issue is a `dd.row`.
 */

export interface PageLayout {
  /** Year header that expands the year's issue list */
  yearHeader: string;
  /** Container of one year's header and issues */
  yearContainer: string;
  /** Issue link inside an expanded year */
  issueLink: string;
  /** Prefix of issue link identifiers, followed by year and padded issue */
  issueIdPrefix: string;
  /** One article row in the issue listing */
  row: string;
  /** Title link within a row */
  title: string;
  /** Author cell within a row */
  author: string;
  /** Page-range cell within a row */
  pages: string;
}

export const DEFAULT_LAYOUT: PageLayout = {
  yearHeader: 'dt',
  yearContainer: 'dl',
  issueLink: 'a[id^="yq"]',
  issueIdPrefix: 'yq',
  row: 'dd.row',
  title: 'span.name a',
  author: 'span.author',
  pages: 'span.company',
};

export function resolveLayout(overrides: Partial<PageLayout> = {}): PageLayout {
  return { ...DEFAULT_LAYOUT, ...overrides };
}

/**
 * Two-digit issue number used in issue link identifiers.
 */
export function padIssue(issue: number): string {
  return String(issue).padStart(2, '0');
}

export function issueIdentifier(layout: PageLayout, year: number, issue: number): string {
  return `${layout.issueIdPrefix}${year}${padIssue(issue)}`;
}

/**
 * Label printed on issue links ("No.6").
 */
export function issueLabel(issue: number): string {
  return `No.${issue}`;
}

/**
 * True when `text` carries the issue label as a whole number, so that
 * "No.1" does not match "No.12". Tolerates a leading zero ("No.06").
 */
export function hasIssueLabel(text: string, issue: number): boolean {
  return new RegExp(`No\\.\\s*0?${issue}(?!\\d)`).test(text);
}
