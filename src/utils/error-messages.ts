/**
 * Error messages with actionable suggestions
 *
 * Every top-level failure the CLI can report is built here so the wording
 * stays consistent:
 * - Clear description of what went wrong
 * - Actionable suggestions for resolution
 * - Alternative approaches when available
 */

export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Command to run (e.g., npm install) */
  command?: string;
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.command) {
    parts.push(`Run: ${options.command}`);
  }

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// DEPENDENCY ERRORS
// =============================================================================

export function playwrightNotInstalledError(reason?: string): string {
  return buildErrorMessage({
    message: reason
      ? `Playwright could not be loaded: ${reason}`
      : 'Playwright could not be loaded.',
    command: 'npm install playwright && npx playwright install chromium',
  });
}

// =============================================================================
// INPUT ERRORS
// =============================================================================

export function invalidIssueSpecError(spec: string, reason: string): string {
  return buildErrorMessage({
    message: `Invalid issue specification "${spec}": ${reason}`,
    suggestions: [
      'Issues are numbers from 1 to 12',
      'Accepted forms: "6", "1-3", "1,5,7", "1-3,5,7-9"',
    ],
  });
}

export function missingArgumentsError(required: string[]): string {
  return buildErrorMessage({
    message: `Missing required arguments: ${required.join(', ')}`,
    suggestions: ['Run with --help to see every option'],
  });
}

export function unknownArgumentError(arg: string): string {
  return buildErrorMessage({
    message: `Unknown argument "${arg}".`,
    suggestions: ['Run with --help to see every option'],
  });
}

// =============================================================================
// CRAWL ERRORS
// =============================================================================

export function navigationTimeoutError(url: string, timeoutMs: number): string {
  return buildErrorMessage({
    message: `Timed out after ${timeoutMs}ms loading ${url}.`,
    suggestions: [
      'Check that the journal page opens in a regular browser',
      'Raise the limit with --timeout',
    ],
    alternatives: ['Run with --no-headless to watch the page load'],
  });
}

export function crawlFailedError(reason: string): string {
  return buildErrorMessage({
    message: `Crawl failed: ${reason}`,
    suggestions: ['Set LOG_LEVEL=debug for per-step logs'],
  });
}
