/**
 * Page capability the crawl pipeline runs against.
 *
 * The selector strategies, the row extractor and the enricher only see
 * these interfaces, so they can be driven by Playwright in production and
 * by an in-process fake in tests.
 */

import type { ElementHandle, Page } from 'playwright';

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export interface GotoOptions {
  timeout: number;
  waitUntil?: WaitUntil;
}

/**
 * A located DOM element.
 */
export interface PageElement {
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  /** Elements under this one matching the selector, in document order */
  locateAll(selector: string): Promise<PageElement[]>;
}

/**
 * A rendered browser page.
 */
export interface CrawlPage {
  goto(url: string, options: GotoOptions): Promise<void>;
  url(): string;
  /** Elements matching the selector, in document order */
  locateAll(selector: string): Promise<PageElement[]>;
  content(): Promise<string>;
  pause(ms: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * One acquired browser: the primary page plus a way to borrow more.
 */
export interface BrowserSession {
  readonly page: CrawlPage;
  newPage(options?: { timeout?: number }): Promise<CrawlPage>;
  close(): Promise<void>;
}

/**
 * Playwright's TimeoutError carries this name; so does anything standing in for it.
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

type PlaywrightHandle = ElementHandle<SVGElement | HTMLElement>;

export class PlaywrightElement implements PageElement {
  constructor(private readonly handle: PlaywrightHandle) {}

  innerText(): Promise<string> {
    return this.handle.innerText();
  }

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  click(): Promise<void> {
    return this.handle.click();
  }

  async locateAll(selector: string): Promise<PageElement[]> {
    const handles = await this.handle.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle));
  }
}

export class PlaywrightCrawlPage implements CrawlPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, options: GotoOptions): Promise<void> {
    await this.page.goto(url, {
      timeout: options.timeout,
      waitUntil: options.waitUntil ?? 'networkidle',
    });
  }

  url(): string {
    return this.page.url();
  }

  async locateAll(selector: string): Promise<PageElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  content(): Promise<string> {
    return this.page.content();
  }

  pause(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  close(): Promise<void> {
    return this.page.close();
  }
}
