import { chromium, errors, type Browser, type Page } from 'playwright-core';
import { ElementNotFoundError, NavigationError, PaginationTimeoutError, errorMessage } from '../errors';

/**
 * The browser actions the page-count discovery needs. All timeouts are in milliseconds.
 */
export interface BrowserDriver {
  navigate(url: string, timeoutMs: number): Promise<void>;
  fill(selector: string, value: string, timeoutMs: number): Promise<void>;
  click(selector: string, timeoutMs: number): Promise<void>;
  /** Resolves false when nothing matches within the timeout. */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  readTexts(selector: string): Promise<string[]>;
  count(selector: string): Promise<number>;
  close(): Promise<void>;
}

export type BrowserDriverFactory = () => Promise<BrowserDriver>;

export type PlaywrightSettings = {
  wsEndpoint?: string;
  executablePath?: string;
};

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

function isTimeout(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

export class PlaywrightDriver implements BrowserDriver {
  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
  ) {}

  static async open(settings: PlaywrightSettings): Promise<PlaywrightDriver> {
    let browser: Browser;
    if (settings.wsEndpoint) {
      console.log('[Browser] Connecting to remote browser over CDP...');
      browser = await chromium.connectOverCDP(settings.wsEndpoint);
    } else {
      browser = await chromium.launch({
        headless: true,
        executablePath: settings.executablePath,
        args: ['--no-sandbox', '--disable-setuid-sandbox'],
      });
    }

    try {
      const context = await browser.newContext({
        userAgent: USER_AGENT,
        viewport: { width: 1920, height: 1080 },
        locale: 'en-MY',
      });
      const page = await context.newPage();
      return new PlaywrightDriver(browser, page);
    } catch (err) {
      await browser.close().catch((closeErr: unknown) => {
        console.error('[Browser] Failed to close browser after setup error:', errorMessage(closeErr));
      });
      throw err;
    }
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (err) {
      if (isTimeout(err)) {
        throw new PaginationTimeoutError(`Timed out after ${timeoutMs}ms loading ${url}`, { cause: err });
      }
      throw new NavigationError(`Navigation to ${url} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async fill(selector: string, value: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.fill(selector, value, { timeout: timeoutMs });
    } catch (err) {
      if (isTimeout(err)) throw new ElementNotFoundError(selector);
      throw err;
    }
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.click(selector, { timeout: timeoutMs });
    } catch (err) {
      if (isTimeout(err)) throw new ElementNotFoundError(selector);
      throw err;
    }
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
      return true;
    } catch (err) {
      if (isTimeout(err)) return false;
      throw err;
    }
  }

  readTexts(selector: string): Promise<string[]> {
    return this.page.locator(selector).allTextContents();
  }

  count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export function playwrightDriverFactory(settings: PlaywrightSettings): BrowserDriverFactory {
  return () => PlaywrightDriver.open(settings);
}
