import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { logger } from '../utils/logger.js';

export interface BrowserOptions {
  headless: boolean;
  /** Chromium binary. Falls back to the system Chrome channel when unset. */
  executablePath?: string;
  /** Default timeout for every page operation */
  timeoutMs: number;
}

export interface BrowserSession {
  context: BrowserContext;
  page: Page;
}

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export function isTimeoutError(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

/** One shared browser process; each session gets its own isolated context. */
export class BrowserPool {
  private browser: Browser | null = null;

  constructor(private readonly options: BrowserOptions) {}

  private async getBrowser(): Promise<Browser> {
    if (!this.browser || !this.browser.isConnected()) {
      this.browser = await chromium.launch({
        headless: this.options.headless,
        ...(this.options.executablePath
          ? { executablePath: this.options.executablePath }
          : { channel: 'chrome' }),
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
      });
      logger.info({ headless: this.options.headless }, 'Browser launched');
    }
    return this.browser;
  }

  async openSession(): Promise<BrowserSession> {
    const b = await this.getBrowser();
    const context = await b.newContext({
      userAgent: USER_AGENT,
      viewport: { width: 1280, height: 800 },
      locale: 'de-DE',
      timezoneId: 'Europe/Berlin',
    });
    context.setDefaultTimeout(this.options.timeoutMs);
    context.setDefaultNavigationTimeout(this.options.timeoutMs);

    const page = await context.newPage();
    return { context, page };
  }

  async closeSession(session: BrowserSession): Promise<void> {
    await session.context.close();
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      logger.info('Browser closed');
    }
  }
}
