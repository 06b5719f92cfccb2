/**
 * Playwright-backed browser sessions: one isolated headless Chromium and
 * context per session, never reused.
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core';
import type {
  BrowserSession,
  BrowserSessionFactory,
} from '../lib/listing-core/index.js';

export const BROWSER_LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--no-sandbox',
  '--disable-dev-shm-usage',
];

class PlaywrightBrowserSession implements BrowserSession {
  private disposed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async scroll(deltaY: number): Promise<void> {
    await this.page.mouse.wheel(0, deltaY);
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async waitForMarker(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

/**
 * Session factory backed by a headless Chromium.
 * Requires a Chromium build reachable by playwright-core at run time.
 */
export function createPlaywrightSessionFactory(
  executablePath?: string
): BrowserSessionFactory {
  return async options => {
    const browser = await chromium.launch({
      headless: true,
      args: BROWSER_LAUNCH_ARGS,
      executablePath,
    });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        viewport: options.viewport,
        javaScriptEnabled: true,
      });
      const page = await context.newPage();
      return new PlaywrightBrowserSession(browser, context, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  };
}
