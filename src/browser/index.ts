/**
 * Browser Module
 *
 * Browser-automation capability used by the enumerator: open a session,
 * navigate, scroll to the bottom, read the content extent and inspect the
 * rendered cards. The Playwright implementation runs headless Chromium;
 * element failures are wrapped in SessionError so the enumerator can skip a
 * single card.
 *
 * playwright-core never downloads a browser. Point `executablePath` (or the
 * PLAYWRIGHT_CHROMIUM_EXECUTABLE env var) at an installed Chromium, or use a
 * `channel` such as "chrome".
 */

import { chromium, type Browser, type BrowserContext, type ElementHandle, type Page } from 'playwright-core';
import { SessionError, getErrorMessage } from '../errors/index.js';
import type { Logger } from '../types/index.js';
import { defaultLogger } from '../observability/index.js';

// ============================================================================
// Capability Interfaces
// ============================================================================

/**
 * One rendered element in a browsing session
 */
export interface SessionElement {
  /** Attribute value, or null when absent */
  getAttribute(name: string): Promise<string | null>;
  /** First descendant matching the marker; throws SessionError when missing */
  findElement(marker: string): Promise<SessionElement>;
}

/**
 * A stateful browsing session owned by one enumeration call
 */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  scrollToBottom(): Promise<void>;
  currentContentExtent(): Promise<number>;
  findElements(marker: string): Promise<SessionElement[]>;
  close(): Promise<void>;
}

/**
 * Factory of browsing sessions
 */
export interface BrowserDriver {
  openSession(): Promise<BrowserSession>;
  close(): Promise<void>;
}

// ============================================================================
// Playwright Implementation
// ============================================================================

/**
 * Configuration for the Playwright driver
 */
export interface PlaywrightDriverConfig {
  headless?: boolean;
  /** Path to a Chromium binary */
  executablePath?: string;
  /** Browser distribution channel, e.g. "chrome" */
  channel?: string;
  /** Navigation timeout in milliseconds (default: 60000) */
  navigationTimeout?: number;
  viewport?: { width: number; height: number };
}

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };

class PlaywrightElement implements SessionElement {
  constructor(private readonly handle: ElementHandle) {}

  async getAttribute(name: string): Promise<string | null> {
    try {
      return await this.handle.getAttribute(name);
    } catch (error) {
      throw new SessionError(`Cannot read attribute ${name}: ${getErrorMessage(error)}`, error);
    }
  }

  async findElement(marker: string): Promise<SessionElement> {
    let found: ElementHandle | null;
    try {
      found = await this.handle.$(marker);
    } catch (error) {
      throw new SessionError(`Cannot query ${marker}: ${getErrorMessage(error)}`, error);
    }
    if (!found) {
      throw new SessionError(`No element matches ${marker}`);
    }
    return new PlaywrightElement(found);
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly navigationTimeout: number
  ) {}

  async navigate(url: string): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeout });
    } catch (error) {
      throw new SessionError(`Navigation to ${url} failed: ${getErrorMessage(error)}`, error);
    }
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async currentContentExtent(): Promise<number> {
    return this.page.evaluate(() => document.body.scrollHeight);
  }

  async findElements(marker: string): Promise<SessionElement[]> {
    const handles = await this.page.$$(marker);
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/**
 * BrowserDriver backed by a single headless Chromium.
 * Each session gets its own browser context.
 */
export class PlaywrightBrowserDriver implements BrowserDriver {
  private browser: Browser | null = null;

  constructor(
    private readonly config: PlaywrightDriverConfig = {},
    private readonly logger: Logger = defaultLogger
  ) {}

  private async getBrowser(): Promise<Browser> {
    if (!this.browser) {
      const executablePath =
        this.config.executablePath ?? process.env.PLAYWRIGHT_CHROMIUM_EXECUTABLE;
      this.logger.debug('Launching browser', {
        headless: this.config.headless ?? true,
        executablePath,
        channel: this.config.channel,
      });
      this.browser = await chromium.launch({
        headless: this.config.headless ?? true,
        executablePath,
        channel: this.config.channel,
        args: ['--disable-gpu', '--no-sandbox', '--disable-dev-shm-usage'],
      });
    }
    return this.browser;
  }

  async openSession(): Promise<BrowserSession> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      viewport: this.config.viewport ?? DEFAULT_VIEWPORT,
    });
    const page = await context.newPage();
    return new PlaywrightSession(context, page, this.config.navigationTimeout ?? 60000);
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}
