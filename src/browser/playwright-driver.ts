import {
  chromium,
  firefox,
  webkit,
  type Browser,
  type BrowserContext,
  type BrowserType,
  type Dialog,
  type Locator,
  type Page,
} from 'playwright-core';
import type { IBrowserContextHandle, IBrowserCookie, IBrowserLauncher, IContextOptions, IPageDriver } from './index.js';
import type { IDocumentSnapshot, IElementSnapshot } from '../types/index.js';
import type { BrowserEngine, IBrowserSettings } from '../types/settings.js';
import type { ILogger } from '../infra/logger.js';
import { BrowserLaunchError, RetryableError, toError } from '../infra/retry-utils.js';
import { DOMExtractor, refSelector } from '../element-discovery/dom-extractor.js';
import { ACCEPTED_DIALOG_PATTERNS, ERROR_MESSAGES } from '../constants/index.js';

const ENGINES: Record<BrowserEngine, BrowserType> = { chromium, firefox, webkit };

// Navigation errors that only mean "the page moved on by itself"
const BENIGN_NAVIGATION_ERRORS = [/NS_BINDING_ABORTED/i, /interrupted by another navigation/i, /net::ERR_ABORTED/i];

const CLOSED_TARGET_ERRORS = [/has been closed/i, /Failed to find context/i, /Target\.disposeBrowserContext/i, /Protocol error/i];

function isClosedTargetError(error: Error): boolean {
  return CLOSED_TARGET_ERRORS.some(pattern => pattern.test(error.message));
}

/**
 * Accept "leaving this site" style dialogs, dismiss everything else.
 */
export function handleDialog(dialog: Dialog, logger: ILogger, acceptPatterns = ACCEPTED_DIALOG_PATTERNS): void {
  const message = dialog.message();
  const accept = acceptPatterns.some(pattern => pattern.test(message));
  logger.debug(accept ? 'Accepting dialog' : 'Dismissing dialog', { type: dialog.type(), message });

  const settled = accept ? dialog.accept() : dialog.dismiss();
  settled.catch(error => {
    logger.debug('Dialog already handled', { error: toError(error).message });
  });
}

/**
 * IPageDriver over a Playwright page.
 */
export class PlaywrightPageDriver implements IPageDriver {
  private extractor: DOMExtractor;

  constructor(
    private page: Page,
    private logger: ILogger,
    private actionTimeoutMs: number
  ) {
    this.extractor = new DOMExtractor(logger);
  }

  url(): string {
    return this.page.url();
  }

  async goto(url: string): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.actionTimeoutMs });
    } catch (error) {
      const err = toError(error);
      if (BENIGN_NAVIGATION_ERRORS.some(pattern => pattern.test(err.message))) {
        this.logger.debug('Navigation superseded by a page-initiated one', { url, error: err.message });
        return;
      }
      throw err;
    }
  }

  snapshot(): Promise<IDocumentSnapshot> {
    return this.extractor.extract(this.page);
  }

  async fill(target: IElementSnapshot, value: string): Promise<void> {
    const element = await this.resolve(target);
    await element.fill(value, { timeout: this.actionTimeoutMs });
  }

  async readValue(target: IElementSnapshot): Promise<string> {
    const element = await this.resolve(target);
    return element.evaluate(node => {
      if (
        node instanceof HTMLInputElement ||
        node instanceof HTMLTextAreaElement ||
        node instanceof HTMLSelectElement
      ) {
        return node.value;
      }
      return (node.textContent ?? '').trim();
    });
  }

  async click(target: IElementSnapshot): Promise<void> {
    const element = await this.resolve(target);
    await element.click({ timeout: this.actionTimeoutMs });
  }

  async isNetworkIdle(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
      return true;
    } catch (error) {
      this.logger.debug('Network not idle yet', { error: toError(error).message });
      return false;
    }
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async screenshot(): Promise<Buffer | null> {
    try {
      return await this.page.screenshot({ fullPage: true });
    } catch (error) {
      this.logger.debug('Screenshot unavailable', { error: toError(error).message });
      return null;
    }
  }

  /**
   * Find the live node the extractor stamped for a snapshot entry. A node
   * that was replaced or re-rendered lost its stamp, so the reference is
   * stale and the caller should look again.
   */
  private async resolve(target: IElementSnapshot): Promise<Locator> {
    if (!target.stamp) {
      throw new RetryableError(ERROR_MESSAGES.STALE_REFERENCE(target.tag, target.ref));
    }
    const element = this.page.locator(refSelector(target.stamp)).first();
    if ((await element.count()) === 0) {
      throw new RetryableError(ERROR_MESSAGES.STALE_REFERENCE(target.tag, target.ref));
    }
    return element;
  }
}

export class PlaywrightContextHandle implements IBrowserContextHandle {
  private isClosed = false;

  constructor(
    private context: BrowserContext,
    private logger: ILogger,
    private actionTimeoutMs: number
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  async newPage(): Promise<IPageDriver> {
    const page = await this.context.newPage();
    page.setDefaultTimeout(this.actionTimeoutMs);
    page.on('dialog', dialog => handleDialog(dialog, this.logger));
    return new PlaywrightPageDriver(page, this.logger, this.actionTimeoutMs);
  }

  async cookies(): Promise<IBrowserCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map(cookie => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
      sameSite: cookie.sameSite,
    }));
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;

    try {
      await this.context.close();
    } catch (error) {
      const err = toError(error);
      if (isClosedTargetError(err)) {
        this.logger.debug('Browser context was already closed or disposed');
      } else {
        this.logger.warn('Unexpected error closing browser context', { error: err.message });
      }
    }
  }
}

/**
 * Launches one browser process lazily and hands out isolated contexts.
 */
export class PlaywrightLauncher implements IBrowserLauncher {
  private browser: Browser | null = null;

  constructor(
    private settings: IBrowserSettings,
    private logger: ILogger
  ) {}

  async openContext(options: IContextOptions = {}): Promise<IBrowserContextHandle> {
    const context = await this.newContext(options);
    return new PlaywrightContextHandle(context, this.logger, this.settings.navigationTimeoutMs);
  }

  /**
   * A raw Playwright context, for adapters that need more than IPageDriver.
   */
  async newContext(options: IContextOptions = {}): Promise<BrowserContext> {
    const browser = await this.ensureBrowser();
    const context = await browser.newContext({ viewport: { width: 1280, height: 800 } });
    context.setDefaultTimeout(this.settings.navigationTimeoutMs);

    if (options.cookies && options.cookies.length > 0) {
      await context.addCookies(options.cookies);
    }
    return context;
  }

  async shutdown(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (!browser || !browser.isConnected()) {
      this.logger.debug('Browser already closed, skipping shutdown');
      return;
    }

    try {
      await browser.close();
    } catch (error) {
      const err = toError(error);
      if (isClosedTargetError(err)) {
        this.logger.debug('Browser was already closed');
      } else {
        this.logger.warn('Unexpected error closing browser', { error: err.message });
      }
    }
  }

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.isConnected()) {
      return this.browser;
    }

    const { engine, headless } = this.settings;
    this.logger.info('Launching browser', { engine, headless });

    try {
      this.browser = await ENGINES[engine].launch({ headless });
      return this.browser;
    } catch (error) {
      const err = toError(error);
      throw new BrowserLaunchError(ERROR_MESSAGES.BROWSER_LAUNCH_FAILED(engine, err.message), err);
    }
  }
}
