import type { BrowserContext, Page } from 'playwright-core';
import type { IBrowserCookie } from '../browser/index.js';
import { handleDialog, type PlaywrightLauncher } from '../browser/playwright-driver.js';
import type { ILogger } from '../infra/logger.js';
import type { IMailboxSettings } from '../types/settings.js';
import type { IMailboxMessage, IWebmailClient } from './index.js';
import { parseReceivedAt } from './verification-link.js';

// Message rows in the webmail list view
const MAIL_ROW_SELECTOR = [
  '[class*="mail-item"]',
  '[class*="mailItem"]',
  '[class*="mail-list"] tr',
  '[class*="mailList"] tr',
  '[class*="list-item"]',
].join(', ');

const REFRESH_SELECTOR = [
  '[title*="刷新"]',
  '[title*="Refresh" i]',
  '[class*="refresh"]',
  'button:has-text("刷新")',
  'button:has-text("Refresh")',
].join(', ');

interface IRawRow {
  sender: string;
  subject: string;
  recipient: string | null;
  time: string;
}

/**
 * IWebmailClient for a browser-rendered webmail list (the default provider
 * is 2925.com). Runs in its own context so mailbox cookies never leak into
 * the signup session.
 */
export class PlaywrightWebmailClient implements IWebmailClient {
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(
    private launcher: PlaywrightLauncher,
    private settings: IMailboxSettings,
    private logger: ILogger
  ) {}

  async open(cookies: IBrowserCookie[]): Promise<void> {
    if (!this.context) {
      this.context = await this.launcher.newContext({ cookies });
      this.page = await this.context.newPage();
      const logger = this.logger;
      this.page.on('dialog', dialog => handleDialog(dialog, logger));
    }
    await this.requirePage().goto(this.settings.listUrl, { waitUntil: 'domcontentloaded' });
  }

  async isAuthenticated(): Promise<boolean> {
    const page = this.requirePage();
    if (/login|signin|passport/i.test(page.url())) {
      return false;
    }
    return (await page.locator('input[type="password"]:visible').count()) === 0;
  }

  async refresh(): Promise<void> {
    const page = this.requirePage();
    const control = page.locator(REFRESH_SELECTOR).first();

    if ((await control.count()) > 0 && (await control.isVisible())) {
      await control.click();
      this.logger.debug('Mailbox list refreshed via control');
    } else {
      await page.reload({ waitUntil: 'domcontentloaded' });
      this.logger.debug('Mailbox list reloaded');
    }
  }

  async listMessages(): Promise<IMailboxMessage[]> {
    const page = this.requirePage();
    const rows = await page.locator(MAIL_ROW_SELECTOR).evaluateAll((nodes): IRawRow[] =>
      nodes.map(node => {
        const pick = (selector: string): string =>
          (node.querySelector(selector)?.textContent ?? '').replace(/\s+/g, ' ').trim();
        const lines = (node instanceof HTMLElement ? node.innerText : node.textContent ?? '')
          .split('\n')
          .map(line => line.trim())
          .filter(line => line.length > 0);

        return {
          sender: pick('[class*="sender"], [class*="from"]') || lines[0] || '',
          subject: pick('[class*="subject"], [class*="title"]') || lines[1] || '',
          recipient: pick('[class*="recipient"], [class*="receiver"]') || null,
          time: pick('[class*="time"], [class*="date"]') || lines[lines.length - 1] || '',
        };
      })
    );

    const now = Date.now();
    return rows.map((row, index) => ({
      id: String(index),
      sender: row.sender,
      subject: row.subject,
      recipient: row.recipient ?? undefined,
      receivedAt: parseReceivedAt(row.time, now),
    }));
  }

  async readMessage(id: string): Promise<string> {
    const page = this.requirePage();
    await page.locator(MAIL_ROW_SELECTOR).nth(Number(id)).click();
    await page.waitForLoadState('domcontentloaded');

    const content = await page.evaluate(() => {
      const hrefs = Array.from(document.querySelectorAll('a[href]')).map(a => a.getAttribute('href') ?? '');
      const frames = Array.from(document.querySelectorAll('iframe'))
        .map(frame => frame.contentDocument?.body?.innerText ?? '')
        .filter(text => text.length > 0);
      return [document.body?.innerText ?? '', ...frames, ...hrefs].join('\n');
    });

    await page.goto(this.settings.listUrl, { waitUntil: 'domcontentloaded' });
    return content;
  }

  async close(): Promise<void> {
    const context = this.context;
    this.context = null;
    this.page = null;
    if (context) {
      await context.close();
    }
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('Mailbox page is not open');
    }
    return this.page;
  }
}
