/**
 * Owns the run's single Chrome instance.
 *
 * Chrome is launched through puppeteer-extra with the stealth plugin,
 * wrapped around puppeteer-core so nothing is downloaded at install time:
 * the binary comes from `CHROME_EXECUTABLE_PATH` or the locally installed
 * stable channel.
 *
 * `withDriver()` lends one page (as a `PortalDriver`) to a callback and
 * disposes it afterwards.  Downloads from that page land in
 * `config.downloadDir`.
 */

import vanillaPuppeteer, { type Browser, type Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { PortalConfig } from './config';
import type { DriverSession, PortalDriver } from './driver';
import { Logger } from './logger';
import { PuppeteerDriver, clearNavigationLimiters } from '../middleware';

const logger = new Logger('BrowserManager');

const puppeteer = addExtra(vanillaPuppeteer);
puppeteer.use(StealthPlugin());

const VIEWPORT = { width: 1440, height: 900 };

export class BrowserManager implements DriverSession {
  private browser: Browser | null = null;
  private exitHooksRegistered = false;

  constructor(private readonly config: PortalConfig) {}

  // ── Core API ───────────────────────────────────────────

  async withDriver<T>(fn: (driver: PortalDriver) => Promise<T>): Promise<T> {
    const browser = await this.ensureBrowser();
    const page: Page = await browser.newPage();

    try {
      await page.setViewport(VIEWPORT);
      await this.allowDownloads(page);
      return await fn(new PuppeteerDriver(page, this.config));
    } finally {
      await page.close().catch((err: unknown) => {
        logger.warn(`Could not close page: ${String(err)}`);
      });
    }
  }

  async close(): Promise<void> {
    await clearNavigationLimiters();
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close().catch((err: unknown) => {
        logger.warn(`Browser did not close cleanly: ${String(err)}`);
      });
      logger.info('Browser closed');
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (!this.browser || !this.browser.connected) {
      const { headless, executablePath } = this.config.browser;
      logger.info(`Launching Chrome (headless=${headless})`);

      this.browser = await puppeteer.launch({
        headless,
        ...(executablePath ? { executablePath } : { channel: 'chrome' }),
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
      });

      this.registerExitHooks();
    }
    return this.browser;
  }

  /** Route this page's downloads into the download directory. */
  private async allowDownloads(page: Page): Promise<void> {
    const session = await page.createCDPSession();
    await session.send('Browser.setDownloadBehavior', {
      behavior: 'allow',
      downloadPath: this.config.downloadDir,
    });
  }

  private registerExitHooks(): void {
    if (this.exitHooksRegistered) return;
    this.exitHooksRegistered = true;

    const cleanup = (signal: NodeJS.Signals) => {
      logger.warn(`Received ${signal}, closing browser`);
      this.close()
        .catch((err: unknown) => logger.error('Cleanup failed', err))
        .finally(() => process.exit(130));
    };

    process.once('SIGINT', cleanup);
    process.once('SIGTERM', cleanup);
  }
}
