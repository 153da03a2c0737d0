/**
 * Download every newsletter issue not already on disk.
 *
 * Each issue is saved as its canonical file name (see `canonicalFileName`),
 * which doubles as the "already downloaded" marker: a second run against an
 * unchanged collection downloads nothing.
 */

import type { PortalConfig } from '../core/config';
import type { PortalDriver } from '../core/driver';
import { Logger, describeError } from '../core/logger';
import { SELECTORS } from '../core/selectors';
import type { NewsletterEntry } from '../core/types';
import { DownloadStore } from '../services/downloadStore';

const logger = new Logger('NewsletterFetcher');

export const NEWSLETTER_EXTENSION = '.pdf';

/** Last two whitespace-separated tokens of `displayText`, joined, plus `.pdf`. */
export function canonicalFileName(displayText: string): string {
  const tokens = displayText.trim().split(/\s+/).filter((t) => t.length > 0);
  return tokens.slice(-2).join('') + NEWSLETTER_EXTENSION;
}

/** Names the browser may have saved an issue under, in the order to try them. */
export function landedFileNames(displayText: string): string[] {
  const raw = displayText.trim() + NEWSLETTER_EXTENSION;
  const stripped = raw.replace(/-/g, '');
  return stripped === raw ? [raw] : [raw, stripped];
}

export class NewsletterFetcher {
  constructor(
    private readonly driver: PortalDriver,
    private readonly config: PortalConfig,
    private readonly store: DownloadStore = new DownloadStore(config.downloadDir),
  ) {}

  /** @returns canonical names of the issues downloaded by this call. */
  async fetchNewsletters(): Promise<string[]> {
    await this.store.ensure();
    const entries = await this.listEntries();
    logger.info(`Found ${entries.length} newsletter issue(s)`);

    const downloads: string[] = [];
    for (const entry of entries) {
      const fileName = canonicalFileName(entry.displayText);
      if (await this.store.has(fileName)) {
        logger.info(`${fileName} already exists, skipping download`);
        continue;
      }

      try {
        await this.download(entry);

        const landed = landedFileNames(entry.displayText);
        const adopted = await this.store.adopt(landed, fileName);
        if (!adopted) {
          logger.warn(
            `File name mismatch: expected ${landed.join(' or ')} in ${this.store.directory}, none found`,
          );
        }
      } catch (err) {
        logger.error(`Download of "${entry.displayText}" failed: ${describeError(err)}`);
        continue;
      }

      downloads.push(fileName);
    }

    return downloads;
  }

  /** Read `(url, text)` pairs from the collection page. */
  async listEntries(): Promise<NewsletterEntry[]> {
    await this.driver.navigate(this.config.newsletterUrl);
    await this.driver.waitForTitle(this.config.newsletterTitle, this.config.timing.waitTimeoutMs);

    const headings = await this.driver.findAll(SELECTORS.newsletter.heading);
    const entries: NewsletterEntry[] = [];

    for (const heading of headings) {
      try {
        const anchor = await heading.findOne(SELECTORS.newsletter.anchor);
        const href = anchor ? await anchor.attribute('href') : null;
        if (!href) continue;

        const displayText = (await heading.text()).trim();
        if (!displayText) {
          logger.warn(`Heading linking to ${href} has no text, skipping`);
          continue;
        }
        entries.push({ sourceUrl: new URL(href, this.config.newsletterUrl).href, displayText });
      } catch (err) {
        logger.warn(`Could not read newsletter heading: ${describeError(err)}`);
      }
    }

    return entries;
  }

  private async download(entry: NewsletterEntry): Promise<void> {
    const timeout = this.config.timing.waitTimeoutMs;

    await this.driver.navigate(entry.sourceUrl);
    await this.driver.waitForPresence(SELECTORS.newsletter.download, timeout);
    const button = await this.driver.waitForClickable(SELECTORS.newsletter.download, timeout);
    await button.click();
    logger.info(`Download started for "${entry.displayText}"`);

    await this.driver.pause(this.config.timing.downloadSettleMs);
  }
}
