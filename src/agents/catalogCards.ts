/**
 * Shared helpers for the catalog page.
 */

import type { PortalDriver, PortalElement } from '../core/driver';
import type { ExtractedRecord, NavigationTarget, RecordSink } from '../core/types';
import { Logger, describeError } from '../core/logger';
import { SELECTORS } from '../core/selectors';

const logger = new Logger('CatalogCards');

export interface CardLink {
  /** Absolute URL of the card's title link. */
  url: string;
  title: PortalElement;
}

/**
 * Enumerate the cards currently rendered on the catalog page.
 *
 * Relative hrefs resolve against the URL the page actually landed on, which
 * differs from the configured one after a proxy redirect.  Each card is read
 * independently: a card without a title link, or whose link cannot be read
 * or resolved, is skipped with a warning.
 */
export async function readCardLinks(driver: PortalDriver): Promise<CardLink[]> {
  const pageUrl = driver.currentUrl();
  const cards = await driver.findAll(SELECTORS.catalog.card);
  const links: CardLink[] = [];

  for (const [position, card] of cards.entries()) {
    try {
      const title = await card.findOne(SELECTORS.catalog.cardTitle);
      if (!title) {
        logger.warn(`Card #${position + 1} has no title link, skipping`);
        continue;
      }
      const href = await title.attribute('href');
      if (!href) {
        logger.warn(`Card #${position + 1} title has no href, skipping`);
        continue;
      }
      links.push({ url: new URL(href, pageUrl).href, title });
    } catch (err) {
      logger.warn(`Could not read card #${position + 1}: ${describeError(err)}`);
    }
  }

  return links;
}

/** Log each record and hand it to the sink, if any. */
export function reportRecords(
  records: ExtractedRecord[],
  target: NavigationTarget,
  sink: RecordSink | undefined,
): void {
  logger.info(`${records.length} record(s) from ${target.url}`);
  for (const record of records) {
    logger.info(JSON.stringify(record));
    sink?.(record, target);
  }
}
