/**
 * Crawl one catalog page.
 *
 *   1. Load the catalog and wait for its section header (a timeout aborts
 *      this catalog only, as `CatalogLoadError`).
 *   2. Read every card's title link and classify it.
 *   3. Pick-list links: navigate and extract the pick-list table.
 *   4. Model-portfolio links: queue, in document order, for the
 *      RevisitProtocol.
 *   5. Anything else: warn and drop.
 */

import type { PortalConfig } from '../core/config';
import type { PortalDriver } from '../core/driver';
import { CatalogLoadError } from '../core/errors';
import { Logger, describeError } from '../core/logger';
import { SELECTORS } from '../core/selectors';
import type { CatalogReport, NavigationTarget, RecordSink, TargetOutcome } from '../core/types';
import { toNavigationTarget } from '../scrapers/linkClassifier';
import { safeExtract, snapshotRegion } from '../scrapers/tableExtractor';
import { readCardLinks, reportRecords } from './catalogCards';
import { RevisitProtocol } from './revisitProtocol';

const logger = new Logger('CatalogNavigator');

export interface CatalogNavigatorOptions {
  sink?: RecordSink;
  /** Supply a prebuilt protocol (tests); one sharing the sink is built otherwise. */
  revisit?: RevisitProtocol;
}

export class CatalogNavigator {
  private readonly revisit: RevisitProtocol;
  private readonly sink?: RecordSink;

  constructor(
    private readonly driver: PortalDriver,
    private readonly config: PortalConfig,
    options: CatalogNavigatorOptions = {},
  ) {
    this.sink = options.sink;
    this.revisit = options.revisit ?? new RevisitProtocol(driver, config, { sink: options.sink });
  }

  async navigateCatalog(catalogUrl: string): Promise<CatalogReport> {
    const timeout = this.config.timing.waitTimeoutMs;

    // ── 1. Load ──────────────────────────────────────────────
    logger.info(`Opening catalog ${catalogUrl}`);
    try {
      await this.driver.navigate(catalogUrl);
      await this.driver.waitForPresence(SELECTORS.catalog.sectionHeader, timeout);
    } catch (err) {
      throw new CatalogLoadError(catalogUrl, err);
    }

    // ── 2–3. Collect & classify ──────────────────────────────
    const links = await readCardLinks(this.driver);
    const targets = links.map((link) => toNavigationTarget(link.url));

    const direct = targets.filter((t) => t.strategy === 'direct');
    const indirect = targets.filter((t) => t.strategy === 'indirect').map((t) => t.url);
    const unsupported = targets.filter((t) => t.strategy === 'unsupported').map((t) => t.url);

    logger.info(
      `Found ${targets.length} card link(s): ${direct.length} direct, ` +
        `${indirect.length} indirect, ${unsupported.length} unsupported`,
    );
    for (const url of unsupported) {
      logger.warn(`Unsupported link shape, skipping: ${url}`);
    }

    // ── 4. Direct targets ────────────────────────────────────
    const directOutcomes: TargetOutcome[] = [];
    for (const target of direct) {
      directOutcomes.push(await this.visitDirect(target));
    }

    // ── 5. Indirect targets ──────────────────────────────────
    const indirectOutcomes = indirect.length > 0
      ? await this.revisit.revisit(catalogUrl, indirect)
      : [];

    return {
      catalogUrl,
      direct: directOutcomes,
      indirect: indirectOutcomes,
      unsupported,
    };
  }

  /** Navigate to a pick-list page and extract its table.  Never throws. */
  private async visitDirect(target: NavigationTarget): Promise<TargetOutcome> {
    logger.info(`Fetching details from ${target.url}`);
    try {
      await this.driver.navigate(target.url);
      const container = await this.driver.waitForPresence(
        SELECTORS.tables.direct,
        this.config.timing.waitTimeoutMs,
      );
      const region = await snapshotRegion(container);
      const records = await safeExtract(region, this.config.extraction, target.url);
      reportRecords(records, target, this.sink);
      return { url: target.url, strategy: 'direct', status: 'extracted', records };
    } catch (err) {
      const reason = describeError(err);
      logger.error(`Could not extract ${target.url}: ${reason}`);
      return { url: target.url, strategy: 'direct', status: 'failed', records: [], reason };
    }
  }
}
