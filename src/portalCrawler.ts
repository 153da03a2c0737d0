/**
 * The orchestrator that ties every layer together.
 *
 *   1. SESSION     → SessionGate (saved cookies, else login)
 *   2. HOLDINGS    → CatalogNavigator per catalog URL, each in its own
 *                    error boundary (pick-list pages directly, model
 *                    portfolios through the RevisitProtocol)
 *   3. NEWSLETTERS → NewsletterFetcher (skip issues already on disk)
 *
 * The browser belongs to the crawler for the whole run and is closed in
 * `finally`, whatever happened.
 */

import { DateTime } from 'luxon';
import type { PortalConfig } from './core/config';
import type { DriverSession, PortalDriver } from './core/driver';
import { BrowserManager } from './core/browserManager';
import { Logger, describeError } from './core/logger';
import type { CatalogReport, RecordSink, RunMode, RunSummary } from './core/types';
import { CatalogNavigator, NewsletterFetcher, SessionGate } from './agents';

const logger = new Logger('PortalCrawler');

export interface PortalCrawlerOptions {
  /** Browser owner; a BrowserManager built from config otherwise. */
  session?: DriverSession;
  sink?: RecordSink;
}

export class PortalCrawler {
  private readonly session: DriverSession;
  private readonly sink?: RecordSink;

  constructor(
    private readonly config: PortalConfig,
    options: PortalCrawlerOptions = {},
  ) {
    Logger.setLevel(config.logLevel);
    this.session = options.session ?? new BrowserManager(config);
    this.sink = options.sink;
  }

  /**
   * Run `mode` end to end.
   *
   * Per-catalog and per-stage failures are recorded in the summary.  A
   * login failure (or anything unexpected) propagates after the browser
   * is closed.
   */
  async run(mode: RunMode): Promise<RunSummary> {
    const startedAt = timestamp();
    logger.info(`Starting ${mode} run`);

    try {
      const summary = await this.session.withDriver(async (driver) => {
        const how = await new SessionGate(driver, this.config).open();
        logger.info(`Session ready (${how})`);

        const failures: RunSummary['failures'] = [];
        const catalogs = mode === 'newsletters' ? [] : await this.crawlCatalogs(driver, failures);
        const downloads = mode === 'holdings' ? [] : await this.fetchNewsletters(driver, failures);

        return { mode, startedAt, finishedAt: timestamp(), catalogs, downloads, failures };
      });

      const records = summary.catalogs
        .flatMap((c) => [...c.direct, ...c.indirect])
        .reduce((n, outcome) => n + outcome.records.length, 0);
      logger.info(
        `Run complete: ${records} record(s) from ${summary.catalogs.length} catalog(s), ` +
          `${summary.downloads.length} download(s), ${summary.failures.length} failure(s)`,
      );
      return summary;
    } finally {
      await this.session.close();
    }
  }

  // ── Stages ─────────────────────────────────────────────────

  private async crawlCatalogs(
    driver: PortalDriver,
    failures: RunSummary['failures'],
  ): Promise<CatalogReport[]> {
    const navigator = new CatalogNavigator(driver, this.config, { sink: this.sink });
    const reports: CatalogReport[] = [];

    for (const catalogUrl of this.config.catalogUrls) {
      try {
        reports.push(await navigator.navigateCatalog(catalogUrl));
      } catch (err) {
        logger.error(`Catalog ${catalogUrl} aborted: ${describeError(err)}`);
        failures.push({ stage: `catalog ${catalogUrl}`, reason: describeError(err) });
      }
    }
    return reports;
  }

  private async fetchNewsletters(
    driver: PortalDriver,
    failures: RunSummary['failures'],
  ): Promise<string[]> {
    try {
      return await new NewsletterFetcher(driver, this.config).fetchNewsletters();
    } catch (err) {
      logger.error(`Newsletter fetch aborted: ${describeError(err)}`);
      failures.push({ stage: 'newsletters', reason: describeError(err) });
      return [];
    }
  }
}

function timestamp(): string {
  return DateTime.now().toUTC().toISO() ?? new Date().toISOString();
}
