/**
 * Reveal model-portfolio targets in place on the catalog.
 *
 * A model-portfolio URL does not render its table when navigated to.  The
 * table only appears after the matching card is activated on the catalog
 * page itself.  For every queued target the protocol walks this machine:
 *
 *   Start ─▶ AtCatalogRoot ─▶ PanelCollapsed ─▶ HeaderInView ─▶ CardActivated ─▶ DetailRevealed
 *     │            │                                  │               │
 *     └────────────┴───────────── failure ───────────┴───────────────┴──▶ Skipped
 *
 * Collapsing the side panel (only when it is expanded) and scrolling the
 * header are best effort and never fail their transition.  Cards are
 * re-enumerated on every visit and matched by exact URL, since the catalog
 * re-renders them between loads.
 * One target's failure never stops the remaining targets.
 */

import type { PortalConfig } from '../core/config';
import type { PortalDriver } from '../core/driver';
import { ElementNotFoundError } from '../core/errors';
import { Logger, describeError } from '../core/logger';
import { SELECTORS } from '../core/selectors';
import type {
  ExtractedRecord,
  ExtractionSpec,
  NavigationTarget,
  RecordSink,
  TargetOutcome,
} from '../core/types';
import { extractRecords, snapshotRegion } from '../scrapers/tableExtractor';
import { readCardLinks, reportRecords } from './catalogCards';

const logger = new Logger('RevisitProtocol');

// ─── States & transitions ──────────────────────────────────

export type RevisitState =
  | 'Start'
  | 'AtCatalogRoot'
  | 'PanelCollapsed'
  | 'HeaderInView'
  | 'CardActivated'
  | 'DetailRevealed'
  | 'Skipped';

interface RevisitContext {
  catalogUrl: string;
  targetUrl: string;
  records: ExtractedRecord[];
}

interface Transition {
  from: RevisitState;
  to: RevisitState;
  run(ctx: RevisitContext): Promise<void>;
}

/** Raised when no re-enumerated card links to the target. */
export class CardNotFoundError extends ElementNotFoundError {
  constructor(targetUrl: string) {
    super(`${SELECTORS.catalog.cardTitle} linking to ${targetUrl}`);
  }
}

export interface RevisitOptions {
  sink?: RecordSink;
}

export class RevisitProtocol {
  private readonly transitions: Transition[];
  private readonly timeoutMs: number;
  private readonly extraction: ExtractionSpec;

  constructor(
    private readonly driver: PortalDriver,
    private readonly config: PortalConfig,
    private readonly options: RevisitOptions = {},
  ) {
    this.timeoutMs = config.timing.waitTimeoutMs;
    this.extraction = config.extraction;
    this.transitions = [
      { from: 'Start', to: 'AtCatalogRoot', run: (ctx) => this.returnToCatalog(ctx) },
      { from: 'AtCatalogRoot', to: 'PanelCollapsed', run: () => this.collapseSidePanel() },
      { from: 'PanelCollapsed', to: 'HeaderInView', run: () => this.bringHeaderIntoView() },
      { from: 'HeaderInView', to: 'CardActivated', run: (ctx) => this.activateCard(ctx) },
      { from: 'CardActivated', to: 'DetailRevealed', run: (ctx) => this.readRevealedTable(ctx) },
    ];
  }

  /** Visit every queued target in order; one outcome per target. */
  async revisit(catalogUrl: string, queue: readonly string[]): Promise<TargetOutcome[]> {
    const outcomes: TargetOutcome[] = [];
    for (const [position, targetUrl] of queue.entries()) {
      logger.info(`Revisiting ${position + 1}/${queue.length}: ${targetUrl}`);
      outcomes.push(await this.revisitOne(catalogUrl, targetUrl));
    }
    return outcomes;
  }

  /** Run the machine for one target.  Never throws. */
  async revisitOne(catalogUrl: string, targetUrl: string): Promise<TargetOutcome> {
    const ctx: RevisitContext = { catalogUrl, targetUrl, records: [] };
    const trail: RevisitState[] = ['Start'];
    let state: RevisitState = 'Start';

    for (const transition of this.transitions) {
      if (transition.from !== state) continue;
      try {
        await transition.run(ctx);
        state = transition.to;
        trail.push(state);
      } catch (err) {
        trail.push('Skipped');
        const notFound = err instanceof CardNotFoundError;
        const reason = `${state} → ${transition.to}: ${describeError(err)}`;
        if (notFound) {
          logger.warn(`No card links to ${targetUrl} after revisit, moving on`);
        } else {
          logger.error(`Revisit of ${targetUrl} failed (${reason})`);
        }
        return {
          url: targetUrl,
          strategy: 'indirect',
          status: notFound ? 'skipped' : 'failed',
          records: [],
          reason,
          trail,
        };
      }
    }

    const target: NavigationTarget = { url: targetUrl, strategy: 'indirect' };
    reportRecords(ctx.records, target, this.options.sink);
    return { url: targetUrl, strategy: 'indirect', status: 'extracted', records: ctx.records, trail };
  }

  // ── Transition actions ───────────────────────────────────

  private async returnToCatalog(ctx: RevisitContext): Promise<void> {
    await this.driver.navigate(ctx.catalogUrl);
    await this.driver.waitForPresence(SELECTORS.catalog.sectionHeader, this.timeoutMs);
  }

  private async collapseSidePanel(): Promise<void> {
    try {
      const toggle = await this.driver.findOne(SELECTORS.catalog.sidePanelToggle);
      if (!toggle) {
        logger.debug('No side panel toggle on this load');
        return;
      }
      // The portal remembers a collapsed panel across loads.
      if ((await toggle.attribute('aria-expanded')) === 'false') {
        logger.debug('Side panel already collapsed');
        return;
      }
      await toggle.click();
    } catch (err) {
      logger.debug(`Side panel not collapsed: ${describeError(err)}`);
    }
  }

  private async bringHeaderIntoView(): Promise<void> {
    try {
      const headers = await this.driver.findAll(SELECTORS.catalog.sectionHeader);
      if (headers.length >= 2) {
        await this.driver.scrollIntoView(headers[1]);
      } else {
        logger.debug(`Only ${headers.length} section header(s); not scrolling`);
      }
    } catch (err) {
      logger.debug(`Header not scrolled into view: ${describeError(err)}`);
    }
    await this.driver.pause(this.config.timing.layoutSettleMs);
  }

  private async activateCard(ctx: RevisitContext): Promise<void> {
    const links = await readCardLinks(this.driver);
    const match = links.find((link) => link.url === ctx.targetUrl);
    if (!match) throw new CardNotFoundError(ctx.targetUrl);

    await match.title.waitUntilInteractable(this.timeoutMs);
    await match.title.sendKeystroke('Enter');
  }

  private async readRevealedTable(ctx: RevisitContext): Promise<void> {
    const container = await this.driver.waitForPresence(SELECTORS.tables.indirect, this.timeoutMs);
    ctx.records = await extractRecords(await snapshotRegion(container), this.extraction);
  }
}
