/**
 * Filtered, column-projected records from a rendered table.
 *
 * The extractor reads a region through the read-only `ReadableElement`
 * capability, so the same code runs against:
 *   • a live `PortalElement` (one browser round trip per cell), or
 *   • a `SnapshotElement`: the region's outerHTML parsed with cheerio,
 *     which is what the navigators use: one round trip per table.
 *
 * Header positions are the join key between labels and cells and are
 * rediscovered on every call.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI, Element } from 'cheerio';
import type { PortalElement, ReadableElement } from '../core/driver';
import type { ExtractedRecord, ExtractionSpec } from '../core/types';
import { SELECTORS, type TableSelectors } from '../core/selectors';
import { Logger, describeError } from '../core/logger';

const logger = new Logger('TableExtractor');

// ─── Snapshot element ──────────────────────────────────────

/** A cheerio-backed, read-only view of an HTML fragment. */
export class SnapshotElement implements ReadableElement {
  constructor(
    private readonly $: CheerioAPI,
    private readonly node: Cheerio<Element>,
  ) {}

  /** Parse `html` as a fragment; the first top-level element becomes the root. */
  static fromHtml(html: string): SnapshotElement {
    const $ = cheerio.load(html, null, false);
    return new SnapshotElement($, $.root().children().first());
  }

  async text(): Promise<string> {
    return this.node.text();
  }

  async attribute(name: string): Promise<string | null> {
    return this.node.attr(name) ?? null;
  }

  async findAll(locator: string): Promise<SnapshotElement[]> {
    return this.node
      .find(locator)
      .toArray()
      .map((el) => new SnapshotElement(this.$, this.$(el)));
  }

  async findOne(locator: string): Promise<SnapshotElement | null> {
    const [first] = await this.findAll(locator);
    return first ?? null;
  }
}

/** Copy a live region into a snapshot so extraction never touches the page again. */
export async function snapshotRegion(element: PortalElement): Promise<SnapshotElement> {
  return SnapshotElement.fromHtml(await element.outerHtml());
}

// ─── Extraction ────────────────────────────────────────────

/**
 * Extract records from `region`.
 *
 * A row contributes a record only when its cell count equals the header
 * count and every filtered column present in the header holds an accepted
 * value.  Labels and values are compared with their whitespace collapsed.
 * Filtered columns missing from the header follow `spec.missingFilterColumn`.
 * Wanted columns missing from the header are simply absent from the
 * records.  Row order is document order.
 */
export async function extractRecords(
  region: ReadableElement,
  spec: ExtractionSpec,
  selectors: TableSelectors = SELECTORS.tables,
): Promise<ExtractedRecord[]> {
  // ── 1. Header scan ───────────────────────────────────────

  const headerCells = await region.findAll(selectors.headerCell);
  const wantedIndex = new Map<string, number>();
  const filterIndex = new Map<number, string>();
  const seen = new Set<string>();

  for (let i = 0; i < headerCells.length; i++) {
    const label = await renderedText(headerCells[i]);
    seen.add(label);
    if (spec.wantedColumns.has(label)) wantedIndex.set(label, i);
    if (spec.filters.has(label)) filterIndex.set(i, label);
  }

  const missingFilters = [...spec.filters.keys()].filter((label) => !seen.has(label));
  if (missingFilters.length > 0) {
    if (spec.missingFilterColumn === 'reject') {
      logger.warn(
        `Filter column(s) ${missingFilters.join(', ')} not in header; rejecting every row`,
      );
      return [];
    }
    logger.warn(`Filter column(s) ${missingFilters.join(', ')} not in header; filter not applied`);
  }

  logger.debug(`Header has ${headerCells.length} column(s); wanted at ${formatIndex(wantedIndex)}`);

  // ── 2. Body rows ─────────────────────────────────────────

  const records: ExtractedRecord[] = [];
  const groups = await region.findAll(selectors.bodyGroup);

  for (const group of groups) {
    const rows = await group.findAll(selectors.row);

    for (const row of rows) {
      const cells = await row.findAll(selectors.cell);
      if (cells.length !== headerCells.length) continue;

      let accepted = true;
      for (const [index, label] of filterIndex) {
        const value = await renderedText(cells[index]);
        if (!spec.filters.get(label)?.has(value)) {
          accepted = false;
          break;
        }
      }
      if (!accepted) continue;

      const record: ExtractedRecord = {};
      for (const [label, index] of wantedIndex) {
        record[label] = await renderedText(cells[index]);
      }
      records.push(record);
    }
  }

  return records;
}

/**
 * `extractRecords`, but a failure yields zero records and a diagnostic
 * instead of propagating.  `where` names the page in the log line.
 */
export async function safeExtract(
  region: ReadableElement,
  spec: ExtractionSpec,
  where: string,
): Promise<ExtractedRecord[]> {
  try {
    return await extractRecords(region, spec);
  } catch (err) {
    logger.error(`Table extraction failed on ${where}: ${describeError(err)}`);
    return [];
  }
}

/** Cell text as displayed: whitespace runs collapsed to one space, ends trimmed. */
async function renderedText(element: ReadableElement): Promise<string> {
  return (await element.text()).replace(/\s+/g, ' ').trim();
}

function formatIndex(index: Map<string, number>): string {
  return index.size === 0
    ? '(none)'
    : [...index].map(([label, i]) => `${label}=${i}`).join(', ');
}
