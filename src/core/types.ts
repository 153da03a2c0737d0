/**
 * Shared type definitions for the crawl pipeline.
 *
 * Every layer (navigators, extractor, fetcher, orchestrator) agrees on the
 * shapes below.  Nothing here is persisted: each value is built during one
 * run and discarded at the end of it.
 */

// ─── Navigation ────────────────────────────────────────────

/**
 * How a catalog link is reached.
 *
 *   • `direct`     : the URL renders its own table page.
 *   • `indirect`   : the content only appears after an in-page activation
 *                     of the card on the catalog page.
 *   • `unsupported`: any other link shape; dropped with a warning.
 */
export type LinkStrategy = 'direct' | 'indirect' | 'unsupported';

export interface NavigationTarget {
  url: string;
  strategy: LinkStrategy;
}

// ─── Extraction ────────────────────────────────────────────

/** Column label → accepted cell values. */
export type FilterRules = ReadonlyMap<string, ReadonlySet<string>>;

/** Column label → cell text, for one table row that passed every filter. */
export type ExtractedRecord = Record<string, string>;

/**
 * What to do when a filtered column is not in the page header.
 * `admit` lets every row through that filter; `reject` drops every row.
 */
export type MissingColumnPolicy = 'admit' | 'reject';

export interface ExtractionSpec {
  wantedColumns: ReadonlySet<string>;
  filters: FilterRules;
  missingFilterColumn: MissingColumnPolicy;
}

// ─── Outcomes ──────────────────────────────────────────────

export type TargetStatus = 'extracted' | 'skipped' | 'failed';

/** The result of visiting one Direct or Indirect target. */
export interface TargetOutcome {
  url: string;
  strategy: Exclude<LinkStrategy, 'unsupported'>;
  status: TargetStatus;
  records: ExtractedRecord[];
  /** Why the target produced nothing, when it did not. */
  reason?: string;
  /** Revisit states passed through (Indirect targets only). */
  trail?: string[];
}

export interface CatalogReport {
  catalogUrl: string;
  direct: TargetOutcome[];
  indirect: TargetOutcome[];
  unsupported: string[];
}

/** Called once per record as soon as it is extracted. */
export type RecordSink = (record: ExtractedRecord, target: NavigationTarget) => void;

// ─── Newsletters ───────────────────────────────────────────

export interface NewsletterEntry {
  sourceUrl: string;
  displayText: string;
}

// ─── Run summary ───────────────────────────────────────────

export type RunMode = 'holdings' | 'newsletters' | 'all';

export interface RunSummary {
  mode: RunMode;
  startedAt: string;
  finishedAt: string;
  catalogs: CatalogReport[];
  downloads: string[];
  /** Catalog pages or stages that aborted, with the reason. */
  failures: Array<{ stage: string; reason: string }>;
}
