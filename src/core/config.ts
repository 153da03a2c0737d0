/**
 * Environment → PortalConfig, validated once at startup.
 *
 * `loadPortalConfig()` is the only place that reads the environment.  The
 * CLI loads `.env` (dotenv) before calling it; the resulting object is
 * injected into every component that needs a setting.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';
import type { FilterRules, MissingColumnPolicy } from './types';

// ─── Defaults ──────────────────────────────────────────────

const DEFAULT_WANTED_COLUMNS = 'Name,Ticker,Fair Value,Price/Fair Value';
const DEFAULT_COLUMN_FILTERS = '{"Base Currency":["US Dollar"]}';

// ─── Schema ────────────────────────────────────────────────

const commaList = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )
  .pipe(z.array(z.string()).min(1));

const filterRulesJson = z.string().transform((raw, ctx) => {
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
    return z.NEVER;
  }
}).pipe(z.record(z.string(), z.array(z.string()).min(1)));

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((raw) => raw === 'true' || raw === '1');

const millis = z.coerce.number().int().nonnegative();

const envSchema = z.object({
  PORTAL_BASE_URL: z.string().url(),
  PORTAL_LOGIN_URL: z.string().url(),
  PORTAL_LOGIN: z.string().min(1),
  PORTAL_PASSWORD: z.string().min(1),
  CATALOG_PATHS: commaList.default('/stocks'),
  NEWSLETTER_PATH: z.string().min(1).default('/collections/767/stock-investor-publications'),
  NEWSLETTER_TITLE: z.string().min(1).default('Stock Investor'),
  DOWNLOAD_DIR: z.string().min(1).default('/tmp/downloads'),
  WANTED_COLUMNS: commaList.default(DEFAULT_WANTED_COLUMNS),
  COLUMN_FILTERS: filterRulesJson.default(DEFAULT_COLUMN_FILTERS),
  MISSING_FILTER_COLUMN: z.enum(['admit', 'reject']).default('admit'),
  WAIT_TIMEOUT_MS: millis.default(10_000),
  LAYOUT_SETTLE_MS: millis.default(2_000),
  DOWNLOAD_SETTLE_MS: millis.default(7_000),
  RATE_LIMIT_MS: millis.default(1_000),
  HEADLESS: booleanFlag.default('true'),
  CHROME_EXECUTABLE_PATH: z.string().min(1).optional(),
  COOKIE_FILE: z.string().min(1).default('.portal-cookies.json'),
  COOKIE_TTL_HOURS: z.coerce.number().positive().default(12),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

// ─── Config object ─────────────────────────────────────────

export interface PortalConfig {
  baseUrl: string;
  loginUrl: string;
  login: string;
  password: string;
  /** Absolute catalog URLs, crawled in order. */
  catalogUrls: string[];
  newsletterUrl: string;
  newsletterTitle: string;
  downloadDir: string;
  extraction: {
    wantedColumns: ReadonlySet<string>;
    filters: FilterRules;
    missingFilterColumn: MissingColumnPolicy;
  };
  timing: {
    waitTimeoutMs: number;
    layoutSettleMs: number;
    downloadSettleMs: number;
    rateLimitMs: number;
  };
  browser: {
    headless: boolean;
    executablePath?: string;
  };
  session: {
    cookieFile: string;
    cookieTtlHours: number;
  };
  logLevel: LogLevel;
}

/**
 * Build a PortalConfig from an environment map.
 *
 * Blank values count as unset so an empty line in `.env` falls back to the
 * default (or fails, for required keys).
 *
 * @throws ConfigError listing every invalid or missing variable.
 */
export function loadPortalConfig(
  env: Record<string, string | undefined> = process.env,
): PortalConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  const filters = new Map<string, ReadonlySet<string>>();
  for (const [column, accepted] of Object.entries(e.COLUMN_FILTERS)) {
    filters.set(column, new Set(accepted));
  }

  return {
    baseUrl: e.PORTAL_BASE_URL,
    loginUrl: e.PORTAL_LOGIN_URL,
    login: e.PORTAL_LOGIN,
    password: e.PORTAL_PASSWORD,
    catalogUrls: e.CATALOG_PATHS.map((path) => new URL(path, e.PORTAL_BASE_URL).href),
    newsletterUrl: new URL(e.NEWSLETTER_PATH, e.PORTAL_BASE_URL).href,
    newsletterTitle: e.NEWSLETTER_TITLE,
    downloadDir: e.DOWNLOAD_DIR,
    extraction: {
      wantedColumns: new Set(e.WANTED_COLUMNS),
      filters,
      missingFilterColumn: e.MISSING_FILTER_COLUMN,
    },
    timing: {
      waitTimeoutMs: e.WAIT_TIMEOUT_MS,
      layoutSettleMs: e.LAYOUT_SETTLE_MS,
      downloadSettleMs: e.DOWNLOAD_SETTLE_MS,
      rateLimitMs: e.RATE_LIMIT_MS,
    },
    browser: {
      headless: e.HEADLESS,
      executablePath: e.CHROME_EXECUTABLE_PATH,
    },
    session: {
      cookieFile: e.COOKIE_FILE,
      cookieTtlHours: e.COOKIE_TTL_HOURS,
    },
    logLevel: e.LOG_LEVEL,
  };
}
