/**
 * Authenticate the run's browser session once.
 *
 * 1. **Cookie reuse:**  If a cookie file younger than `COOKIE_TTL_HOURS`
 *    exists, load it and probe the portal home for the navigation marker.
 * 2. **Login:**  Otherwise (or if the probe fails) fill the identifier and
 *    secret fields on the login page, confirm with Enter and wait for the
 *    marker.
 * 3. **Persist:**  Save the authenticated cookies for the next run.
 *
 * A failed login throws `LoginError`; nothing else in the run can proceed
 * without a session.
 */

import { readFile, writeFile } from 'fs/promises';
import { DateTime } from 'luxon';
import { z } from 'zod';
import type { PortalConfig } from '../core/config';
import type { PortalDriver, SessionCookie } from '../core/driver';
import { LoginError } from '../core/errors';
import { Logger, describeError } from '../core/logger';
import { SELECTORS } from '../core/selectors';

const logger = new Logger('SessionGate');

const savedCookiesSchema = z.object({
  savedAt: z.string(),
  cookies: z.array(
    z.object({
      name: z.string(),
      value: z.string(),
      domain: z.string().optional(),
      path: z.string().optional(),
      expires: z.number().optional(),
      httpOnly: z.boolean().optional(),
      secure: z.boolean().optional(),
      sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
    }),
  ),
});

export type SessionSource = 'cookies' | 'login';

export class SessionGate {
  constructor(
    private readonly driver: PortalDriver,
    private readonly config: PortalConfig,
  ) {}

  /** Leave the driver on an authenticated page. */
  async open(): Promise<SessionSource> {
    if (await this.resumeFromCookies()) return 'cookies';

    await this.login();
    await this.saveCookies();
    return 'login';
  }

  // ── Login ─────────────────────────────────────────────────

  async login(): Promise<void> {
    const timeout = this.config.timing.waitTimeoutMs;
    logger.info(`Logging in at ${this.config.loginUrl}`);

    try {
      await this.driver.navigate(this.config.loginUrl);
      const identifier = await this.driver.waitForPresence(SELECTORS.login.identifier, timeout);
      const secret = await this.driver.waitForPresence(SELECTORS.login.secret, timeout);

      await identifier.type(this.config.login);
      await secret.type(this.config.password);
      await secret.sendKeystroke('Enter');

      await this.driver.waitForPresence(SELECTORS.login.homeMarker, timeout);
    } catch (err) {
      throw new LoginError(`Login failed: ${describeError(err)}`, err);
    }

    logger.info('Logged in successfully');
  }

  // ── Cookie persistence ────────────────────────────────────

  private async resumeFromCookies(): Promise<boolean> {
    const cookies = await this.readSavedCookies();
    if (!cookies) return false;

    try {
      await this.driver.importCookies(cookies);
      await this.driver.navigate(this.config.baseUrl);
      await this.driver.waitForPresence(SELECTORS.login.homeMarker, this.config.timing.waitTimeoutMs);
    } catch (err) {
      logger.info(`Saved session no longer valid (${describeError(err)}), logging in again`);
      return false;
    }

    logger.info(`Resumed session from ${cookies.length} saved cookie(s)`);
    return true;
  }

  private async readSavedCookies(): Promise<SessionCookie[] | null> {
    const { cookieFile, cookieTtlHours } = this.config.session;

    let raw: string;
    try {
      raw = await readFile(cookieFile, 'utf-8');
    } catch {
      logger.debug(`No saved cookies at ${cookieFile}`);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      logger.warn(`Ignoring unreadable cookie file ${cookieFile}`);
      return null;
    }

    const parsed = savedCookiesSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(`Ignoring malformed cookie file ${cookieFile}`);
      return null;
    }

    const savedAt = DateTime.fromISO(parsed.data.savedAt);
    const ageHours = DateTime.now().diff(savedAt, 'hours').hours;
    if (!savedAt.isValid || ageHours > cookieTtlHours) {
      logger.info(
        `Saved cookies are ${Number.isFinite(ageHours) ? ageHours.toFixed(1) : '?'}h old ` +
          `(TTL: ${cookieTtlHours}h), discarding`,
      );
      return null;
    }

    return parsed.data.cookies;
  }

  private async saveCookies(): Promise<void> {
    const { cookieFile } = this.config.session;
    try {
      const cookies = await this.driver.exportCookies();
      const data = { savedAt: DateTime.now().toISO(), cookies };
      await writeFile(cookieFile, JSON.stringify(data, null, 2));
      logger.info(`Saved ${cookies.length} cookie(s) to ${cookieFile}`);
    } catch (err) {
      logger.warn(`Failed to save cookies: ${describeError(err)}`);
    }
  }
}
