/**
 * `PortalDriver` over a live Puppeteer page.
 *
 * Maps Puppeteer's `TimeoutError` to `WaitTimeoutError` and a null
 * `waitForSelector` result to `ElementNotFoundError`, so callers only deal
 * with the portal error taxonomy.  Navigations go through the per-host
 * Bottleneck limiter.
 */

import { TimeoutError, type ElementHandle, type Page } from 'puppeteer-core';
import type {
  ConfirmKey,
  Locator,
  PortalDriver,
  PortalElement,
  SessionCookie,
} from '../core/driver';
import type { PortalConfig } from '../core/config';
import { ElementNotFoundError, PortalError, WaitTimeoutError } from '../core/errors';
import { Logger } from '../core/logger';
import { humanType, sleep } from './humanBehavior';
import { getNavigationLimiter } from './throttle';

const logger = new Logger('PuppeteerDriver');

/** Page loads get more room than element waits. */
const NAVIGATION_TIMEOUT_FACTOR = 3;

async function guard<T>(what: string, timeoutMs: number, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof TimeoutError) throw new WaitTimeoutError(what, timeoutMs, err);
    throw err;
  }
}

// ─── Element ────────────────────────────────────────────────

export class PuppeteerElement implements PortalElement {
  constructor(
    private readonly page: Page,
    readonly handle: ElementHandle<Element>,
    private readonly locator: Locator,
  ) {}

  async text(): Promise<string> {
    return this.handle.evaluate((el) =>
      el instanceof HTMLElement ? el.innerText : el.textContent ?? '',
    );
  }

  async attribute(name: string): Promise<string | null> {
    return this.handle.evaluate((el, attr) => el.getAttribute(attr), name);
  }

  async click(): Promise<void> {
    await this.handle.click();
  }

  async sendKeystroke(key: ConfirmKey): Promise<void> {
    await this.handle.focus();
    await this.handle.press(key);
  }

  async waitUntilInteractable(timeoutMs: number): Promise<void> {
    await guard(`${this.locator} to become interactable`, timeoutMs, () =>
      this.page.waitForFunction(
        (el: Element) => {
          const box = el.getBoundingClientRect();
          const style = window.getComputedStyle(el);
          return (
            box.width > 0 &&
            box.height > 0 &&
            style.visibility !== 'hidden' &&
            style.pointerEvents !== 'none' &&
            !el.hasAttribute('disabled')
          );
        },
        { timeout: timeoutMs },
        this.handle,
      ),
    );
  }

  async type(text: string): Promise<void> {
    await humanType(this.handle, text);
  }

  async outerHtml(): Promise<string> {
    return this.handle.evaluate((el) => el.outerHTML);
  }

  async findAll(locator: Locator): Promise<PuppeteerElement[]> {
    const handles = await this.handle.$$(locator);
    return handles.map((h) => new PuppeteerElement(this.page, h, locator));
  }

  async findOne(locator: Locator): Promise<PuppeteerElement | null> {
    const handle = await this.handle.$(locator);
    return handle ? new PuppeteerElement(this.page, handle, locator) : null;
  }
}

// ─── Driver ─────────────────────────────────────────────────

export class PuppeteerDriver implements PortalDriver {
  constructor(
    private readonly page: Page,
    private readonly config: PortalConfig,
  ) {}

  async navigate(url: string): Promise<void> {
    const timeout = this.config.timing.waitTimeoutMs * NAVIGATION_TIMEOUT_FACTOR;
    const limiter = getNavigationLimiter(url, this.config.timing.rateLimitMs);

    logger.debug(`Navigating to ${url}`);
    await guard(`navigation to ${url}`, timeout, () =>
      limiter.schedule(() => this.page.goto(url, { waitUntil: 'domcontentloaded', timeout })),
    );
  }

  currentUrl(): string {
    return this.page.url();
  }

  async waitForPresence(locator: Locator, timeoutMs: number): Promise<PuppeteerElement> {
    const handle = await guard(locator, timeoutMs, () =>
      this.page.waitForSelector(locator, { timeout: timeoutMs }),
    );
    if (!handle) throw new ElementNotFoundError(locator);
    return new PuppeteerElement(this.page, handle, locator);
  }

  async waitForClickable(locator: Locator, timeoutMs: number): Promise<PuppeteerElement> {
    const handle = await guard(`${locator} to become visible`, timeoutMs, () =>
      this.page.waitForSelector(locator, { visible: true, timeout: timeoutMs }),
    );
    if (!handle) throw new ElementNotFoundError(locator);

    const element = new PuppeteerElement(this.page, handle, locator);
    await element.waitUntilInteractable(timeoutMs);
    return element;
  }

  async waitForTitle(fragment: string, timeoutMs: number): Promise<void> {
    await guard(`title containing "${fragment}"`, timeoutMs, () =>
      this.page.waitForFunction(
        (expected: string) => document.title.includes(expected),
        { timeout: timeoutMs },
        fragment,
      ),
    );
  }

  async findAll(locator: Locator): Promise<PuppeteerElement[]> {
    const handles = await this.page.$$(locator);
    return handles.map((h) => new PuppeteerElement(this.page, h, locator));
  }

  async findOne(locator: Locator): Promise<PuppeteerElement | null> {
    const handle = await this.page.$(locator);
    return handle ? new PuppeteerElement(this.page, handle, locator) : null;
  }

  async scrollIntoView(element: PortalElement): Promise<void> {
    if (!(element instanceof PuppeteerElement)) {
      throw new PortalError('scrollIntoView needs an element from this driver', {
        code: 'FOREIGN_ELEMENT',
      });
    }
    await element.handle.evaluate((el) => el.scrollIntoView({ block: 'center' }));
  }

  async pause(ms: number): Promise<void> {
    await sleep(ms);
  }

  async exportCookies(): Promise<SessionCookie[]> {
    const cookies = await this.page.cookies();
    return cookies.map((c) => ({
      name: c.name,
      value: c.value,
      domain: c.domain,
      path: c.path,
      expires: c.expires,
      httpOnly: c.httpOnly,
      secure: c.secure,
      sameSite: c.sameSite,
    }));
  }

  async importCookies(cookies: SessionCookie[]): Promise<void> {
    if (cookies.length === 0) return;
    await this.page.setCookie(...cookies);
  }
}
