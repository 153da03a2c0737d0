/**
 * In-process stand-in for the browser: every page is an HTML string parsed
 * with cheerio.  Navigation replaces the document, so element handles from a
 * previous load go stale exactly as they would in a live tab.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI, Element } from 'cheerio';
import type {
  ConfirmKey,
  Locator,
  PortalDriver,
  PortalElement,
  SessionCookie,
} from '../../src/core/driver';
import { PortalError, WaitTimeoutError } from '../../src/core/errors';

const BLANK = '<html><head><title></title></head><body></body></html>';

export interface FakeSite {
  /** URL → full document HTML. */
  pages: Record<string, string>;
  /** Card link URL → markup appended to <body> when that card is activated. */
  reveals?: Record<string, string>;
  /** URLs whose navigation times out. */
  timeouts?: string[];
  onClick?: (element: FakeElement, driver: FakeDriver) => void;
  onKeystroke?: (element: FakeElement, key: ConfirmKey, driver: FakeDriver) => void;
}

export class FakeElement implements PortalElement {
  constructor(
    private readonly driver: FakeDriver,
    readonly node: Cheerio<Element>,
    private readonly generation: number,
  ) {}

  async text(): Promise<string> {
    this.ensureAttached();
    return this.node.text();
  }

  async attribute(name: string): Promise<string | null> {
    this.ensureAttached();
    return this.node.attr(name) ?? null;
  }

  async click(): Promise<void> {
    this.ensureAttached();
    this.driver.clicks.push(this.describe());
    this.driver.site.onClick?.(this, this.driver);
  }

  async sendKeystroke(key: ConfirmKey): Promise<void> {
    this.ensureAttached();
    this.driver.keystrokes.push({ element: this.describe(), key });
    this.driver.activate(this, key);
  }

  async waitUntilInteractable(timeoutMs: number): Promise<void> {
    this.ensureAttached();
    if (this.node.is('[data-inert]')) {
      throw new WaitTimeoutError(`${this.describe()} to become interactable`, timeoutMs);
    }
  }

  async type(text: string): Promise<void> {
    this.ensureAttached();
    this.driver.typed.push({ element: this.describe(), text });
  }

  async outerHtml(): Promise<string> {
    this.ensureAttached();
    return this.driver.$.html(this.node);
  }

  async findAll(locator: Locator): Promise<FakeElement[]> {
    this.ensureAttached();
    return this.node
      .find(locator)
      .toArray()
      .map((el) => this.driver.wrap(el));
  }

  async findOne(locator: Locator): Promise<FakeElement | null> {
    const [first] = await this.findAll(locator);
    return first ?? null;
  }

  /** `#id`, `[href]` or `.class` of the element, for assertions. */
  describe(): string {
    const id = this.node.attr('id');
    if (id) return `#${id}`;
    const href = this.node.attr('href');
    if (href) return `[href=${href}]`;
    return `.${this.node.attr('class') ?? 'element'}`;
  }

  private ensureAttached(): void {
    if (this.generation !== this.driver.generation) {
      throw new PortalError(`Stale element ${this.describe()}`, { code: 'STALE_ELEMENT' });
    }
  }
}

export class FakeDriver implements PortalDriver {
  $: CheerioAPI = cheerio.load(BLANK);
  generation = 0;

  readonly navigations: string[] = [];
  readonly clicks: string[] = [];
  readonly keystrokes: Array<{ element: string; key: ConfirmKey }> = [];
  readonly typed: Array<{ element: string; text: string }> = [];
  readonly scrolled: string[] = [];
  readonly pauses: number[] = [];
  readonly importedCookies: SessionCookie[] = [];
  cookies: SessionCookie[] = [];

  private url = 'about:blank';

  constructor(readonly site: FakeSite) {}

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    if (this.site.timeouts?.includes(url)) {
      throw new WaitTimeoutError(`navigation to ${url}`, 0);
    }
    this.show(url, this.site.pages[url] ?? BLANK);
  }

  /** Replace the current document, as a page load would. */
  show(url: string, html: string): void {
    this.url = url;
    this.$ = cheerio.load(html);
    this.generation += 1;
  }

  currentUrl(): string {
    return this.url;
  }

  async waitForPresence(locator: Locator, timeoutMs: number): Promise<FakeElement> {
    const element = await this.findOne(locator);
    if (!element) throw new WaitTimeoutError(locator, timeoutMs);
    return element;
  }

  async waitForClickable(locator: Locator, timeoutMs: number): Promise<FakeElement> {
    const element = await this.waitForPresence(locator, timeoutMs);
    await element.waitUntilInteractable(timeoutMs);
    return element;
  }

  async waitForTitle(fragment: string, timeoutMs: number): Promise<void> {
    if (!this.$('title').text().includes(fragment)) {
      throw new WaitTimeoutError(`title containing "${fragment}"`, timeoutMs);
    }
  }

  async findAll(locator: Locator): Promise<FakeElement[]> {
    return this.$.root()
      .find(locator)
      .toArray()
      .map((el) => this.wrap(el));
  }

  async findOne(locator: Locator): Promise<FakeElement | null> {
    const [first] = await this.findAll(locator);
    return first ?? null;
  }

  async scrollIntoView(element: PortalElement): Promise<void> {
    this.scrolled.push((await element.text()).trim());
  }

  async pause(ms: number): Promise<void> {
    this.pauses.push(ms);
  }

  async exportCookies(): Promise<SessionCookie[]> {
    return this.cookies;
  }

  async importCookies(cookies: SessionCookie[]): Promise<void> {
    this.importedCookies.push(...cookies);
  }

  wrap(el: Element): FakeElement {
    return new FakeElement(this, this.$(el), this.generation);
  }

  /** Apply a keyboard activation: reveal the card's content if one is scripted. */
  activate(element: FakeElement, key: ConfirmKey): void {
    const href = element.node.attr('href');
    if (key === 'Enter' && href) {
      const reveal = this.site.reveals?.[new URL(href, this.url).href];
      if (reveal) this.$('body').append(reveal);
    }
    this.site.onKeystroke?.(element, key, this);
  }
}
