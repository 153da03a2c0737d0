/**
 * Capability interfaces the crawl logic is written against.
 *
 * The navigators, the extractor and the newsletter fetcher never touch
 * Puppeteer types.  They depend on the small capabilities below, which
 * `PuppeteerDriver` implements for a live page and the cheerio-backed
 * snapshot / test drivers implement for static HTML.
 *
 * Locators are CSS selectors.  Every call may reject with
 * `ElementNotFoundError` or `WaitTimeoutError`.
 */

export type Locator = string;

/** Keys a reveal can be confirmed with. */
export type ConfirmKey = 'Enter' | 'Space';

/** Can look up descendants. */
export interface Locatable<E> {
  findAll(locator: Locator): Promise<E[]>;
  /** `null` when nothing matches. */
  findOne(locator: Locator): Promise<E | null>;
}

/** Exposes rendered text and attributes. */
export interface TextBearing {
  /** Visible text, untrimmed. */
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
}

/** Can be activated. */
export interface Clickable {
  click(): Promise<void>;
  /** Focus the element and press a key on it (an in-place activation). */
  sendKeystroke(key: ConfirmKey): Promise<void>;
  /** Resolve once the element is visible, sized and enabled. */
  waitUntilInteractable(timeoutMs: number): Promise<void>;
}

/** Read-only element: enough for table extraction. */
export interface ReadableElement extends TextBearing, Locatable<ReadableElement> {}

export interface PortalElement extends TextBearing, Clickable, Locatable<PortalElement> {
  /** Type into a form field. */
  type(text: string): Promise<void>;
  /** Serialized markup of the element and its subtree. */
  outerHtml(): Promise<string>;
}

/** Cookie shape persisted between runs. */
export interface SessionCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}

/** The single browser tab a run drives. */
export interface PortalDriver extends Locatable<PortalElement> {
  navigate(url: string): Promise<void>;
  currentUrl(): string;
  waitForPresence(locator: Locator, timeoutMs: number): Promise<PortalElement>;
  waitForClickable(locator: Locator, timeoutMs: number): Promise<PortalElement>;
  /** Resolve once `document.title` contains `fragment`. */
  waitForTitle(fragment: string, timeoutMs: number): Promise<void>;
  scrollIntoView(element: PortalElement): Promise<void>;
  /** Fixed settle delay for rendering that has no completion signal. */
  pause(ms: number): Promise<void>;
  exportCookies(): Promise<SessionCookie[]>;
  importCookies(cookies: SessionCookie[]): Promise<void>;
}

/** Owns the browser for a run and lends its page out as a driver. */
export interface DriverSession {
  withDriver<T>(fn: (driver: PortalDriver) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
