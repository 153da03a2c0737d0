/**
 * Public API of the crawler package.
 */

export { PortalCrawler } from './portalCrawler';
export type { PortalCrawlerOptions } from './portalCrawler';
export { loadPortalConfig } from './core/config';
export type { PortalConfig } from './core/config';
export { BrowserManager } from './core/browserManager';
export * from './core/errors';
export type * from './core/driver';
export type * from './core/types';
export * from './agents';
export * from './scrapers';
