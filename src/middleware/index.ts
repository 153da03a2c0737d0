/**
 * Barrel export for the browser-facing layer.
 */

export { PuppeteerDriver, PuppeteerElement } from './puppeteerDriver';
export { humanType, sleep } from './humanBehavior';
export { getNavigationLimiter, clearNavigationLimiters } from './throttle';
