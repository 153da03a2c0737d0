/**
 * Barrel export for the stateful, page-driving layer.
 */

export { SessionGate } from './sessionGate';
export type { SessionSource } from './sessionGate';

export { CatalogNavigator } from './catalogNavigator';
export type { CatalogNavigatorOptions } from './catalogNavigator';

export { RevisitProtocol, CardNotFoundError } from './revisitProtocol';
export type { RevisitState, RevisitOptions } from './revisitProtocol';

export { NewsletterFetcher, canonicalFileName, landedFileNames } from './newsletterFetcher';

export { readCardLinks, reportRecords } from './catalogCards';
export type { CardLink } from './catalogCards';
