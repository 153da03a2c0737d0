/**
 * Barrel export for the pure page-reading layer.
 */

export { classifyLink, toNavigationTarget, DIRECT_MARKER, INDIRECT_MARKER } from './linkClassifier';
export { extractRecords, safeExtract, snapshotRegion, SnapshotElement } from './tableExtractor';
