import type { LinkStrategy, NavigationTarget } from '../core/types';

/** Path marker of standalone pick-list pages. */
export const DIRECT_MARKER = 'pick-list';
/** Path marker of model portfolios, revealed in place on the catalog. */
export const INDIRECT_MARKER = 'model-portfolio';

/**
 * Classify `url` by its path alone.
 *
 * The direct marker wins when both markers are present.  Anything that does
 * not parse as an absolute URL is `unsupported`.
 */
export function classifyLink(url: string): LinkStrategy {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    return 'unsupported';
  }

  if (path.includes(DIRECT_MARKER)) return 'direct';
  if (path.includes(INDIRECT_MARKER)) return 'indirect';
  return 'unsupported';
}

export function toNavigationTarget(url: string): NavigationTarget {
  return { url, strategy: classifyLink(url) };
}
