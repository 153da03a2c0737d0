/**
 * Per-host navigation throttling via Bottleneck.
 *
 * Every page load the driver issues goes through the host's limiter:
 * one navigation at a time, at least `RATE_LIMIT_MS` apart.
 */

import Bottleneck from 'bottleneck';
import { Logger } from '../core/logger';

const logger = new Logger('Throttle');

const limiters = new Map<string, Bottleneck>();

/** Create or retrieve the limiter for `url`'s host. */
export function getNavigationLimiter(url: string, minTimeMs: number): Bottleneck {
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    hostname = 'unknown';
  }

  const existing = limiters.get(hostname);
  if (existing) return existing;

  logger.debug(`New limiter for ${hostname} (${minTimeMs}ms spacing)`);
  const limiter = new Bottleneck({
    maxConcurrent: 1,
    minTime: minTimeMs,
  });
  limiters.set(hostname, limiter);
  return limiter;
}

/** Disconnect and forget every limiter (end of run). */
export async function clearNavigationLimiters(): Promise<void> {
  for (const limiter of limiters.values()) {
    await limiter.disconnect();
  }
  limiters.clear();
}
