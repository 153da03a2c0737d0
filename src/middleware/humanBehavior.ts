/**
 * Human-paced keyboard input for form fields.
 *
 * Credentials are typed one character at a time with normally distributed
 * inter-key delays (mean 80 ms) and a longer pause after spaces and before
 * capitals.
 */

import type { ElementHandle } from 'puppeteer-core';
import { Logger } from '../core/logger';

const logger = new Logger('HumanBehavior');

/** Focus `field` and type `text` into it with human-like timing. */
export async function humanType(field: ElementHandle<Element>, text: string): Promise<void> {
  logger.debug(`Human-typing ${text.length} characters…`);

  await field.focus();
  await sleep(randomBetween(100, 300));

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    await field.type(char);

    let delay = gaussianRandom(80, 30);
    const next = text[i + 1];
    if (char === ' ' || (next !== undefined && /[A-Z]/.test(next))) {
      delay += randomBetween(100, 400);
    }

    await sleep(clamp(delay, 20, 500));
  }
}

// ─── Utility functions ──────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/** Box-Muller transform. */
function gaussianRandom(mean: number, stdDev: number): number {
  const u1 = Math.random() || Number.EPSILON;
  const u2 = Math.random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return z * stdDev + mean;
}
