/**
 * The download directory as a completion ledger.
 *
 * A file under its canonical name means "already fetched"; re-runs skip it.
 * Files the browser drops under the portal's own name are adopted (renamed)
 * into their canonical name.
 */

import { access, mkdir, rename } from 'fs/promises';
import { join } from 'path';
import { Logger } from '../core/logger';

const logger = new Logger('DownloadStore');

export class DownloadStore {
  constructor(readonly directory: string) {}

  /** Create the directory (and parents) if it does not exist. */
  async ensure(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  pathOf(fileName: string): string {
    return join(this.directory, fileName);
  }

  async has(fileName: string): Promise<boolean> {
    try {
      await access(this.pathOf(fileName));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Rename the first existing `candidates` entry to `canonical`.
   *
   * @returns the candidate that was adopted, or `null` if none was present.
   */
  async adopt(candidates: readonly string[], canonical: string): Promise<string | null> {
    for (const candidate of candidates) {
      if (!(await this.has(candidate))) continue;

      await rename(this.pathOf(candidate), this.pathOf(canonical));
      logger.info(`Renamed ${candidate} → ${canonical}`);
      return candidate;
    }
    return null;
  }
}
