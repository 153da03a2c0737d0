#!/usr/bin/env node
/**
 * `portal-crawler [holdings|newsletters|all]`
 *
 * Loads `.env`, validates config, runs the crawler and prints the run
 * summary as JSON.  Exit codes: 0 success, 1 config error or failed run,
 * 2 usage error.
 */

import 'dotenv/config';
import { loadPortalConfig, type PortalConfig } from './core/config';
import { ConfigError } from './core/errors';
import type { RunMode } from './core/types';
import { PortalCrawler } from './portalCrawler';

const MODES: readonly RunMode[] = ['holdings', 'newsletters', 'all'];

function parseMode(arg: string | undefined): RunMode | null {
  if (arg === undefined) return 'holdings';
  return MODES.find((mode) => mode === arg) ?? null;
}

async function main(): Promise<number> {
  const mode = parseMode(process.argv[2]);
  if (!mode) {
    console.error(
      `Usage: portal-crawler [${MODES.join('|')}]\n` +
        'Example: portal-crawler newsletters',
    );
    return 2;
  }

  let config: PortalConfig;
  try {
    config = loadPortalConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`✗ ${err.message}`);
      return 1;
    }
    throw err;
  }

  try {
    const summary = await new PortalCrawler(config).run(mode);
    console.log('\n✓ Run summary:', JSON.stringify(summary, null, 2));
    return 0;
  } catch (err) {
    console.error('\n✗ Run failed:', err);
    return 1;
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('\n✗ Unexpected failure:', err);
      process.exitCode = 1;
    });
}
