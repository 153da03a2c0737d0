import { mkdirSync, writeFileSync } from 'fs';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NewsletterFetcher, canonicalFileName, landedFileNames } from '../src/agents';
import { WaitTimeoutError } from '../src/core/errors';
import { FakeDriver, type FakeSite } from './support/fakeDriver';
import { BASE_URL, NEWSLETTER_URL, makeConfig, page } from './support/portalPages';

describe('canonicalFileName', () => {
  it('joins the last two words and appends .pdf', () => {
    expect(canonicalFileName('Stock Investor March 2024')).toBe('March2024.pdf');
  });

  it('splits on any run of whitespace', () => {
    expect(canonicalFileName('  Stock\tInvestor \n June   2025 ')).toBe('June2025.pdf');
  });

  it('uses the only word of a one-word title', () => {
    expect(canonicalFileName('Annual')).toBe('Annual.pdf');
  });

  it('takes the trailing words whatever they are', () => {
    expect(canonicalFileName('March 2024 Stock Investor')).toBe('StockInvestor.pdf');
  });
});

describe('landedFileNames', () => {
  it('tries the raw title, then the hyphen-stripped title', () => {
    expect(landedFileNames('Stock Investor Mid-Year 2024')).toEqual([
      'Stock Investor Mid-Year 2024.pdf',
      'Stock Investor MidYear 2024.pdf',
    ]);
  });

  it('has a single candidate when there is no hyphen', () => {
    expect(landedFileNames('Stock Investor March 2024')).toEqual(['Stock Investor March 2024.pdf']);
  });
});

describe('NewsletterFetcher', () => {
  let downloadDir: string;

  const ISSUES: Record<string, { title: string; landsAs: string | null }> = {
    [`${BASE_URL}/articles/1`]: {
      title: 'Stock Investor March 2024',
      landsAs: 'Stock Investor March 2024.pdf',
    },
    [`${BASE_URL}/articles/2`]: {
      title: 'Stock Investor Mid-Year 2024',
      landsAs: 'Stock Investor MidYear 2024.pdf',
    },
  };

  function collectionPage(): string {
    const headings = Object.entries(ISSUES).map(
      ([url, issue]) => `<h3 class="mdc-heading"><a href="${url.replace(BASE_URL, '')}">${issue.title}</a></h3>`,
    );
    return page(
      'Stock Investor Publications',
      `${headings.join('')}<h3 class="mdc-heading">Archive</h3>`,
    );
  }

  function site(overrides: Partial<FakeSite> = {}): FakeSite {
    const articles = Object.fromEntries(
      Object.keys(ISSUES).map((url) => [
        url,
        page('Article', '<button class="article__article-download">Download PDF</button>'),
      ]),
    );
    return {
      pages: { [NEWSLETTER_URL]: collectionPage(), ...articles },
      onClick: (_element, driver) => {
        const landsAs = ISSUES[driver.currentUrl()]?.landsAs;
        if (landsAs) writeFileSync(join(downloadDir, landsAs), '%PDF-1.4');
      },
      ...overrides,
    };
  }

  beforeEach(async () => {
    downloadDir = await mkdtemp(join(tmpdir(), 'newsletters-'));
  });

  afterEach(async () => {
    await rm(downloadDir, { recursive: true, force: true });
  });

  it('downloads each issue and renames it to its canonical name', async () => {
    const driver = new FakeDriver(site());
    const fetcher = new NewsletterFetcher(driver, makeConfig({ DOWNLOAD_DIR: downloadDir }));

    const downloads = await fetcher.fetchNewsletters();

    expect(downloads).toEqual(['March2024.pdf', 'Mid-Year2024.pdf']);
    expect((await readdir(downloadDir)).sort()).toEqual(['March2024.pdf', 'Mid-Year2024.pdf']);
    expect(driver.navigations).toEqual([
      NEWSLETTER_URL,
      `${BASE_URL}/articles/1`,
      `${BASE_URL}/articles/2`,
    ]);
    expect(driver.pauses).toEqual([0, 0]);
  });

  it('downloads nothing on a second run', async () => {
    const config = makeConfig({ DOWNLOAD_DIR: downloadDir });
    await new NewsletterFetcher(new FakeDriver(site()), config).fetchNewsletters();

    const rerun = new FakeDriver(site());
    const downloads = await new NewsletterFetcher(rerun, config).fetchNewsletters();

    expect(downloads).toEqual([]);
    expect(rerun.navigations).toEqual([NEWSLETTER_URL]);
    expect(rerun.clicks).toEqual([]);
  });

  it('skips issues whose canonical file is already present', async () => {
    await writeFile(join(downloadDir, 'March2024.pdf'), '%PDF-1.4');
    const driver = new FakeDriver(site());

    const downloads = await new NewsletterFetcher(
      driver,
      makeConfig({ DOWNLOAD_DIR: downloadDir }),
    ).fetchNewsletters();

    expect(downloads).toEqual(['Mid-Year2024.pdf']);
    expect(driver.navigations).toEqual([NEWSLETTER_URL, `${BASE_URL}/articles/2`]);
  });

  it('still reports the canonical name when the landed file cannot be found', async () => {
    const driver = new FakeDriver(site({ onClick: () => undefined }));

    const downloads = await new NewsletterFetcher(
      driver,
      makeConfig({ DOWNLOAD_DIR: downloadDir }),
    ).fetchNewsletters();

    expect(downloads).toEqual(['March2024.pdf', 'Mid-Year2024.pdf']);
    expect(await readdir(downloadDir)).toEqual([]);
  });

  it('moves on when an article has no download control', async () => {
    const base = site();
    const driver = new FakeDriver({
      ...base,
      pages: { ...base.pages, [`${BASE_URL}/articles/1`]: page('Article', '<p>Unavailable</p>') },
    });

    const downloads = await new NewsletterFetcher(
      driver,
      makeConfig({ DOWNLOAD_DIR: downloadDir }),
    ).fetchNewsletters();

    expect(downloads).toEqual(['Mid-Year2024.pdf']);
    expect(await readdir(downloadDir)).toEqual(['Mid-Year2024.pdf']);
  });

  it('moves on to the next issue when renaming a download fails', async () => {
    const base = site();
    const driver = new FakeDriver({
      ...base,
      onClick: (element, current) => {
        base.onClick?.(element, current);
        // A directory squatting on the canonical name makes the rename fail.
        if (current.currentUrl() === `${BASE_URL}/articles/1`) {
          mkdirSync(join(downloadDir, 'March2024.pdf'));
        }
      },
    });

    const downloads = await new NewsletterFetcher(
      driver,
      makeConfig({ DOWNLOAD_DIR: downloadDir }),
    ).fetchNewsletters();

    expect(downloads).toEqual(['Mid-Year2024.pdf']);
    expect(driver.navigations).toEqual([
      NEWSLETTER_URL,
      `${BASE_URL}/articles/1`,
      `${BASE_URL}/articles/2`,
    ]);
    expect((await readdir(downloadDir)).sort()).toEqual([
      'March2024.pdf',
      'Mid-Year2024.pdf',
      'Stock Investor March 2024.pdf',
    ]);
  });

  it('lists only headings that carry a link, with absolute URLs', async () => {
    const driver = new FakeDriver(site());

    const entries = await new NewsletterFetcher(
      driver,
      makeConfig({ DOWNLOAD_DIR: downloadDir }),
    ).listEntries();

    expect(entries).toEqual([
      { sourceUrl: `${BASE_URL}/articles/1`, displayText: 'Stock Investor March 2024' },
      { sourceUrl: `${BASE_URL}/articles/2`, displayText: 'Stock Investor Mid-Year 2024' },
    ]);
  });

  it('fails when the collection page title does not match', async () => {
    const driver = new FakeDriver(site({ pages: { [NEWSLETTER_URL]: page('Sign in', '') } }));

    await expect(
      new NewsletterFetcher(driver, makeConfig({ DOWNLOAD_DIR: downloadDir })).fetchNewsletters(),
    ).rejects.toBeInstanceOf(WaitTimeoutError);
  });
});
