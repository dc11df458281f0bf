import { describe, expect, it } from 'vitest';
import {
  CacheWriteError,
  ExtractionServiceError,
  InvalidSelectionError,
  PaginationTimeoutError,
} from '../errors';
import { PageScraper } from '../scrapers/page-scraper';
import type { ListingRecord } from '../scrapers/types';
import { FakeOracle, RUN_TIME, ScriptedExtraction, pageListings, pageOf } from '../testing/fakes';
import { MemoryCacheStore, type CacheStore } from './result-cache';
import { ScrapeOrchestrator, summarizeFailures } from './search-runner';

const HONDA = { brand: 'Honda', model: 'Civic', maxMileage: 50000 };
const HONDA_KEY = 'brand=honda&model=civic&max_mileage=50000';

function setup(options: {
  pageCount: number | Error;
  respond?: (url: string, attempt: number) => unknown;
  cache?: CacheStore;
}) {
  const oracle = new FakeOracle(options.pageCount);
  const extraction = new ScriptedExtraction(options.respond ?? ((url) => ({ listings: pageListings(pageOf(url), 20) })));
  const cache = options.cache ?? new MemoryCacheStore(() => RUN_TIME);
  const runner = new ScrapeOrchestrator(
    { oracle, scraper: new PageScraper(extraction), cache },
    { pageRetries: 1, retryDelayMs: 0, now: () => RUN_TIME },
  );
  return { oracle, extraction, cache, runner };
}

describe('ScrapeOrchestrator.search', () => {
  it('scrapes every discovered page and caches the merged result', async () => {
    const { runner, oracle, extraction, cache } = setup({ pageCount: 3 });

    const run = await runner.search(HONDA);

    expect(oracle.calls).toHaveLength(1);
    expect(extraction.urls).toEqual([
      'https://www.carsome.my/buy-car/honda/civic?mileage=0,50000&pageNo=1',
      'https://www.carsome.my/buy-car/honda/civic?mileage=0,50000&pageNo=2',
      'https://www.carsome.my/buy-car/honda/civic?mileage=0,50000&pageNo=3',
    ]);
    expect(run.source).toBe('scrape');
    expect(run.key).toBe(HONDA_KEY);
    expect(run.pageCount).toBe(3);
    expect(run.pagesRequested).toBe(3);
    expect(run.records).toHaveLength(60);
    expect(run.records.map((r) => r.rowNumber)).toEqual(Array.from({ length: 60 }, (_, i) => i + 1));
    expect(new Set(run.records.map((r) => r.scrapedAt))).toEqual(new Set(['2026-10-19T08:00:00.000Z']));
    expect(run.scrapedAt).toBe('2026-10-19T08:00:00.000Z');
    expect(run.failedPages).toEqual([]);
    expect(run.cacheWriteError).toBeNull();

    const cached = await cache.lookup(HONDA_KEY);
    expect(cached?.records).toEqual(run.records);
  });

  it('keeps page order, then within-page order', async () => {
    const { runner } = setup({ pageCount: 2, respond: (url) => ({ listings: pageListings(pageOf(url), 2) }) });

    const run = await runner.search(HONDA);

    expect(run.records.map((r) => [r.rowNumber, r.mileage])).toEqual([
      [1, 20000],
      [2, 20100],
      [3, 30000],
      [4, 30100],
    ]);
  });

  it('serves a repeated query from the cache without discovery or scraping', async () => {
    const { runner, oracle, extraction } = setup({ pageCount: 2 });

    const first = await runner.search(HONDA);
    const second = await runner.search({ brand: ' HONDA', model: 'civic ', maxMileage: 50000 });

    expect(oracle.calls).toHaveLength(1);
    expect(extraction.requests).toHaveLength(2);
    expect(second.source).toBe('cache');
    expect(second.pageCount).toBeNull();
    expect(second.records).toEqual(first.records);
    expect(second.scrapedAt).toBe(first.scrapedAt);
  });

  it('does not answer a different query from the cache', async () => {
    const { runner, oracle } = setup({ pageCount: 1 });

    await runner.search({ brand: 'a&model=b', model: 'c' });
    const other = await runner.search({ brand: 'a', model: 'b&model=c' });

    expect(other.source).toBe('scrape');
    expect(oracle.calls).toHaveLength(2);
  });

  it('scrapes again when refresh is requested', async () => {
    const { runner, oracle, extraction } = setup({ pageCount: 1 });

    await runner.search(HONDA);
    const refreshed = await runner.search(HONDA, { refresh: true });

    expect(refreshed.source).toBe('scrape');
    expect(oracle.calls).toHaveLength(2);
    expect(extraction.requests).toHaveLength(2);
  });

  it('returns an empty result without scraping when there are no pages', async () => {
    const { runner, extraction, cache } = setup({ pageCount: 0 });

    const run = await runner.search(HONDA);

    expect(run.records).toEqual([]);
    expect(run.pageCount).toBe(0);
    expect(run.pagesRequested).toBe(0);
    expect(extraction.requests).toHaveLength(0);
    expect(await cache.lookup(HONDA_KEY)).toBeNull();
  });

  it('scrapes only the selected number of pages', async () => {
    const { runner, extraction } = setup({ pageCount: 17 });

    const run = await runner.search(HONDA, { pages: 2 });

    expect(run.pageCount).toBe(17);
    expect(run.pagesRequested).toBe(2);
    expect(extraction.requests).toHaveLength(2);
    expect(run.records).toHaveLength(40);
  });

  it('clamps a selection above the discovered page count', async () => {
    const { runner, extraction } = setup({ pageCount: 2 });

    const run = await runner.search(HONDA, { pages: 10 });

    expect(run.pagesRequested).toBe(2);
    expect(extraction.requests).toHaveLength(2);
  });

  it.each([0, -1, 1.5])('rejects a selection of %s before any work', async (pages) => {
    const { runner, oracle, extraction } = setup({ pageCount: 5 });

    await expect(runner.search(HONDA, { pages })).rejects.toBeInstanceOf(InvalidSelectionError);
    expect(oracle.calls).toHaveLength(0);
    expect(extraction.requests).toHaveLength(0);
  });

  it('aborts on a pagination failure before scraping', async () => {
    const { runner, extraction } = setup({ pageCount: new PaginationTimeoutError('Timed out after 30000ms') });

    await expect(runner.search(HONDA)).rejects.toBeInstanceOf(PaginationTimeoutError);
    expect(extraction.requests).toHaveLength(0);
  });

  it('rejects an invalid query before looking anything up', async () => {
    const { runner, oracle } = setup({ pageCount: 1 });

    await expect(runner.search({ brand: '', model: 'Civic' })).rejects.toThrow('Invalid search query: brand');
    expect(oracle.calls).toHaveLength(0);
  });
});

describe('ScrapeOrchestrator.run', () => {
  const search = { query: { brand: 'honda', model: 'civic', maxMileage: 50000 }, url: 'https://example.test/honda/civic?mileage=0,50000', key: HONDA_KEY };

  it('records a page that fails twice and keeps the others in order', async () => {
    const { runner, extraction } = setup({
      pageCount: 5,
      respond: (url) => {
        const page = pageOf(url);
        if (page === 3) throw new ExtractionServiceError('Firecrawl returned 502', 502);
        return { listings: pageListings(page, 2) };
      },
    });

    const run = await runner.run(search, 5, 5);

    expect(extraction.urls.filter((u) => pageOf(u) === 3)).toHaveLength(2);
    expect(run.records.map((r) => r.mileage)).toEqual([20000, 20100, 30000, 30100, 50000, 50100, 60000, 60100]);
    expect(run.records.map((r) => r.rowNumber)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(run.failedPages).toEqual([
      {
        page: 3,
        url: 'https://example.test/honda/civic?mileage=0,50000&pageNo=3',
        reason: 'extraction_service',
        message: 'Firecrawl returned 502',
      },
    ]);
    expect(summarizeFailures(run.failedPages)).toBe('page 3 failed');
  });

  it('recovers a page that succeeds on retry', async () => {
    const { runner, extraction } = setup({
      pageCount: 3,
      respond: (url, attempt) => {
        const page = pageOf(url);
        if (page === 2 && attempt === 1) return { listings: [] };
        return { listings: pageListings(page, 1) };
      },
    });

    const run = await runner.run(search, 3, 3);

    expect(extraction.requests).toHaveLength(4);
    expect(run.failedPages).toEqual([]);
    expect(run.records).toHaveLength(3);
  });

  it('returns partial results when every page fails', async () => {
    const { runner, cache } = setup({ pageCount: 2, respond: () => ({ listings: [] }) });

    const run = await runner.run(search, 2, 2);

    expect(run.records).toEqual([]);
    expect(run.failedPages.map((f) => [f.page, f.reason])).toEqual([
      [1, 'extraction_empty_page'],
      [2, 'extraction_empty_page'],
    ]);
    expect(summarizeFailures(run.failedPages)).toBe('pages 1, 2 failed');
    expect(await cache.lookup(HONDA_KEY)).toBeNull();
  });

  it('still returns the result when the cache write fails', async () => {
    const failingCache: CacheStore = {
      lookup: async () => null,
      store: async (_key: string, _records: ListingRecord[]) => {
        throw new CacheWriteError('connection reset');
      },
    };
    const { runner } = setup({ pageCount: 1, cache: failingCache });

    const run = await runner.run(search, 1, 1);

    expect(run.records).toHaveLength(20);
    expect(run.cacheWriteError).toBe('connection reset');
  });

  it('treats a failing store of an unknown kind as a cache write failure', async () => {
    const failingCache: CacheStore = {
      lookup: async () => null,
      store: async () => {
        throw new Error('disk full');
      },
    };
    const { runner } = setup({ pageCount: 1, cache: failingCache });

    const run = await runner.run(search, 1, 1);

    expect(run.records).toHaveLength(20);
    expect(run.cacheWriteError).toBe('disk full');
  });

  it('rejects a selection of zero', async () => {
    const { runner } = setup({ pageCount: 3 });

    await expect(runner.run(search, 0, 3)).rejects.toBeInstanceOf(InvalidSelectionError);
  });

  it('returns an empty run for zero pages', async () => {
    const { runner, extraction } = setup({ pageCount: 0 });

    const run = await runner.run(search, 1, 0);

    expect(run.records).toEqual([]);
    expect(extraction.requests).toHaveLength(0);
  });
});

describe('summarizeFailures', () => {
  it('is null when nothing failed', () => {
    expect(summarizeFailures([])).toBeNull();
  });

  it('lists failed pages in order', () => {
    expect(
      summarizeFailures([
        { page: 3, url: 'u3', reason: 'extraction_service', message: 'x' },
        { page: 7, url: 'u7', reason: 'extraction_schema_mismatch', message: 'y' },
      ]),
    ).toBe('pages 3, 7 failed');
  });
});
