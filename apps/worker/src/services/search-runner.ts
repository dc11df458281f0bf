import {
  CacheWriteError,
  ExtractionError,
  InvalidSelectionError,
  errorMessage,
} from '../errors';
import type { PageScraper } from '../scrapers/page-scraper';
import type { PageCountOracle } from '../scrapers/pagination';
import type { CanonicalSearch, ExtractedListing, ListingRecord, PageFailure, SearchInput } from '../scrapers/types';
import { withRetry } from '../utils/retry';
import { buildPageUrl, normalizeQuery } from './query-normalizer';
import type { CacheStore } from './result-cache';

export type ScrapeRun = {
  key: string;
  url: string;
  source: 'cache' | 'scrape';
  /** Discovered page count; null when served from the cache. */
  pageCount: number | null;
  /** Pages actually scraped, after clamping. */
  pagesRequested: number;
  records: ListingRecord[];
  failedPages: PageFailure[];
  scrapedAt: string;
  cacheWriteError: string | null;
};

export type SearchOptions = {
  pages?: number;
  refresh?: boolean;
};

export type RunnerDeps = {
  oracle: PageCountOracle;
  scraper: PageScraper;
  cache: CacheStore;
};

export type RunnerOptions = {
  pageRetries: number;
  retryDelayMs: number;
  marketplaceBaseUrl?: string;
  now?: () => Date;
};

function assertSelection(pages: number): void {
  if (!Number.isInteger(pages) || pages < 1) {
    throw new InvalidSelectionError(`Pages to scrape must be a whole number of at least 1 (got ${pages})`);
  }
}

export function summarizeFailures(failedPages: PageFailure[]): string | null {
  if (failedPages.length === 0) return null;
  const pages = failedPages.map((f) => f.page).join(', ');
  return failedPages.length === 1 ? `page ${pages} failed` : `pages ${pages} failed`;
}

export class ScrapeOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly deps: RunnerDeps,
    private readonly options: RunnerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  normalize(input: SearchInput): CanonicalSearch {
    return normalizeQuery(input, this.options.marketplaceBaseUrl);
  }

  async discoverPages(input: SearchInput): Promise<{ search: CanonicalSearch; pageCount: number }> {
    const search = this.normalize(input);
    const pageCount = await this.deps.oracle.countPages(search);
    return { search, pageCount };
  }

  /**
   * Cache first; on a miss, discover the page count and scrape.
   * A cache hit ignores `pages`: the cached result set is returned as stored.
   */
  async search(input: SearchInput, options: SearchOptions = {}): Promise<ScrapeRun> {
    const search = this.normalize(input);
    if (options.pages !== undefined) assertSelection(options.pages);

    if (!options.refresh) {
      const cached = await this.deps.cache.lookup(search.key);
      if (cached) {
        console.log(`[SearchRunner] Cache hit for ${search.key}: ${cached.records.length} listings from ${cached.createdAt}`);
        return {
          key: search.key,
          url: search.url,
          source: 'cache',
          pageCount: null,
          pagesRequested: 0,
          records: cached.records,
          failedPages: [],
          scrapedAt: cached.records[0]?.scrapedAt ?? cached.createdAt,
          cacheWriteError: null,
        };
      }
    }

    const pageCount = await this.deps.oracle.countPages(search);
    if (pageCount === 0) {
      console.log(`[SearchRunner] No results for ${search.key}`);
      return this.emptyRun(search, this.now());
    }

    return this.run(search, options.pages ?? pageCount, pageCount);
  }

  /**
   * Scrapes pages 1..selectedPageCount in order. A selection above the discovered
   * page count is clamped. Failed pages are reported, not fatal.
   */
  async run(search: CanonicalSearch, selectedPageCount: number, pageCount: number): Promise<ScrapeRun> {
    assertSelection(selectedPageCount);
    const startedAt = this.now();

    if (pageCount === 0) return this.emptyRun(search, startedAt);

    let pages = selectedPageCount;
    if (pages > pageCount) {
      console.log(`[SearchRunner] Clamping ${pages} requested pages to the ${pageCount} available`);
      pages = pageCount;
    }

    console.log(`\n[SearchRunner] Scraping ${pages} page(s) for ${search.query.brand} ${search.query.model} (${search.key})`);

    const slices: ExtractedListing[][] = [];
    const failedPages: PageFailure[] = [];

    for (let page = 1; page <= pages; page++) {
      const url = buildPageUrl(search.url, page);
      const start = Date.now();

      try {
        const listings = await withRetry(() => this.deps.scraper.scrapePage(url), {
          maxRetries: this.options.pageRetries,
          baseDelay: this.options.retryDelayMs,
          label: 'SearchRunner',
        });
        slices.push(listings);
        console.log(`[SearchRunner] Page ${page}/${pages}: ${listings.length} listings in ${Date.now() - start}ms`);
      } catch (err) {
        if (!(err instanceof ExtractionError)) throw err;
        failedPages.push({ page, url, reason: err.code, message: err.message });
        console.error(`[SearchRunner] Page ${page}/${pages} failed:`, err.message);
      }
    }

    const scrapedAt = startedAt.toISOString();
    const records: ListingRecord[] = slices.flat().map((listing, i) => ({
      ...listing,
      rowNumber: i + 1,
      scrapedAt,
    }));

    let cacheWriteError: string | null = null;
    if (records.length > 0) {
      try {
        await this.deps.cache.store(search.key, records);
      } catch (err) {
        const failure = err instanceof CacheWriteError ? err : new CacheWriteError(errorMessage(err), { cause: err });
        cacheWriteError = failure.message;
        console.error(`[SearchRunner] Cache write failed for ${search.key}:`, failure.message);
      }
    }

    const summary = summarizeFailures(failedPages);
    console.log(
      `[SearchRunner] Completed ${search.key}: ${records.length} listings from ${pages} page(s)` +
        (summary ? `; ${summary}` : ''),
    );

    return {
      key: search.key,
      url: search.url,
      source: 'scrape',
      pageCount,
      pagesRequested: pages,
      records,
      failedPages,
      scrapedAt,
      cacheWriteError,
    };
  }

  private emptyRun(search: CanonicalSearch, at: Date): ScrapeRun {
    return {
      key: search.key,
      url: search.url,
      source: 'scrape',
      pageCount: 0,
      pagesRequested: 0,
      records: [],
      failedPages: [],
      scrapedAt: at.toISOString(),
      cacheWriteError: null,
    };
  }
}
