import { ElementNotFoundError, NavigationError, PaginationError, errorMessage } from '../errors';
import type { BrowserDriver, BrowserDriverFactory } from './browser';
import type { CanonicalSearch, SearchQuery } from './types';

/**
 * Anything that can tell how many result pages a search has.
 * 0 means the search has no results.
 */
export interface PageCountOracle {
  countPages(search: CanonicalSearch): Promise<number>;
}

export type PaginationSelectors = {
  pagination: string;
  paginationItem: string;
  resultCard: string;
  emptyState: string;
};

/** Filter controls to fill when the search URL alone does not apply the filters. */
export type FilterSelectors = {
  brand: string;
  model: string;
  maxMileage: string;
  apply: string;
};

export type BrowserOracleOptions = {
  openDriver: BrowserDriverFactory;
  selectors: PaginationSelectors;
  navigationTimeoutMs: number;
  renderTimeoutMs: number;
  filters?: FilterSelectors;
};

// pagination usually renders right after the first cards
const PAGINATION_SETTLE_MS = 2000;

/**
 * Highest numeric label among pagination items. "1 2 3 … 17" gives 17.
 */
export function highestPageNumber(labels: string[]): number | null {
  const pages = labels
    .map((label) => label.trim())
    .filter((label) => /^\d+$/.test(label))
    .map(Number);
  return pages.length > 0 ? Math.max(...pages) : null;
}

export class BrowserPageCountOracle implements PageCountOracle {
  constructor(private readonly options: BrowserOracleOptions) {}

  async countPages(search: CanonicalSearch): Promise<number> {
    let driver: BrowserDriver;
    try {
      driver = await this.options.openDriver();
    } catch (err) {
      throw new NavigationError(`Could not start the browser: ${errorMessage(err)}`, { cause: err });
    }

    try {
      console.log(`[Pagination] Detecting pages for ${search.url}`);
      await driver.navigate(search.url, this.options.navigationTimeoutMs);

      if (this.options.filters) {
        await this.applyFilters(driver, this.options.filters, search.query);
      }

      const pageCount = await this.readPageCount(driver);
      console.log(`[Pagination] ${search.url} has ${pageCount} page(s)`);
      return pageCount;
    } catch (err) {
      if (!(err instanceof PaginationError)) {
        throw new NavigationError(`Unexpected page structure at ${search.url}: ${errorMessage(err)}`, { cause: err });
      }
      throw err;
    } finally {
      await driver.close().catch((err: unknown) => {
        console.error('[Pagination] Failed to close browser:', errorMessage(err));
      });
    }
  }

  private async applyFilters(driver: BrowserDriver, filters: FilterSelectors, query: SearchQuery): Promise<void> {
    const timeout = this.options.renderTimeoutMs;
    await driver.fill(filters.brand, query.brand, timeout);
    await driver.fill(filters.model, query.model, timeout);
    if (query.maxMileage !== null) {
      await driver.fill(filters.maxMileage, String(query.maxMileage), timeout);
    }
    await driver.click(filters.apply, timeout);
  }

  private async readPageCount(driver: BrowserDriver): Promise<number> {
    const { pagination, paginationItem, resultCard, emptyState } = this.options.selectors;

    const rendered = await driver.waitFor(`${pagination}, ${resultCard}, ${emptyState}`, this.options.renderTimeoutMs);
    if (!rendered) {
      throw new ElementNotFoundError(
        resultCard,
        `No results, pagination or empty-state marker appeared within ${this.options.renderTimeoutMs}ms`,
      );
    }

    const cards = await driver.count(resultCard);
    if (cards === 0 && (await driver.count(emptyState)) > 0) {
      return 0;
    }

    const settle = Math.min(PAGINATION_SETTLE_MS, this.options.renderTimeoutMs);
    if (await driver.waitFor(paginationItem, settle)) {
      const highest = highestPageNumber(await driver.readTexts(paginationItem));
      if (highest !== null) return highest;
    }

    return cards > 0 ? 1 : 0;
  }
}
