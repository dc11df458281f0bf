export type ScraperErrorCode =
  | 'invalid_query'
  | 'invalid_selection'
  | 'pagination_element_not_found'
  | 'pagination_timeout'
  | 'pagination_navigation'
  | 'extraction_schema_mismatch'
  | 'extraction_service'
  | 'extraction_empty_page'
  | 'cache_write';

export abstract class ScraperError extends Error {
  abstract readonly code: ScraperErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidQueryError extends ScraperError {
  readonly code = 'invalid_query';
}

export class InvalidSelectionError extends ScraperError {
  readonly code = 'invalid_selection';
}

// --- Page-count discovery ---

export abstract class PaginationError extends ScraperError {}

export class ElementNotFoundError extends PaginationError {
  readonly code = 'pagination_element_not_found';

  constructor(readonly selector: string, message?: string) {
    super(message ?? `Element not found: ${selector}`);
  }
}

export class PaginationTimeoutError extends PaginationError {
  readonly code = 'pagination_timeout';
}

export class NavigationError extends PaginationError {
  readonly code = 'pagination_navigation';
}

// --- Single-page extraction ---

export abstract class ExtractionError extends ScraperError {}

export class SchemaMismatchError extends ExtractionError {
  readonly code = 'extraction_schema_mismatch';
}

export class ExtractionServiceError extends ExtractionError {
  readonly code = 'extraction_service';

  constructor(message: string, readonly status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EmptyPageError extends ExtractionError {
  readonly code = 'extraction_empty_page';
}

export class CacheWriteError extends ScraperError {
  readonly code = 'cache_write';
}

const USER_MESSAGES: Record<ScraperErrorCode, string> = {
  invalid_query: 'Please enter a brand and a model. Max mileage must be a whole number of kilometres, 0 or more.',
  invalid_selection: 'Choose at least one page to scrape.',
  pagination_element_not_found:
    'The marketplace page did not show the expected results or pagination. The site structure may have changed; check the configured selectors.',
  pagination_timeout: 'The marketplace took too long to respond. Check your connection and try again.',
  pagination_navigation: 'Could not open the marketplace search page. Check your connection and try again.',
  extraction_schema_mismatch: 'The extraction service returned data that does not match the listing format.',
  extraction_service: 'The extraction service failed or timed out.',
  extraction_empty_page: 'No listings were found on this page.',
  cache_write: 'Results were scraped but could not be saved to the cache.',
};

export function toUserMessage(err: unknown): string {
  if (err instanceof ScraperError) return USER_MESSAGES[err.code];
  return 'Something went wrong while scraping. Please try again.';
}

export function httpStatusFor(err: unknown): number {
  if (err instanceof InvalidQueryError || err instanceof InvalidSelectionError) return 400;
  if (err instanceof PaginationError) return 502;
  return 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
