import { z } from 'zod';
import { InvalidQueryError } from '../errors';
import type { CanonicalSearch, SearchInput, SearchQuery } from '../scrapers/types';

export const DEFAULT_MARKETPLACE_BASE_URL = 'https://www.carsome.my/buy-car';

// hyphens and whitespace are one separator: the url slug writes both as '-'
const normalizedText = z
  .string()
  .transform((s) => s.replace(/[\s-]+/g, ' ').trim().toLowerCase())
  .pipe(z.string().min(1));

const searchInputSchema = z.object({
  brand: normalizedText,
  model: normalizedText,
  maxMileage: z.number().int().nonnegative().nullish(),
});

function slugify(value: string): string {
  return encodeURIComponent(value.replace(/ /g, '-'));
}

export function buildCacheKey(query: SearchQuery): string {
  return new URLSearchParams({
    brand: query.brand,
    model: query.model,
    max_mileage: query.maxMileage === null ? '' : String(query.maxMileage),
  }).toString();
}

export function buildSearchUrl(query: SearchQuery, baseUrl: string = DEFAULT_MARKETPLACE_BASE_URL): string {
  const url = `${baseUrl.replace(/\/+$/, '')}/${slugify(query.brand)}/${slugify(query.model)}`;
  return query.maxMileage === null ? url : `${url}?mileage=0,${query.maxMileage}`;
}

export function buildPageUrl(searchUrl: string, page: number): string {
  const separator = searchUrl.includes('?') ? '&' : '?';
  return `${searchUrl}${separator}pageNo=${page}`;
}

/**
 * Turns raw user input into the canonical search used both as scrape target and cache key.
 * Whitespace, hyphen and case variants of the same brand/model produce the same result.
 */
export function normalizeQuery(input: SearchInput, baseUrl?: string): CanonicalSearch {
  const parsed = searchInputSchema.safeParse(input);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => i.path.join('.') || 'input'))];
    throw new InvalidQueryError(`Invalid search query: ${fields.join(', ')}`);
  }

  const query: SearchQuery = {
    brand: parsed.data.brand,
    model: parsed.data.model,
    maxMileage: parsed.data.maxMileage ?? null,
  };

  return {
    query,
    url: buildSearchUrl(query, baseUrl),
    key: buildCacheKey(query),
  };
}
