export type SearchInput = {
  brand: string;
  model: string;
  maxMileage?: number | null;
};

export type SearchQuery = {
  brand: string;
  model: string;
  maxMileage: number | null;
};

export type CanonicalSearch = {
  query: SearchQuery;
  url: string; // search page 1, filters encoded
  key: string; // cache key, derived from the normalized query only
};

export type ExtractedListing = {
  brand: string;
  model: string;
  year: number;
  mileage: number; // km
  price: number; // RM
  url?: string; // listing detail page, when the extractor finds one
};

export type ListingRecord = ExtractedListing & {
  rowNumber: number;
  scrapedAt: string;
};

export type PageFailure = {
  page: number;
  url: string;
  reason: string;
  message: string;
};
