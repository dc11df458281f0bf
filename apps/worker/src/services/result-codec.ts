import Papa from 'papaparse';
import { listingRecordSchema } from '../scrapers/listing-schema';
import type { ListingRecord } from '../scrapers/types';

export const CSV_COLUMNS = [
  'row_number',
  'brand',
  'model',
  'year',
  'mileage',
  'price',
  'listing_url',
  'scraped_at',
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string | number>;

export function encodeResultSet(records: ListingRecord[]): string {
  const rows: CsvRow[] = records.map((r) => ({
    row_number: r.rowNumber,
    brand: r.brand,
    model: r.model,
    year: r.year,
    mileage: r.mileage,
    price: r.price,
    listing_url: r.url ?? '',
    scraped_at: r.scrapedAt,
  }));
  return Papa.unparse({ fields: [...CSV_COLUMNS], data: rows.map((row) => CSV_COLUMNS.map((c) => row[c])) });
}

/**
 * Parses a blob written by encodeResultSet. Throws when the header or any row is malformed.
 */
export function decodeResultSet(csv: string): ListingRecord[] {
  const result = Papa.parse<Record<string, string>>(csv, { header: true, skipEmptyLines: true });

  if (result.errors.length > 0) {
    const first = result.errors[0];
    throw new Error(`Malformed result blob at row ${first.row ?? '?'}: ${first.message}`);
  }

  const header = result.meta.fields ?? [];
  const missing = CSV_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`Result blob is missing columns: ${missing.join(', ')}`);
  }

  return result.data.map((row, i) => {
    const parsed = listingRecordSchema.safeParse({
      rowNumber: row.row_number,
      brand: row.brand,
      model: row.model,
      year: row.year,
      mileage: row.mileage,
      price: row.price,
      url: row.listing_url,
      scrapedAt: row.scraped_at,
    });
    if (!parsed.success) {
      throw new Error(`Result blob row ${i + 1} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  });
}
