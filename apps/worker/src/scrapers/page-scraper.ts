import { z } from 'zod';
import { EmptyPageError, SchemaMismatchError } from '../errors';
import type { ExtractionService } from './firecrawl';
import {
  EXTRACTION_PROMPT,
  EXTRACTION_SYSTEM_PROMPT,
  LISTING_EXTRACTION_SCHEMA,
  extractedListingSchema,
} from './listing-schema';
import type { ExtractedListing } from './types';

const extractPayloadSchema = z.object({ listings: z.array(z.unknown()) });

// the listing url identifies a car; without one, fall back to every field
function listingKey(l: ExtractedListing): string {
  if (l.url) return `url:${l.url}`;
  return [l.brand, l.model, l.year, l.mileage, l.price].join('|').toLowerCase();
}

export class PageScraper {
  constructor(private readonly extraction: ExtractionService) {}

  /**
   * Extracts and validates the listings on one search results page.
   * Invalid records and duplicates within the page are dropped with a warning.
   */
  async scrapePage(pageUrl: string): Promise<ExtractedListing[]> {
    const payload = await this.extraction.extract({
      url: pageUrl,
      schema: LISTING_EXTRACTION_SCHEMA,
      prompt: EXTRACTION_PROMPT,
      systemPrompt: EXTRACTION_SYSTEM_PROMPT,
    });

    const parsed = extractPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SchemaMismatchError(`Extraction for ${pageUrl} did not contain a listings array`);
    }

    const raw = parsed.data.listings;
    if (raw.length === 0) {
      throw new EmptyPageError(`No listings extracted from ${pageUrl}`);
    }

    const listings: ExtractedListing[] = [];
    const seen = new Map<string, number>();

    raw.forEach((item, index) => {
      const result = extractedListingSchema.safeParse(item);
      if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        console.warn(`[PageScraper] Dropping invalid record #${index + 1} on ${pageUrl}: ${issues}`);
        return;
      }

      const key = listingKey(result.data);
      const first = seen.get(key);
      if (first !== undefined) {
        console.warn(`[PageScraper] Dropping duplicate record #${index + 1} on ${pageUrl}: same listing as record #${first}`);
        return;
      }
      seen.set(key, index + 1);
      listings.push(result.data);
    });

    if (listings.length === 0) {
      throw new SchemaMismatchError(`None of the ${raw.length} records extracted from ${pageUrl} matched the listing schema`);
    }

    console.log(`[PageScraper] ${listings.length} listings from ${pageUrl}`);
    return listings;
  }
}
