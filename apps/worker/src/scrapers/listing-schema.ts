import { z } from 'zod';

// "RM 45,000" / "12,000 km" -> number; numbers pass through
function numeric(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const cleaned = value.replace(/[^\d.-]/g, '');
  return cleaned === '' ? value : Number(cleaned);
}

export const extractedListingSchema = z.object({
  brand: z.string().trim().min(1),
  model: z.string().trim().min(1),
  year: z.preprocess(numeric, z.number().int().min(1900).max(2100)),
  mileage: z.preprocess(numeric, z.number().int().nonnegative()),
  price: z.preprocess(numeric, z.number().positive()),
  url: z.preprocess((v) => (v === null || v === '' ? undefined : v), z.string().trim().min(1).optional()),
});

export const listingRecordSchema = extractedListingSchema.extend({
  rowNumber: z.coerce.number().int().positive(),
  scrapedAt: z.string().datetime(),
});

/**
 * JSON Schema handed to the extraction service. Fixed per deployment.
 */
export const LISTING_EXTRACTION_SCHEMA = {
  type: 'object',
  properties: {
    listings: {
      type: 'array',
      description: 'List of car listings',
      items: {
        type: 'object',
        properties: {
          brand: { type: 'string', description: 'The brand of the car' },
          model: { type: 'string', description: 'The model of the car' },
          year: { type: 'integer', description: 'Year manufactured' },
          mileage: { type: 'integer', description: 'Mileage in km' },
          price: { type: 'number', description: 'Price in RM' },
          url: { type: 'string', description: 'Link to the listing detail page' },
        },
        required: ['brand', 'model', 'year', 'mileage', 'price'],
      },
    },
  },
  required: ['listings'],
} as const;

export const EXTRACTION_PROMPT = 'Extract used car listings (brand, model, year, mileage, price, listing url)';
export const EXTRACTION_SYSTEM_PROMPT = 'You are a helpful assistant extracting used car data';
