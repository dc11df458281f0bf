import type { DbClient } from '../db/client';
import { CacheWriteError, errorMessage } from '../errors';
import type { ListingRecord } from '../scrapers/types';
import { decodeResultSet, encodeResultSet } from './result-codec';

export type CachedResult = {
  records: ListingRecord[];
  createdAt: string;
};

export interface CacheStore {
  /** Prior result for the key, or null on a miss. Never writes. */
  lookup(key: string): Promise<CachedResult | null>;
  /** Upsert: replaces any entry already stored under the key. */
  store(key: string, records: ListingRecord[]): Promise<void>;
}

type CacheEntry = {
  query_key: string;
  result_blob: string;
  created_at: string;
};

function decodeEntry(entry: CacheEntry): CachedResult | null {
  try {
    return { records: decodeResultSet(entry.result_blob), createdAt: entry.created_at };
  } catch (err) {
    console.error(`[Cache] Ignoring unreadable entry for ${entry.query_key}:`, errorMessage(err));
    return null;
  }
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async lookup(key: string): Promise<CachedResult | null> {
    const entry = this.entries.get(key);
    return entry ? decodeEntry(entry) : null;
  }

  async store(key: string, records: ListingRecord[]): Promise<void> {
    this.entries.set(key, {
      query_key: key,
      result_blob: encodeResultSet(records),
      created_at: this.now().toISOString(),
    });
  }

  get size(): number {
    return this.entries.size;
  }
}

export class SupabaseCacheStore implements CacheStore {
  constructor(
    private readonly db: DbClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async lookup(key: string): Promise<CachedResult | null> {
    const { data, error } = await this.db
      .from('scrape_cache')
      .select('query_key, result_blob, created_at')
      .eq('query_key', key)
      .maybeSingle();

    if (error) {
      console.error(`[Cache] Lookup failed for ${key}, treating as miss:`, error.message);
      return null;
    }
    return data ? decodeEntry(data) : null;
  }

  async store(key: string, records: ListingRecord[]): Promise<void> {
    const { error } = await this.db.from('scrape_cache').upsert(
      {
        query_key: key,
        result_blob: encodeResultSet(records),
        created_at: this.now().toISOString(),
      },
      { onConflict: 'query_key' },
    );

    if (error) {
      throw new CacheWriteError(`Failed to store cache entry for ${key}: ${error.message}`);
    }
    console.log(`[Cache] Stored ${records.length} records for ${key}`);
  }
}
