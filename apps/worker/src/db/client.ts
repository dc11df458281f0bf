import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { ScraperConfig } from '../config';

export type Database = {
  public: {
    Tables: {
      scrape_cache: {
        Row: {
          query_key: string;
          result_blob: string;
          created_at: string;
        };
        Insert: {
          query_key: string;
          result_blob: string;
          created_at?: string;
        };
        Update: {
          result_blob?: string;
          created_at?: string;
        };
        Relationships: [];
      };
    };
    Views: Record<string, never>;
    Functions: Record<string, never>;
    Enums: Record<string, never>;
    CompositeTypes: Record<string, never>;
  };
};

export type DbClient = SupabaseClient<Database>;

export function createDbClient(settings: NonNullable<ScraperConfig['supabase']>): DbClient {
  return createClient<Database>(settings.url, settings.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
