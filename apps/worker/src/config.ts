import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  WORKER_API_KEY: optionalString,

  MARKETPLACE_BASE_URL: z.string().url().default('https://www.carsome.my/buy-car'),

  FIRECRAWL_API_KEY: z.string().min(1, 'FIRECRAWL_API_KEY is required'),
  FIRECRAWL_API_URL: z.string().url().default('https://api.firecrawl.dev'),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  PAGE_RETRIES: z.coerce.number().int().min(0).default(1),
  RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  BROWSER_WS_ENDPOINT: optionalString,
  BROWSER_EXECUTABLE_PATH: optionalString,
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PAGINATION_SELECTOR: z.string().min(1).default("nav[aria-label='Pagination Navigation']"),
  PAGINATION_ITEM_SELECTOR: z.string().min(1).default('ul.v-pagination li'),
  RESULT_CARD_SELECTOR: z.string().min(1).default('.mod-b-card'),
  EMPTY_STATE_SELECTOR: z.string().min(1).default('.empty-result'),

  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  EXPORT_DIR: z.string().min(1).default('exports'),
});

export type ScraperConfig = Readonly<{
  port: number;
  workerApiKey: string | undefined;
  marketplaceBaseUrl: string;
  extraction: Readonly<{
    apiKey: string;
    apiUrl: string;
    timeoutMs: number;
  }>;
  runner: Readonly<{
    pageRetries: number;
    retryDelayMs: number;
  }>;
  browser: Readonly<{
    wsEndpoint: string | undefined;
    executablePath: string | undefined;
    navigationTimeoutMs: number;
    renderTimeoutMs: number;
    selectors: Readonly<{
      pagination: string;
      paginationItem: string;
      resultCard: string;
      emptyState: string;
    }>;
  }>;
  supabase: Readonly<{ url: string; serviceRoleKey: string }> | null;
  exportDir: string;
}>;

/**
 * Builds the process-wide configuration from environment variables.
 * Called once at startup; components receive the pieces they need.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    workerApiKey: e.WORKER_API_KEY,
    marketplaceBaseUrl: e.MARKETPLACE_BASE_URL.replace(/\/+$/, ''),
    extraction: {
      apiKey: e.FIRECRAWL_API_KEY,
      apiUrl: e.FIRECRAWL_API_URL.replace(/\/+$/, ''),
      timeoutMs: e.EXTRACTION_TIMEOUT_MS,
    },
    runner: {
      pageRetries: e.PAGE_RETRIES,
      retryDelayMs: e.RETRY_DELAY_MS,
    },
    browser: {
      wsEndpoint: e.BROWSER_WS_ENDPOINT,
      executablePath: e.BROWSER_EXECUTABLE_PATH,
      navigationTimeoutMs: e.NAVIGATION_TIMEOUT_MS,
      renderTimeoutMs: e.RENDER_TIMEOUT_MS,
      selectors: {
        pagination: e.PAGINATION_SELECTOR,
        paginationItem: e.PAGINATION_ITEM_SELECTOR,
        resultCard: e.RESULT_CARD_SELECTOR,
        emptyState: e.EMPTY_STATE_SELECTOR,
      },
    },
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    exportDir: e.EXPORT_DIR,
  });
}
