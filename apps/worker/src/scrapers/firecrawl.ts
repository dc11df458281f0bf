import { z } from 'zod';
import { ExtractionServiceError, errorMessage } from '../errors';

export type ExtractionRequest = {
  url: string;
  schema: Record<string, unknown>;
  prompt: string;
  systemPrompt: string;
};

/**
 * A structured-extraction backend: given a page URL and a JSON schema, returns the
 * extracted object (unvalidated). One outbound call per invocation.
 */
export interface ExtractionService {
  extract(request: ExtractionRequest): Promise<unknown>;
}

export type FirecrawlOptions = {
  apiKey: string;
  apiUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

const scrapeResponseSchema = z.object({
  success: z.boolean(),
  data: z.object({ extract: z.unknown() }).partial().optional(),
  error: z.string().optional(),
});

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class FirecrawlClient implements ExtractionService {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: FirecrawlOptions) {
    this.fetchFn = options.fetchImpl ?? fetch;
  }

  async extract(request: ExtractionRequest): Promise<unknown> {
    const endpoint = `${this.options.apiUrl}/v1/scrape`;

    let response: Response;
    try {
      response = await this.fetchFn(endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          url: request.url,
          formats: ['extract'],
          extract: {
            schema: request.schema,
            prompt: request.prompt,
            systemPrompt: request.systemPrompt,
          },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      if (isTimeout(err)) {
        throw new ExtractionServiceError(`Extraction timed out after ${this.options.timeoutMs}ms for ${request.url}`, null, {
          cause: err,
        });
      }
      throw new ExtractionServiceError(`Extraction request failed for ${request.url}: ${errorMessage(err)}`, null, {
        cause: err,
      });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new ExtractionServiceError(
        `Firecrawl returned ${response.status} for ${request.url}: ${text.slice(0, 200)}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ExtractionServiceError(`Firecrawl returned invalid JSON for ${request.url}`, response.status, { cause: err });
    }

    const parsed = scrapeResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionServiceError(`Unexpected Firecrawl response shape for ${request.url}`, response.status);
    }
    if (!parsed.data.success) {
      throw new ExtractionServiceError(
        `Firecrawl could not scrape ${request.url}: ${parsed.data.error ?? 'unknown error'}`,
        response.status,
      );
    }

    return parsed.data.data?.extract;
  }
}
