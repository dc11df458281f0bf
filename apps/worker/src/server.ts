import http from 'node:http';
import { z } from 'zod';
import { InvalidQueryError, ScraperError, httpStatusFor, toUserMessage } from './errors';
import { exportResultSet } from './services/exporter';
import { summarizeFailures, type ScrapeOrchestrator } from './services/search-runner';

export type ServerDeps = {
  runner: ScrapeOrchestrator;
  exportDir: string;
  apiKey?: string;
};

const queryBodySchema = z.object({
  brand: z.string(),
  model: z.string(),
  maxMileage: z.number().nullish(),
});

const searchBodySchema = queryBodySchema.extend({
  pages: z.number().optional(),
  refresh: z.boolean().optional(),
});

const MAX_BODY_BYTES = 64 * 1024;

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new InvalidQueryError('Request body too large');
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString('utf8');
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidQueryError('Request body is not valid JSON');
  }
}

async function parseBody<T extends z.ZodTypeAny>(req: http.IncomingMessage, schema: T): Promise<z.output<T>> {
  const parsed = schema.safeParse(await readJson(req));
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => i.path.join('.') || 'body'))];
    throw new InvalidQueryError(`Invalid request body: ${fields.join(', ')}`);
  }
  return parsed.data;
}

function isAuthorized(req: http.IncomingMessage, apiKey: string | undefined): boolean {
  if (!apiKey) return true;
  return req.headers['authorization'] === `Bearer ${apiKey}`;
}

async function handle(deps: ServerDeps, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  // Health check
  if (req.method === 'GET' && req.url === '/health') {
    sendJson(res, 200, { status: 'ok' });
    return;
  }

  if (req.method !== 'POST' || !['/pages', '/search', '/export'].includes(req.url ?? '')) {
    sendJson(res, 404, { error: 'Not found' });
    return;
  }

  if (!isAuthorized(req, deps.apiKey)) {
    sendJson(res, 401, { error: 'Unauthorized' });
    return;
  }

  // Detect pages: POST /pages
  if (req.url === '/pages') {
    const body = await parseBody(req, queryBodySchema);
    const { search, pageCount } = await deps.runner.discoverPages(body);
    sendJson(res, 200, { url: search.url, key: search.key, pageCount });
    return;
  }

  const { pages, refresh, ...query } = await parseBody(req, searchBodySchema);
  const run = await deps.runner.search(query, { pages, refresh });

  // Scrape (or load from cache): POST /search
  if (req.url === '/search') {
    sendJson(res, 200, { ...run, summary: summarizeFailures(run.failedPages) });
    return;
  }

  // Download as CSV: POST /export
  if (run.records.length === 0) {
    sendJson(res, 404, { error: 'no_results', message: 'No listings found for this search.' });
    return;
  }

  const file = await exportResultSet(run.records, { directory: deps.exportDir, timestamp: new Date(run.scrapedAt) });
  res.writeHead(200, {
    'Content-Type': 'text/csv',
    'Content-Disposition': `attachment; filename="${file.filename}"`,
  });
  res.end(file.csv);
}

export function createTriggerServer(deps: ServerDeps): http.Server {
  return http.createServer((req, res) => {
    handle(deps, req, res).catch((err: unknown) => {
      if (err instanceof ScraperError) {
        console.error(`[Worker] ${req.method} ${req.url} failed (${err.code}):`, err.message);
        sendJson(res, httpStatusFor(err), { error: err.code, message: toUserMessage(err), detail: err.message });
        return;
      }
      console.error(`[Worker] ${req.method} ${req.url} failed:`, err);
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'internal', message: toUserMessage(err) });
      } else {
        res.end();
      }
    });
  });
}
