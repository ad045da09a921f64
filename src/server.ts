import fs from 'node:fs/promises';
import http from 'node:http';
import type { Config } from './config.js';
import { parseListingsCsv } from './export/csv.js';
import { runPipeline } from './pipeline.js';
import type { PipelineResult } from './pipeline.js';
import { createRedditSource } from './scrapers/reddit.js';
import type { ListingSource } from './scrapers/types.js';

export type SourceFactory = (config: Config) => ListingSource;

interface LastRun {
  finishedAt: string;
  dryRun: boolean;
  rows: number | null;
  filePath: string | null;
  error: string | null;
}

function json(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function authenticate(req: http.IncomingMessage, token: string): boolean {
  if (!token) return true; // no token configured = open (dev mode)
  return req.headers.authorization === `Bearer ${token}`;
}

export function redditSourceFor(config: Config): ListingSource {
  return createRedditSource({
    clientId: config.REDDIT_CLIENT_ID,
    clientSecret: config.REDDIT_CLIENT_SECRET,
    userAgent: config.REDDIT_USER_AGENT,
  });
}

export function createExportServer(config: Config, createSource: SourceFactory = redditSourceFor): http.Server {
  let isRunning = false;
  let lastRun: LastRun | null = null;
  let lastExportPath: string | null = null;

  async function triggerRun(dryRun: boolean): Promise<PipelineResult> {
    isRunning = true;
    try {
      const result = await runPipeline({
        source: createSource(config),
        sourceId: config.SUBREDDIT,
        monthsBack: config.MONTHS_BACK,
        maxCount: config.FETCH_LIMIT,
        outputDir: config.OUTPUT_DIR,
        dryRun,
      });
      if (result.filePath) {
        lastExportPath = result.filePath;
      }
      lastRun = {
        finishedAt: new Date().toISOString(),
        dryRun,
        rows: result.rows,
        filePath: result.filePath,
        error: null,
      };
      return result;
    } catch (err) {
      lastRun = {
        finishedAt: new Date().toISOString(),
        dryRun,
        rows: null,
        filePath: null,
        error: err instanceof Error ? err.message : String(err),
      };
      throw err;
    } finally {
      isRunning = false;
    }
  }

  async function sendExport(res: http.ServerResponse, format: string | null) {
    if (!lastExportPath) {
      json(res, 404, { error: 'No export has been written yet' });
      return;
    }
    const content = await fs.readFile(lastExportPath, 'utf-8');
    if (format === 'json') {
      const records = parseListingsCsv(content);
      json(res, 200, { count: records.length, records });
      return;
    }
    res.writeHead(200, { 'Content-Type': 'text/csv; charset=utf-8' });
    res.end(content);
  }

  return http.createServer((req, res) => {
    const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);

    // GET / or /health
    if (req.method === 'GET' && (url.pathname === '/' || url.pathname === '/health')) {
      json(res, 200, { status: 'ok', isRunning, lastRun });
      return;
    }

    // POST /trigger
    if (req.method === 'POST' && url.pathname === '/trigger') {
      if (!authenticate(req, config.EXPORT_API_TOKEN)) {
        json(res, 401, { error: 'Unauthorized' });
        return;
      }

      if (isRunning) {
        json(res, 409, { error: 'A run is already in progress' });
        return;
      }

      const dryRun = url.searchParams.get('dry_run') === 'true';
      json(res, 202, { message: 'Run started', dryRun });

      triggerRun(dryRun).catch((err) => {
        console.error(`[server] Pipeline error: ${err instanceof Error ? err.message : err}`);
      });
      return;
    }

    // GET /export
    if (req.method === 'GET' && url.pathname === '/export') {
      if (!authenticate(req, config.EXPORT_API_TOKEN)) {
        json(res, 401, { error: 'Unauthorized' });
        return;
      }

      sendExport(res, url.searchParams.get('format')).catch((err) => {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(`[server] Export read failed: ${msg}`);
        json(res, 500, { error: msg });
      });
      return;
    }

    json(res, 404, { error: 'Not found' });
  });
}

export function startServer(config: Config) {
  const PORT = parseInt(process.env.PORT || '3000', 10);
  const server = createExportServer(config);
  server.listen(PORT, '0.0.0.0', () => {
    console.log(`[server] Export HTTP server listening on port ${PORT}`);
    console.log(`[server] Runs are manual-only; use POST /trigger to start`);
  });
}
