import http from 'http';
import type { TrackerStats } from '@occupancy-meter/types';
import type { SnapshotBoard } from './publisher';

/** The slice of TrackerRegistry the HTTP surface needs. */
export interface TrackedSources {
  getStats(): Readonly<TrackerStats>;
  get(sourceId: string): { reset(): Promise<void> } | undefined;
}

export interface HealthContext {
  registry: TrackedSources;
  board: SnapshotBoard;
  startedAt: number;
  now?: () => number;
}

export interface HealthServerConfig extends Omit<HealthContext, 'startedAt'> {
  port: number;
}

export interface RouteResult {
  status: number;
  body?: unknown;
}

const RESET_PATH = /^\/sources\/([^/]+)\/reset$/;

export async function routeRequest(
  method: string,
  url: string,
  ctx: HealthContext
): Promise<RouteResult> {
  const now = ctx.now ? ctx.now() : Date.now();
  const path = new URL(url, 'http://localhost').pathname;

  if (method === 'GET' && (path === '/healthz' || path === '/health')) {
    return {
      status: 200,
      body: {
        status: 'ok',
        uptime: Math.floor((now - ctx.startedAt) / 1000),
        stats: ctx.registry.getStats(),
      },
    };
  }

  if (method === 'GET' && path === '/metrics') {
    return { status: 200, body: { sources: ctx.board.render(now) } };
  }

  const reset = method === 'POST' ? RESET_PATH.exec(path) : null;
  if (reset) {
    let sourceId: string;
    try {
      sourceId = decodeURIComponent(reset[1]);
    } catch {
      return { status: 400, body: { error: 'Malformed source id' } };
    }
    const tracker = ctx.registry.get(sourceId);
    if (!tracker) {
      return { status: 404, body: { error: 'Unknown source', sourceId } };
    }
    await tracker.reset();
    return { status: 200, body: { status: 'reset', sourceId } };
  }

  return { status: 404 };
}

export function createHealthServer(config: HealthServerConfig): http.Server {
  const ctx: HealthContext = {
    registry: config.registry,
    board: config.board,
    now: config.now,
    startedAt: config.now ? config.now() : Date.now(),
  };

  const server = http.createServer((req, res) => {
    routeRequest(req.method ?? 'GET', req.url ?? '/', ctx).then(
      (result) => {
        if (result.body === undefined) {
          res.writeHead(result.status);
          res.end();
          return;
        }
        res.writeHead(result.status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(result.body));
      },
      (error: unknown) => {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: error instanceof Error ? error.message : String(error) }));
      }
    );
  });

  server.listen(config.port);
  return server;
}
