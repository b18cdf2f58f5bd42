import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { CockpitConfigParsed } from '../config/schema.js';
import { createApi } from './api.js';
import type { ApiDeps } from './api.js';
import { mapError } from './errors.js';

export const VERSION = '0.1.0';

export interface ServerDeps extends ApiDeps {
  config: CockpitConfigParsed;
}

export function createServer(deps: ApiDeps): Hono {
  const app = new Hono();

  app.get('/health', (c) => c.json({ ok: true, version: VERSION }));

  app.route('/api', createApi(deps));

  app.notFound((c) => c.json({ ok: false, error: { code: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}` } }, 404));

  app.onError((err, c) => {
    const { status, body } = mapError(err);
    if (status === 500) {
      console.error(`[server] ${c.req.method} ${c.req.path} failed:`, err);
    }
    return c.json(body, status);
  });

  return app;
}

export function startServer(deps: ServerDeps): void {
  const app = createServer(deps);
  const { host, port } = deps.config;

  serve({
    fetch: app.fetch,
    hostname: host,
    port,
  });

  console.log(`Media cockpit listening on http://${host}:${port}`);
}
