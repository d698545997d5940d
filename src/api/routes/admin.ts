import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import {
  AlertQuerySchema,
  CacheInvalidateSchema,
  JobQuerySchema,
  RecordQuerySchema,
  parseQuery,
} from '../../admin/service.js';

export function adminRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/sources — configured sources with paused flag
  app.get('/sources', async (c) => {
    return c.json(await ctx.admin.listSources());
  });

  // GET /api/sources/:key/status
  app.get('/sources/:key/status', async (c) => {
    return c.json(await ctx.admin.status(c.req.param('key')));
  });

  // POST /api/sources/:key/trigger — run a collection now
  app.post('/sources/:key/trigger', async (c) => {
    const job = await ctx.admin.triggerNow(c.req.param('key'));
    return c.json(job, 202);
  });

  app.post('/sources/:key/pause', async (c) => {
    return c.json(await ctx.admin.pause(c.req.param('key')));
  });

  app.post('/sources/:key/resume', async (c) => {
    return c.json(await ctx.admin.resume(c.req.param('key')));
  });

  // POST /api/sources/:key/test — adapter connectivity check
  app.post('/sources/:key/test', async (c) => {
    return c.json(await ctx.admin.testSource(c.req.param('key')));
  });

  // GET /api/jobs?source=&status=&limit=&offset=
  app.get('/jobs', (c) => {
    const q = parseQuery(JobQuerySchema, c.req.query());
    return c.json(ctx.admin.listJobs({ source_key: q.source, status: q.status, limit: q.limit, offset: q.offset }));
  });

  // GET /api/records?source=&since=&limit=&offset=
  app.get('/records', async (c) => {
    const q = parseQuery(RecordQuerySchema, c.req.query());
    return c.json(
      await ctx.admin.listRecords({ source_key: q.source, since: q.since, limit: q.limit, offset: q.offset }),
    );
  });

  // GET /api/alerts?source=&kind=&since=&limit=&offset=
  app.get('/alerts', async (c) => {
    const q = parseQuery(AlertQuerySchema, c.req.query());
    return c.json(
      await ctx.admin.listAlerts({
        source_key: q.source,
        kind: q.kind,
        since: q.since,
        limit: q.limit,
        offset: q.offset,
      }),
    );
  });

  // POST /api/cache/invalidate — { "pattern": "records:v1:*" } or { "source": "dane_ipc" }
  app.post('/cache/invalidate', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    return c.json(await ctx.admin.invalidateCache(parseQuery(CacheInvalidateSchema, body)));
  });

  return app;
}
