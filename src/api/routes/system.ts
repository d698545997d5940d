import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health — basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
    });
  });

  // GET /api/config — current config, api_key masked
  app.get('/config', (c) => {
    const llm = { ...ctx.config.llm, api_key: ctx.config.llm.api_key ? '***' : '' };
    return c.json({ ...ctx.config, llm });
  });

  // GET /api/doctor — store and model checks
  app.get('/doctor', (c) => {
    const checks: Record<string, string> = {};

    try {
      ctx.db.prepare('SELECT 1').get();
      checks['db'] = 'ok';
    } catch {
      checks['db'] = 'error';
    }

    checks['enrichment'] = ctx.config.enrichment.model;
    checks['llm'] = ctx.config.llm.api_key ? 'configured' : 'unconfigured';
    return c.json(checks);
  });

  // GET /api/stats — scheduler, store, cache and enrichment counters
  app.get('/stats', async (c) => {
    return c.json(await ctx.admin.stats());
  });

  return app;
}
