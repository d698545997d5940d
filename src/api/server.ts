import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { AdminService } from '../admin/service.js';
import type { Db } from '../db/db.js';
import type { Config } from '../shared/config.js';
import { TidewatchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getTidewatchDir } from '../shared/utils.js';
import { createRuntime } from '../runtime.js';
import { adminRoutes } from './routes/admin.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  admin: AdminService;
  db: Db;
  config: Config;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', adminRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof TidewatchError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'VALIDATION_ERROR':
      return 400;
    case 'SOURCE_ERROR':
      return 404;
    case 'JOB_CONFLICT':
    case 'JOB_STATE_ERROR':
      return 409;
    case 'CAPACITY_ERROR':
      return 429;
    case 'TRANSIENT_ERROR':
    case 'LLM_ERROR':
    case 'ENRICHMENT_ERROR':
      return 502;
    case 'FATAL_ERROR':
      return 503;
    default:
      return 500;
  }
}

/** Write the default config on first run. */
function autoInit(): void {
  const configPath = path.join(getTidewatchDir(), 'config.yaml');
  if (!fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ path: configPath }, 'First run: default config written');
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const runtime = createRuntime({ config });
  const app = createApp({ admin: runtime.admin, db: runtime.db, config });

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Tidewatch admin API listening');
  });

  runtime.start();

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');
    server.close();
    runtime
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
