#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import type { Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { getTidewatchDir, resolvePath } from '../shared/utils.js';
import { closeDb, openDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { getBundledSourcesPath, loadSources } from '../sources/registry.js';
import { startServer } from '../api/server.js';
import { createRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { JobQuerySchema, AlertQuerySchema, CacheInvalidateSchema, parseQuery } from '../admin/service.js';

const program = new Command();

program
  .name('tidewatch')
  .description('Tiered collection scheduler for public data APIs and news feeds')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config, sources file and database')
  .action(async () => {
    const dir = getTidewatchDir();
    const configPath = path.join(dir, 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const sourcesPath = resolvePath(config.sources_file);
    if (!fs.existsSync(sourcesPath)) {
      fs.mkdirSync(path.dirname(sourcesPath), { recursive: true });
      fs.copyFileSync(getBundledSourcesPath(), sourcesPath);
      log(`✓ ${sourcesPath} created from the bundled source list`);
    } else {
      log(`✓ ${sourcesPath} already exists`);
    }

    const sources = loadSources(config);
    log(`✓ ${sources.size} sources pass validation`);

    const db = openDb(config.db.path);
    try {
      const { applied } = runMigrations(db);
      log(
        applied.length > 0
          ? `✓ ${resolvePath(config.db.path)} ready (${applied.length} migrations applied)`
          : `✓ ${resolvePath(config.db.path)} already up to date`,
      );
    } finally {
      closeDb(db);
    }
  });

// === serve ===
program
  .command('serve')
  .description('Start the scheduler and the admin HTTP API')
  .option('-p, --port <n>', 'Port number')
  .action(async (opts: { port?: string }) => {
    await startServer({ port: opts.port ? parseInt(opts.port, 10) : undefined });
  });

// === sources ===
const sourcesCmd = program.command('sources').description('Inspect configured sources');

sourcesCmd
  .command('list')
  .description('List configured sources')
  .action(async () => {
    const config = await loadConfig();
    const sources = loadSources(config);
    for (const s of sources.list()) {
      const mark = s.enabled ? '●' : '○';
      log(
        `${mark} ${s.key.padEnd(18)} ${s.kind.padEnd(8)} ${s.priority.padEnd(7)} every ${String(s.interval).padStart(4)}m  ${s.rate_limit}/min  ${s.name}`,
      );
    }
    log(`\n${sources.size} sources total`);
  });

sourcesCmd
  .command('test <key>')
  .description('Check that a source answers')
  .action(async (key: string) => {
    await withRuntime(async (runtime) => {
      const result = await runtime.admin.testSource(key);
      log(`${result.ok ? '✓' : '✗'} ${result.key} (${result.kind}) ${result.latencyMs}ms`);
      if (!result.ok) process.exitCode = 1;
    });
  });

// === collect ===
program
  .command('collect <key>')
  .description('Run one collection for a source now')
  .action(async (key: string) => {
    await withRuntime(async (runtime) => {
      const { job_id } = await runtime.admin.triggerNow(key);
      await runtime.scheduler.whenIdle();

      const done = runtime.jobs.getJob(job_id);
      if (!done) return;
      if (done.status === 'succeeded') {
        log(`Collection complete (${done.job_id}):`);
        log(`  Items fetched:   ${done.items_fetched ?? 0}`);
        log(`  Items stored:    ${done.items_stored ?? 0}`);
        log(`  Items duplicate: ${done.items_duplicate ?? 0}`);
        log(`  Item errors:     ${done.item_errors ?? 0}`);
      } else {
        log(`Collection ${done.status} (${done.error_kind ?? 'unknown'}): ${done.last_error ?? ''}`);
        if (done.next_retry_at) log(`  Retry pending at ${done.next_retry_at}`);
        process.exitCode = 1;
      }
    });
  });

// === status ===
program
  .command('status <key>')
  .description('Show scheduling state for a source')
  .action(async (key: string) => {
    await withRuntime(async (runtime) => {
      const status = await runtime.admin.status(key);
      log(`${status.key}${status.paused ? ' (paused)' : ''}`);
      log(`  Last run:             ${status.lastRun ?? 'never'}`);
      log(`  Last success:         ${status.lastSuccess ?? 'never'}`);
      log(`  Next run:             ${status.nextRun ?? '-'}`);
      log(`  Pending retry:        ${status.pendingRetryAt ?? '-'}`);
      log(`  Consecutive failures: ${status.consecutiveFailures}`);
      if (status.lastError) log(`  Last error:           ${status.lastError}`);
    });
  });

// === jobs ===
program
  .command('jobs')
  .description('List recent collection jobs')
  .option('-s, --source <key>', 'Filter by source')
  .option('--status <status>', 'Filter by status')
  .option('-l, --limit <n>', 'Max jobs to show', '20')
  .action(async (opts: { source?: string; status?: string; limit: string }) => {
    const q = parseQuery(JobQuerySchema, opts);
    await withRuntime(async (runtime) => {
      const jobs = runtime.admin.listJobs({ source_key: q.source, status: q.status, limit: q.limit });
      if (jobs.length === 0) {
        log('No jobs recorded yet.');
        return;
      }
      for (const j of jobs) {
        const error = j.last_error ? `  ${j.last_error}` : '';
        log(
          `${j.trigger_time}  ${j.source_key.padEnd(18)} ${j.trigger_kind.padEnd(9)} #${j.attempt_count} ${j.status.padEnd(13)}${error}`,
        );
      }
    });
  });

// === alerts ===
program
  .command('alerts')
  .description('List recent alerts')
  .option('-s, --source <key>', 'Filter by source')
  .option('-k, --kind <kind>', 'Filter by alert kind')
  .option('-l, --limit <n>', 'Max alerts to show', '20')
  .action(async (opts: { source?: string; kind?: string; limit: string }) => {
    const q = parseQuery(AlertQuerySchema, opts);
    await withRuntime(async (runtime) => {
      const alerts = await runtime.admin.listAlerts({ source_key: q.source, kind: q.kind, limit: q.limit });
      if (alerts.length === 0) {
        log('No alerts.');
        return;
      }
      for (const a of alerts) {
        log(`${a.created_at}  [${a.severity}] ${a.message}`);
      }
    });
  });

// === cache ===
const cacheCmd = program.command('cache').description('Inspect and clear the shared cache');

cacheCmd
  .command('invalidate [pattern]')
  .description('Delete cache entries matching a glob, or every entry for one source')
  .option('-s, --source <key>', 'Clear everything cached for a source')
  .action(async (pattern: string | undefined, opts: { source?: string }) => {
    const request = parseQuery(CacheInvalidateSchema, { pattern, source: opts.source });
    await withRuntime(async (runtime) => {
      const { invalidated, patterns } = await runtime.admin.invalidateCache(request);
      log(`✓ ${invalidated} entries removed (${patterns.join(', ')})`);
    });
  });

// === Helper: build a runtime against the configured database ===
async function withRuntime(fn: (runtime: Runtime) => Promise<void>): Promise<void> {
  const config: Config = await loadConfig();
  if (!fs.existsSync(resolvePath(config.db.path))) {
    log('Database not found. Run tidewatch init first.');
    process.exit(1);
  }

  const runtime = createRuntime({ config });
  try {
    await fn(runtime);
  } finally {
    await runtime.shutdown();
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
