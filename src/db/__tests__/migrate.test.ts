import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { runMigrations } from '../migrate.js';
import { DbError } from '../../shared/errors.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates all tables from 001_init.sql', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual([
      '_migrations',
      'alerts',
      'cache_entries',
      'collection_jobs',
      'records',
      'source_state',
    ]);
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied.length).toBe(0);
    expect(second.skipped.length).toBeGreaterThan(0);
  });

  it('records applied migrations in _migrations table', () => {
    runMigrations(db);

    const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
    expect(rows.length).toBeGreaterThan(0);
    expect(rows.some((r) => r.name === '001_init.sql')).toBe(true);
  });

  it('creates correct indexes', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%'")
      .all() as Array<{ name: string }>;

    const indexNames = indexes.map((i) => i.name);
    expect(indexNames).toContain('idx_jobs_source_trigger');
    expect(indexNames).toContain('idx_jobs_status');
    expect(indexNames).toContain('idx_records_source_created');
    expect(indexNames).toContain('idx_alerts_source_created');
    expect(indexNames).toContain('idx_cache_expires');
  });

  it('keeps records append-only', () => {
    runMigrations(db);
    db.prepare(
      `INSERT INTO records (id, source_key, content_hash, kind, payload_json, derived_json, fetched_at, created_at)
       VALUES ('r1', 'dane_ipc', 'h1', 'api', '{}', '{}', '2026-01-01', '2026-01-01')`,
    ).run();

    expect(() => db.prepare("UPDATE records SET title = 'x' WHERE id = 'r1'").run()).toThrow('records are append-only');
    expect(() =>
      db
        .prepare(
          `INSERT INTO records (id, source_key, content_hash, kind, payload_json, derived_json, fetched_at, created_at)
           VALUES ('r2', 'dane_ipc', 'h1', 'api', '{}', '{}', '2026-01-01', '2026-01-01')`,
        )
        .run(),
    ).toThrow('UNIQUE');
  });

  describe('with a custom directory', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tidewatch-migrate-'));
      fs.writeFileSync(path.join(dir, '002_second.sql'), 'CREATE TABLE second (id INTEGER);');
      fs.writeFileSync(path.join(dir, '001_first.sql'), 'CREATE TABLE first (id INTEGER);');
      fs.writeFileSync(path.join(dir, 'README.md'), 'not a migration');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('applies .sql files in name order', () => {
      expect(runMigrations(db, dir)).toEqual({ applied: ['001_first.sql', '002_second.sql'], skipped: [] });
    });

    it('picks up a new file on the next run', () => {
      runMigrations(db, dir);
      fs.writeFileSync(path.join(dir, '003_third.sql'), 'CREATE TABLE third (id INTEGER);');
      expect(runMigrations(db, dir)).toEqual({
        applied: ['003_third.sql'],
        skipped: ['001_first.sql', '002_second.sql'],
      });
    });

    it('refuses a migration edited after it was applied', () => {
      runMigrations(db, dir);
      fs.writeFileSync(path.join(dir, '001_first.sql'), 'CREATE TABLE first (id INTEGER, name TEXT);');
      expect(() => runMigrations(db, dir)).toThrow('Migration changed after it was applied: 001_first.sql');
    });

    it('rolls back a failing migration and records nothing for it', () => {
      fs.writeFileSync(path.join(dir, '002_second.sql'), 'CREATE TABLE second (id INTEGER); SELECT * FROM missing;');
      expect(() => runMigrations(db, dir)).toThrow(DbError);

      const names = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
      expect(names.map((r) => r.name)).toEqual(['001_first.sql']);
      const second = db.prepare("SELECT name FROM sqlite_master WHERE name = 'second'").get();
      expect(second).toBeUndefined();
    });

    it('fails when the directory is missing', () => {
      expect(() => runMigrations(db, path.join(dir, 'absent'))).toThrow('Migrations directory not found');
    });
  });
});
