import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot, sha256 } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

interface MigrationFile {
  name: string;
  sql: string;
  checksum: string;
}

interface AppliedRow {
  name: string;
  checksum: string;
}

export const DEFAULT_MIGRATIONS_DIR = path.join(getPackageRoot(), 'src', 'db', 'migrations');

function readMigrations(dir: string): MigrationFile[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => {
      const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
      return { name, sql, checksum: sha256(sql) };
    });
}

/**
 * Applies every pending `.sql` file in name order, each in its own
 * transaction. A file that changed after it was applied is refused.
 */
export function runMigrations(db: Database.Database, dir: string = DEFAULT_MIGRATIONS_DIR): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      checksum   TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const rows = db.prepare('SELECT name, checksum FROM _migrations').all() as AppliedRow[];
  const known = new Map(rows.map((r) => [r.name, r.checksum]));
  const record = db.prepare('INSERT INTO _migrations (name, checksum) VALUES (?, ?)');

  const result: MigrationResult = { applied: [], skipped: [] };
  for (const migration of readMigrations(dir)) {
    const checksum = known.get(migration.name);
    if (checksum !== undefined) {
      if (checksum !== migration.checksum) {
        throw new DbError(`Migration changed after it was applied: ${migration.name}`, {
          migration: migration.name,
        });
      }
      result.skipped.push(migration.name);
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.name, migration.checksum);
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, {
        migration: migration.name,
        cause: errorMessage(err),
      });
    }
    result.applied.push(migration.name);
    logger.info({ migration: migration.name }, 'Migration applied');
  }
  return result;
}
