import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, FatalError, TidewatchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type Db = Database.Database;

/**
 * Open a database handle. There is no module-level instance: the runtime
 * opens one at startup and passes it to every store that needs it.
 */
export function openDb(dbPath: string): Db {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  try {
    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    logger.debug({ path: resolved }, 'Database opened');
    return db;
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}

const UNAVAILABLE_CODES = /^SQLITE_(CANTOPEN|IOERR|FULL|BUSY|LOCKED|NOTADB|CORRUPT|READONLY)/;

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return null;
}

/**
 * Run a store operation. "Store unavailable" failures (closed handle, I/O,
 * lock or disk errors) become FatalError; other SQLite errors become DbError.
 * Errors already in the Tidewatch taxonomy pass through.
 */
export function runGuarded<T>(db: Db, op: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof TidewatchError) throw err;
    const code = sqliteCode(err);
    const message = err instanceof Error ? err.message : String(err);
    if (!db.open || (code !== null && UNAVAILABLE_CODES.test(code))) {
      throw new FatalError(`Store unavailable during ${op}: ${message}`, { code });
    }
    throw new DbError(`Store ${op} failed: ${message}`, { code });
  }
}
