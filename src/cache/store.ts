import type Database from 'better-sqlite3';

/**
 * Key/value backing store shared by every cache user.
 * Values are opaque strings; the cache manager owns serialization.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Delete every key matching a glob (`*`, `?`, `[abc]`). Returns the count. */
  deleteByPattern(pattern: string): Promise<number>;
  purgeExpired(): Promise<number>;
  size(): Promise<number>;
}

/**
 * Translate a cache glob into an anchored RegExp.
 */
export function globToRegExp(pattern: string): RegExp {
  let out = '^';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === '*') {
      out += '.*';
    } else if (ch === '?') {
      out += '.';
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        out += '\\[';
      } else {
        let body = pattern.slice(i + 1, close).replace(/\\/g, '\\\\');
        if (body.startsWith('^')) body = `\\${body}`;
        out += `[${body}]`;
        i = close;
      }
    } else {
      out += ch.replace(/[.+^${}()|\\\]]/g, '\\$&');
    }
  }
  return new RegExp(`${out}$`, 's');
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryEntry>();

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async deleteByPattern(pattern: string): Promise<number> {
    const re = globToRegExp(pattern);
    let deleted = 0;
    for (const key of [...this.entries.keys()]) {
      if (re.test(key)) {
        this.entries.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  async purgeExpired(): Promise<number> {
    const now = Date.now();
    let purged = 0;
    for (const [key, entry] of [...this.entries]) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        purged++;
      }
    }
    return purged;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}

/**
 * Cache backed by the `cache_entries` table. SQLite GLOB has the same
 * wildcard syntax as the cache patterns, so deletes run in one statement.
 */
export class SqliteCacheStore implements CacheStore {
  constructor(private readonly db: Database.Database) {}

  async get(key: string): Promise<string | null> {
    const row = this.db
      .prepare('SELECT value FROM cache_entries WHERE key = ? AND expires_at > ?')
      .get(key, Date.now()) as { value: string } | undefined;
    return row?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO cache_entries (key, value, expires_at, created_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (key) DO UPDATE SET
           value = excluded.value,
           expires_at = excluded.expires_at,
           created_at = excluded.created_at`,
      )
      .run(key, value, now + ttlSeconds * 1000, now);
  }

  async delete(key: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM cache_entries WHERE key = ?').run(key).changes > 0;
  }

  async deleteByPattern(pattern: string): Promise<number> {
    return this.db.prepare('DELETE FROM cache_entries WHERE key GLOB ?').run(pattern).changes;
  }

  async purgeExpired(): Promise<number> {
    return this.db.prepare('DELETE FROM cache_entries WHERE expires_at <= ?').run(Date.now()).changes;
  }

  async size(): Promise<number> {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM cache_entries').get() as { count: number };
    return row.count;
  }
}
