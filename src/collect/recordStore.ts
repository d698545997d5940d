import type Database from 'better-sqlite3';
import { runGuarded } from '../db/db.js';
import type { SourceKind } from '../sources/types.js';

export interface PersistedRecord {
  id: string;
  source_key: string;
  content_hash: string;
  kind: SourceKind;
  title: string | null;
  url: string | null;
  payload: Record<string, unknown>;
  derived: Record<string, unknown>;
  fetched_at: string;
  created_at: string;
}

export interface Alert {
  id: string;
  source_key: string;
  kind: string;
  severity: string;
  threshold: number;
  observed_value: number;
  message: string;
  record_id: string | null;
  created_at: string;
}

export interface RecordFilter {
  source_key?: string;
  since?: string;
  limit?: number;
  offset?: number;
}

export interface AlertFilter extends RecordFilter {
  kind?: string;
}

/**
 * Persistence consumed by the orchestrator. Writes happen between
 * `begin()` and `commit()`/`rollback()`; `(source_key, content_hash)`
 * uniqueness is enforced by the store itself.
 */
export interface RecordStore {
  begin(): void;
  /** Returns false when the record already exists. */
  insertOrIgnore(record: PersistedRecord): boolean;
  insertAlert(alert: Alert): void;
  commit(): void;
  rollback(): void;
  exists(sourceKey: string, contentHash: string): boolean;
  listRecords(filter?: RecordFilter): PersistedRecord[];
  listAlerts(filter?: AlertFilter): Alert[];
  countRecords(sourceKey?: string): number;
  countAlerts(sourceKey?: string): number;
}

interface RecordRow {
  id: string;
  source_key: string;
  content_hash: string;
  kind: SourceKind;
  title: string | null;
  url: string | null;
  payload_json: string;
  derived_json: string;
  fetched_at: string;
  created_at: string;
}

function parseJsonObject(raw: string): Record<string, unknown> {
  return JSON.parse(raw) as Record<string, unknown>;
}

function rowToRecord(row: RecordRow): PersistedRecord {
  return {
    id: row.id,
    source_key: row.source_key,
    content_hash: row.content_hash,
    kind: row.kind,
    title: row.title,
    url: row.url,
    payload: parseJsonObject(row.payload_json),
    derived: parseJsonObject(row.derived_json),
    fetched_at: row.fetched_at,
    created_at: row.created_at,
  };
}

function buildWhere(filter: AlertFilter): { where: string; values: unknown[] } {
  const clauses: string[] = [];
  const values: unknown[] = [];
  if (filter.source_key) {
    clauses.push('source_key = ?');
    values.push(filter.source_key);
  }
  if (filter.kind) {
    clauses.push('kind = ?');
    values.push(filter.kind);
  }
  if (filter.since) {
    clauses.push('created_at >= ?');
    values.push(filter.since);
  }
  return { where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', values };
}

export class SqliteRecordStore implements RecordStore {
  constructor(private readonly db: Database.Database) {}

  private guard<T>(op: string, fn: () => T): T {
    return runGuarded(this.db, op, fn);
  }

  begin(): void {
    this.guard('begin', () => this.db.exec('BEGIN IMMEDIATE'));
  }

  commit(): void {
    this.guard('commit', () => this.db.exec('COMMIT'));
  }

  rollback(): void {
    this.guard('rollback', () => {
      if (this.db.inTransaction) this.db.exec('ROLLBACK');
    });
  }

  insertOrIgnore(record: PersistedRecord): boolean {
    return this.guard('insert', () => {
      const result = this.db
        .prepare(
          `INSERT OR IGNORE INTO records
             (id, source_key, content_hash, kind, title, url, payload_json, derived_json, fetched_at, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          record.id,
          record.source_key,
          record.content_hash,
          record.kind,
          record.title,
          record.url,
          JSON.stringify(record.payload),
          JSON.stringify(record.derived),
          record.fetched_at,
          record.created_at,
        );
      return result.changes > 0;
    });
  }

  insertAlert(alert: Alert): void {
    this.guard('insert alert', () => {
      this.db
        .prepare(
          `INSERT INTO alerts (id, source_key, kind, severity, threshold, observed_value, message, record_id, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          alert.id,
          alert.source_key,
          alert.kind,
          alert.severity,
          alert.threshold,
          alert.observed_value,
          alert.message,
          alert.record_id,
          alert.created_at,
        );
    });
  }

  exists(sourceKey: string, contentHash: string): boolean {
    return this.guard('lookup', () => {
      const row = this.db
        .prepare('SELECT 1 AS found FROM records WHERE source_key = ? AND content_hash = ?')
        .get(sourceKey, contentHash);
      return row !== undefined;
    });
  }

  listRecords(filter: RecordFilter = {}): PersistedRecord[] {
    return this.guard('list records', () => {
      const { where, values } = buildWhere(filter);
      const rows = this.db
        .prepare(`SELECT * FROM records ${where} ORDER BY created_at DESC, id LIMIT ? OFFSET ?`)
        .all(...values, filter.limit ?? 50, filter.offset ?? 0) as RecordRow[];
      return rows.map(rowToRecord);
    });
  }

  listAlerts(filter: AlertFilter = {}): Alert[] {
    return this.guard('list alerts', () => {
      const { where, values } = buildWhere(filter);
      return this.db
        .prepare(`SELECT * FROM alerts ${where} ORDER BY created_at DESC, id LIMIT ? OFFSET ?`)
        .all(...values, filter.limit ?? 50, filter.offset ?? 0) as Alert[];
    });
  }

  countRecords(sourceKey?: string): number {
    return this.guard('count records', () => {
      const row = sourceKey
        ? (this.db.prepare('SELECT COUNT(*) AS count FROM records WHERE source_key = ?').get(sourceKey) as { count: number })
        : (this.db.prepare('SELECT COUNT(*) AS count FROM records').get() as { count: number });
      return row.count;
    });
  }

  countAlerts(sourceKey?: string): number {
    return this.guard('count alerts', () => {
      const row = sourceKey
        ? (this.db.prepare('SELECT COUNT(*) AS count FROM alerts WHERE source_key = ?').get(sourceKey) as { count: number })
        : (this.db.prepare('SELECT COUNT(*) AS count FROM alerts').get() as { count: number });
      return row.count;
    });
  }
}
