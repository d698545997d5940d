import type { SourceDefinition } from '../registry.js';
import type { AdapterOptions, RawItem, SourceAdapter } from '../types.js';
import { CapacityError, TransientError, ValidationError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { isRecord, nowISO } from '../../shared/utils.js';

/**
 * Walk a dotted path (`result.records`) into a parsed JSON body.
 * Arrays yield their elements; a single object yields itself.
 */
export function selectRows(body: unknown, recordsPath?: string): unknown[] {
  let node: unknown = body;
  if (recordsPath) {
    for (const segment of recordsPath.split('.')) {
      if (!isRecord(node) || !(segment in node)) {
        throw new ValidationError(`Response has no "${recordsPath}"`, { records_path: recordsPath });
      }
      node = node[segment];
    }
  }
  if (Array.isArray(node)) return node;
  if (node === null || node === undefined) return [];
  return [node];
}

/** Seconds or HTTP date, as sent in Retry-After. */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Generic JSON API client. Each selected row becomes one item with
 * payload `{ source, data }`.
 */
export class JsonApiAdapter implements SourceAdapter {
  readonly kind = 'api' as const;

  constructor(
    private readonly source: SourceDefinition,
    private readonly options: AdapterOptions,
  ) {}

  async fetch(signal?: AbortSignal): Promise<RawItem[]> {
    const { url } = this.source;
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
        signal,
        redirect: 'follow',
      });
    } catch (err) {
      throw new TransientError(`Request to ${this.source.key} failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
      });
    }

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
      throw new CapacityError(`${this.source.key} is rate limiting requests`, { url, status: 429 }, retryAfterMs);
    }
    if (response.status >= 500) {
      throw new TransientError(`${this.source.key} returned ${response.status}`, { url, status: response.status });
    }
    if (!response.ok) {
      throw new ValidationError(`${this.source.key} returned ${response.status}`, { url, status: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ValidationError(`${this.source.key} returned a body that is not JSON`, { url });
    }

    const fetchedAt = nowISO();
    const rows = selectRows(body, this.source.records_path);
    logger.debug({ source: this.source.key, count: rows.length }, 'API fetched');

    return rows.map((row) => ({
      source_key: this.source.key,
      fetched_at: fetchedAt,
      payload: { source: this.source.key, data: row },
    }));
  }

  async testConnection(): Promise<boolean> {
    try {
      const response = await fetch(this.source.url, {
        headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      return response.ok;
    } catch (err) {
      logger.debug({ source: this.source.key, error: err instanceof Error ? err.message : String(err) }, 'Connection test failed');
      return false;
    }
  }
}
