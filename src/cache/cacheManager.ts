import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { CacheStore } from './store.js';

/**
 * Staleness tolerance per cache category, in seconds. A TTL above the cap
 * is clamped down to it.
 */
export const CATEGORY_TTL_CAPS = {
  records: 3600,
  sources: 7200,
  alerts: 1800,
  'api:gov': 21600,
  'api:news': 3600,
  nlp: 604800,
  status: 60,
} as const;

export type CacheCategory = keyof typeof CATEGORY_TTL_CAPS;

export const CACHE_CATEGORIES: readonly CacheCategory[] = ['api:gov', 'api:news', 'records', 'sources', 'alerts', 'status', 'nlp'];

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  invalidated: number;
  errors: number;
  entries: number;
}

/** Resolve the category a full cache key belongs to. */
export function categoryOf(key: string): CacheCategory | null {
  for (const category of CACHE_CATEGORIES) {
    if (key.startsWith(`${category}:`)) return category;
  }
  return null;
}

export class CacheManager {
  private hits = 0;
  private misses = 0;
  private sets = 0;
  private invalidated = 0;
  private errors = 0;

  constructor(
    private readonly store: CacheStore,
    private readonly version = 'v1',
  ) {}

  /** `<category>:<version>:<part>:<part>...` */
  keyFor(category: CacheCategory, ...parts: Array<string | number>): string {
    return [category, this.version, ...parts.map(String)].join(':');
  }

  /** Pattern matching every key of a category family, e.g. `records:v1:dane_ipc:*`. */
  patternFor(category: CacheCategory, ...parts: string[]): string {
    return [category, this.version, ...parts, '*'].join(':');
  }

  clampTtl(key: string, ttlSeconds: number): number {
    const category = categoryOf(key);
    if (category === null) return ttlSeconds;
    return Math.min(ttlSeconds, CATEGORY_TTL_CAPS[category]);
  }

  async get<T>(key: string): Promise<T | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (err) {
      this.errors++;
      logger.warn({ key, error: errorMessage(err) }, 'Cache read failed, treating as miss');
      raw = null;
    }

    if (raw === null) {
      this.misses++;
      return null;
    }

    try {
      const value = JSON.parse(raw) as T;
      this.hits++;
      return value;
    } catch {
      this.errors++;
      this.misses++;
      logger.warn({ key }, 'Cache entry is not valid JSON, treating as miss');
      return null;
    }
  }

  /** Write-through. A failed write is logged and otherwise ignored. */
  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    const ttl = this.clampTtl(key, ttlSeconds);
    if (ttl <= 0) return;
    try {
      await this.store.set(key, JSON.stringify(value), ttl);
      this.sets++;
    } catch (err) {
      this.errors++;
      logger.warn({ key, error: errorMessage(err) }, 'Cache write failed');
    }
  }

  /**
   * Return the cached value or compute, store and return it.
   * Concurrent misses on the same key each compute.
   */
  async getOrSet<T>(key: string, ttlSeconds: number, compute: () => Promise<T>): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== null) return cached;

    const value = await compute();
    await this.set(key, value, ttlSeconds);
    return value;
  }

  async delete(key: string): Promise<boolean> {
    const deleted = await this.store.delete(key);
    if (deleted) this.invalidated++;
    return deleted;
  }

  /** Store failures propagate to the caller. */
  async invalidatePattern(pattern: string): Promise<number> {
    const count = await this.store.deleteByPattern(pattern);
    this.invalidated += count;
    logger.debug({ pattern, count }, 'Cache invalidated');
    return count;
  }

  async purgeExpired(): Promise<number> {
    const purged = await this.store.purgeExpired();
    if (purged > 0) logger.debug({ purged }, 'Expired cache entries purged');
    return purged;
  }

  async getStats(): Promise<CacheStats> {
    let entries = 0;
    try {
      entries = await this.store.size();
    } catch (err) {
      logger.warn({ error: errorMessage(err) }, 'Cache size unavailable');
    }
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      invalidated: this.invalidated,
      errors: this.errors,
      entries,
    };
  }
}
