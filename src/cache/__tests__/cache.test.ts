import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { CacheManager, categoryOf } from '../cacheManager.js';
import { MemoryCacheStore, SqliteCacheStore, globToRegExp } from '../store.js';
import type { CacheStore } from '../store.js';

describe('globToRegExp', () => {
  it('matches star, question mark and character classes', () => {
    expect(globToRegExp('records:v1:*').test('records:v1:dane_ipc:page:1')).toBe(true);
    expect(globToRegExp('records:v1:*').test('alerts:v1:x')).toBe(false);
    expect(globToRegExp('a?c').test('abc')).toBe(true);
    expect(globToRegExp('a?c').test('ac')).toBe(false);
    expect(globToRegExp('k[12]').test('k2')).toBe(true);
    expect(globToRegExp('k[12]').test('k3')).toBe(false);
  });

  it('escapes regex metacharacters', () => {
    expect(globToRegExp('a.b').test('a.b')).toBe(true);
    expect(globToRegExp('a.b').test('axb')).toBe(false);
  });
});

describe('categoryOf', () => {
  it('resolves two-segment categories before single ones', () => {
    expect(categoryOf('api:gov:v1:dane')).toBe('api:gov');
    expect(categoryOf('records:v1:x')).toBe('records');
    expect(categoryOf('unknown:v1:x')).toBeNull();
  });
});

describe('CacheManager', () => {
  let cache: CacheManager;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T00:00:00Z'));
    cache = new CacheManager(new MemoryCacheStore());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('builds versioned keys', () => {
    expect(cache.keyFor('records', 'dane_ipc', 'page', 1)).toBe('records:v1:dane_ipc:page:1');
    expect(cache.patternFor('records', 'dane_ipc')).toBe('records:v1:dane_ipc:*');
  });

  it('clamps TTLs to the category cap', () => {
    expect(cache.clampTtl('status:v1:x', 600)).toBe(60);
    expect(cache.clampTtl('nlp:v1:x', 10)).toBe(10);
    expect(cache.clampTtl('other', 99999)).toBe(99999);
  });

  it('expires entries at the clamped TTL', async () => {
    await cache.set('status:v1:global', { ok: true }, 3600);
    vi.advanceTimersByTime(59_000);
    expect(await cache.get('status:v1:global')).toEqual({ ok: true });
    vi.advanceTimersByTime(1_000);
    expect(await cache.get('status:v1:global')).toBeNull();
  });

  it('getOrSet computes once then serves from cache', async () => {
    const compute = vi.fn().mockResolvedValue([1, 2, 3]);
    expect(await cache.getOrSet('records:v1:a', 300, compute)).toEqual([1, 2, 3]);
    expect(await cache.getOrSet('records:v1:a', 300, compute)).toEqual([1, 2, 3]);
    expect(compute).toHaveBeenCalledTimes(1);

    const stats = await cache.getStats();
    expect(stats.hits).toBe(1);
    expect(stats.misses).toBe(1);
    expect(stats.sets).toBe(1);
    expect(stats.entries).toBe(1);
  });

  it('invalidates a key family by pattern', async () => {
    await cache.set('records:v1:dane_ipc:1', 'a', 60);
    await cache.set('records:v1:dane_ipc:2', 'b', 60);
    await cache.set('records:v1:other:1', 'c', 60);

    expect(await cache.invalidatePattern('records:v1:dane_ipc:*')).toBe(2);
    expect(await cache.get('records:v1:dane_ipc:1')).toBeNull();
    expect(await cache.get('records:v1:other:1')).toBe('c');
  });

  it('degrades to a miss when the store read fails', async () => {
    const failing: CacheStore = {
      get: vi.fn().mockRejectedValue(new Error('disk gone')),
      set: vi.fn().mockRejectedValue(new Error('disk gone')),
      delete: vi.fn().mockResolvedValue(false),
      deleteByPattern: vi.fn().mockRejectedValue(new Error('disk gone')),
      purgeExpired: vi.fn().mockResolvedValue(0),
      size: vi.fn().mockResolvedValue(0),
    };
    const degraded = new CacheManager(failing);

    expect(await degraded.getOrSet('records:v1:x', 60, async () => 'computed')).toBe('computed');
    expect((await degraded.getStats()).errors).toBe(2);
    await expect(degraded.invalidatePattern('records:v1:*')).rejects.toThrow('disk gone');
  });
});

describe('SqliteCacheStore', () => {
  let db: Database.Database;
  let store: SqliteCacheStore;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    store = new SqliteCacheStore(db);
  });

  afterEach(() => {
    vi.useRealTimers();
    db.close();
  });

  it('upserts and reads values', async () => {
    await store.set('k', 'one', 60);
    await store.set('k', 'two', 60);
    expect(await store.get('k')).toBe('two');
    expect(await store.size()).toBe(1);
  });

  it('deletes by GLOB pattern', async () => {
    await store.set('alerts:v1:a', '1', 60);
    await store.set('alerts:v1:b', '2', 60);
    await store.set('records:v1:a', '3', 60);
    expect(await store.deleteByPattern('alerts:v1:*')).toBe(2);
    expect(await store.get('records:v1:a')).toBe('3');
  });

  it('hides and purges expired entries', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T00:00:00Z'));
    await store.set('short', 'x', 1);
    await store.set('long', 'y', 100);
    vi.setSystemTime(new Date('2024-03-01T00:00:02Z'));

    expect(await store.get('short')).toBeNull();
    expect(await store.purgeExpired()).toBe(1);
    expect(await store.size()).toBe(1);
  });
});
