import { createHash } from 'node:crypto';
import { LRUCache } from 'lru-cache';
import { CACHE_KEY_HASH_LENGTH, type CacheStage } from '../config/cache/constants';
import type { AgentVerdict, Chunk, SearchResult } from '../types';

export interface CacheStore<T> {
  get(key: string): T | undefined;
  set(key: string, value: T, ttlMs?: number): void;
  invalidate(key: string): void;
  clear(): void;
  readonly size: number;
}

interface CacheEntry<T> {
  key: string;
  value: T;
  storedAt: number;
  ttlMs: number;
}

export interface MemoryCacheOptions {
  maxEntries: number;
  defaultTtlMs: number;
  now?: () => number;
}

/**
 * Bounded in-process store. Values are cloned on write and on read so a cached
 * object is never shared between requests.
 */
export class MemoryCacheStore<T extends {}> implements CacheStore<T> {
  private readonly entries: LRUCache<string, CacheEntry<T>>;
  private readonly now: () => number;

  constructor(
    readonly stage: CacheStage,
    private readonly options: MemoryCacheOptions
  ) {
    this.entries = new LRUCache<string, CacheEntry<T>>({ max: options.maxEntries });
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt >= entry.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return structuredClone(entry.value);
  }

  set(key: string, value: T, ttlMs = this.options.defaultTtlMs): void {
    if (ttlMs <= 0) return;
    this.entries.set(key, { key, value: structuredClone(value), storedAt: this.now(), ttlMs });
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export function normalizeQuery(query: string): string {
  return query.trim().replace(/\s+/g, ' ').toLowerCase();
}

function sortValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortValue);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, sortValue(v)])
    );
  }
  return value;
}

export function buildCacheKey(stage: CacheStage, query: string, params: Record<string, unknown> = {}): string {
  const payload = JSON.stringify({ stage, query: normalizeQuery(query), params: sortValue(params) });
  const digest = createHash('sha256').update(payload).digest('hex').slice(0, CACHE_KEY_HASH_LENGTH);
  return `${stage}:${digest}`;
}

export interface StageCaches {
  search: CacheStore<Chunk[]>;
  filter: CacheStore<AgentVerdict>;
  rank: CacheStore<number[]>;
  format: CacheStore<string>;
  response: CacheStore<SearchResult>;
}

export interface StageCacheSettings {
  enabled: boolean;
  maxEntries: number;
  ttlMs: Record<CacheStage, number>;
  now?: () => number;
}

export function createStageCaches(settings: StageCacheSettings): StageCaches {
  const options = (stage: CacheStage): MemoryCacheOptions => ({
    maxEntries: settings.maxEntries,
    defaultTtlMs: settings.enabled ? settings.ttlMs[stage] : 0,
    now: settings.now
  });
  return {
    search: new MemoryCacheStore<Chunk[]>('search', options('search')),
    filter: new MemoryCacheStore<AgentVerdict>('filter', options('filter')),
    rank: new MemoryCacheStore<number[]>('rank', options('rank')),
    format: new MemoryCacheStore<string>('format', options('format')),
    response: new MemoryCacheStore<SearchResult>('response', options('response'))
  };
}

export function cacheSizes(caches: StageCaches): Record<CacheStage, number> {
  return {
    search: caches.search.size,
    filter: caches.filter.size,
    rank: caches.rank.size,
    format: caches.format.size,
    response: caches.response.size
  };
}
