import { getLogger } from './logger';

const log = getLogger('datasetCache');

/**
 * Process-lifetime memo for raw dataset reads. Keys carry the file identity
 * (path, size, mtime), so a rewritten file misses the cache; the loader evicts
 * the superseded entry by path prefix.
 */
export class DatasetCache {
  private store = new Map<string, unknown>();
  private hits = 0;
  private misses = 0;

  get<T>(key: string): T | null {
    if (!this.store.has(key)) return null;
    return this.store.get(key) as T;
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  deleteByPrefix(prefix: string): number {
    let removed = 0;
    for (const key of this.store.keys()) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): { hits: number; misses: number; entries: number } {
    return { hits: this.hits, misses: this.misses, entries: this.store.size };
  }

  getOrSet<T>(key: string, factory: () => T): T {
    const cached = this.get<T>(key);
    if (cached !== null) {
      this.hits++;
      log.debug('Dataset cache hit', { key });
      return cached;
    }
    this.misses++;
    const value = factory();
    this.store.set(key, value);
    return value;
  }
}

const GLOBAL_CACHE_KEY = '__datasetCache__';

export function getDatasetCache(): DatasetCache {
  const g = globalThis as unknown as Record<string, DatasetCache | undefined>;
  const existing = g[GLOBAL_CACHE_KEY];
  if (existing) return existing;
  const created = new DatasetCache();
  g[GLOBAL_CACHE_KEY] = created;
  return created;
}
