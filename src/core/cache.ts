/**
 * In-memory TTL cache for upstream API responses.
 * Caches at the HTTP response level to avoid redundant API calls.
 *
 * Each client owns its own instance; nothing here is process-global.
 * Entries are evicted FIFO once maxEntries is reached.
 */

export type QueryParams = Record<string, string>;

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
}

export interface ResponseCacheOptions {
  maxEntries?: number;
  clock?: () => number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class ResponseCache<T = unknown> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly clock: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: ResponseCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 500);
    this.clock = options.clock ?? Date.now;
  }

  /** Cache key for a request: path plus params sorted by name */
  static keyFor(path: string, params: QueryParams = {}): string {
    const query = Object.keys(params)
      .sort()
      .map(k => `${k}=${params[k]}`)
      .join('&');
    return `${path}?${query}`;
  }

  /** Get cached value if still valid */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt > this.clock()) {
      this.hits++;
      return entry.value;
    }
    if (entry) this.entries.delete(key);
    this.misses++;
    return undefined;
  }

  /** Store a value; a non-positive TTL stores nothing */
  set(key: string, value: T, ttlSeconds: number): void {
    if (ttlSeconds <= 0) return;

    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      // Evict oldest entry
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) this.entries.delete(firstKey);
    }
    this.entries.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
