import type { CanonicalizeResult } from './canonicalize.js';

/** Default number of results a UrlParseCache holds. */
export const DEFAULT_CACHE_SIZE = 1024;

/**
 * Caller-owned cache of canonicalization results, bounded in size.
 *
 * The least recently used entry is evicted first. Nothing holds a cache
 * except the code that created it; `clear()` empties it.
 */
export class UrlParseCache {
  private map = new Map<string, CanonicalizeResult>();

  constructor(private readonly maxSize: number = DEFAULT_CACHE_SIZE) {}

  get(key: string): CanonicalizeResult | undefined {
    const value = this.map.get(key);
    if (value !== undefined) {
      // Refresh recency
      this.map.delete(key);
      this.map.set(key, value);
    }
    return value;
  }

  set(key: string, value: CanonicalizeResult): void {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      const oldest = this.map.keys().next();
      if (!oldest.done) {
        this.map.delete(oldest.value);
      }
    }
    this.map.set(key, value);
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }
}
