import type { FetchResult } from '../types/lead.js';

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export class TtlCache<T> {
  private entry: Entry<T> | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(): T | undefined {
    if (!this.entry) return undefined;
    if (this.entry.expiresAt <= this.now()) {
      this.entry = null;
      return undefined;
    }
    return this.entry.value;
  }

  set(value: T) {
    this.entry = { value, expiresAt: this.now() + this.ttlMs };
  }

  clear() {
    this.entry = null;
  }
}

/**
 * Wraps a fetch stage so repeated dashboard actions reuse its last good
 * result. Results carrying a diagnostic are never kept.
 */
export function cachedFetch<T>(fetcher: () => Promise<FetchResult<T>>, cache: TtlCache<FetchResult<T>>) {
  return async (): Promise<FetchResult<T>> => {
    const hit = cache.get();
    if (hit) return hit;
    const result = await fetcher();
    if (!result.diagnostic) cache.set(result);
    return result;
  };
}
