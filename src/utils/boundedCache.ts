import { Clock, systemClock } from './timing';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface BoundedCacheOptions {
  maxEntries: number;
  ttlMs: number;
}

/**
 * Map-backed cache with a hard size bound. Entries expire `ttlMs` after they
 * are written; when full, the oldest inserted entry is evicted. Reads do not
 * refresh an entry's position.
 */
export class BoundedCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly options: BoundedCacheOptions,
    private readonly clock: Pick<Clock, 'now'> = systemClock,
  ) {}

  get size(): number {
    return this.store.size;
  }

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.clock.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.options.maxEntries <= 0) return;
    this.store.delete(key);
    while (this.store.size >= this.options.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
    this.store.set(key, { value, expiresAt: this.clock.now() + this.options.ttlMs });
  }

  async getOrSet(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = await load();
    this.set(key, value);
    return value;
  }

  invalidate(key: string): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }
}
