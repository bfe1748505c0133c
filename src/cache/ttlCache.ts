export interface ResponseCache<V> {
  get(key: string): V | undefined;
  put(key: string, value: V, ttlMs: number): void;
}

interface CacheEntry<V> {
  expiresAt: number;
  value: V;
}

export interface TtlCacheOptions {
  now?: () => number;
  /** Expired entries are swept on write once the map grows past this size. */
  sweepThreshold?: number;
}

export class TtlCache<V> implements ResponseCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly now: () => number;
  private readonly sweepThreshold: number;

  constructor(options: TtlCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sweepThreshold = options.sweepThreshold ?? 500;
  }

  get(key: string): V | undefined {
    const cached = this.entries.get(key);
    if (!cached) return undefined;
    if (cached.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return cached.value;
  }

  put(key: string, value: V, ttlMs: number): void {
    if (ttlMs <= 0) return;
    if (this.entries.size >= this.sweepThreshold) this.sweep();
    this.entries.set(key, { expiresAt: this.now() + ttlMs, value });
  }

  size(): number {
    return this.entries.size;
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}

export function buildCacheKey(...parts: unknown[]): string {
  return JSON.stringify(parts);
}
