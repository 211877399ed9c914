import type { Clock } from "../middleware/rateLimit";

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * In-memory TTL cache keyed by upload fingerprint.
 *
 * Expired entries are never returned: `get` evicts them on access and `sweep` clears the
 * rest. Insertion order doubles as age order, so the first key is always the oldest.
 */
export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly defaultTtlMs: number,
    private readonly maxEntries: number = Number.POSITIVE_INFINITY,
    private readonly clock: Clock = Date.now,
  ) {
    if (defaultTtlMs <= 0) {
      throw new RangeError("Cache TTL must be positive");
    }
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  put(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    // Re-inserting moves the key to the back of the age order.
    this.entries.delete(key);
    this.entries.set(key, { value: deepFreeze(value), expiresAt: this.clock() + ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
