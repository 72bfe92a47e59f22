import { InvalidArgumentError } from "./errors.js";

/**
 * Bounded in-memory TTL cache for upstream response data.
 *
 * When full, inserting a new key evicts the entry closest to expiry.
 * Every operation is synchronous.
 */
export class TTLCache<T> {
  private store = new Map<string, { data: T; expiresAt: number }>();
  private readonly defaultTtlMs: number;
  readonly capacity: number;

  constructor(options: { ttlMs: number; capacity: number }) {
    assertTtl(options.ttlMs);
    if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
      throw new InvalidArgumentError(`Cache capacity must be a positive integer, got ${options.capacity}`);
    }
    this.defaultTtlMs = options.ttlMs;
    this.capacity = options.capacity;
  }

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.data;
  }

  set(key: string, data: T, ttlMs?: number): void {
    const ttl = ttlMs ?? this.defaultTtlMs;
    assertTtl(ttl);

    if (!this.store.has(key) && this.store.size >= this.capacity) {
      this.prune();
      if (this.store.size >= this.capacity) this.evictNearestExpiry();
    }

    this.store.set(key, { data, expiresAt: Date.now() + ttl });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  /** Drop every expired entry. Returns how many were removed. */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }

  private evictNearestExpiry(): void {
    let victim: string | undefined;
    let earliest = Infinity;
    // Map iterates in insertion order, so ties fall to the oldest entry.
    for (const [key, entry] of this.store) {
      if (entry.expiresAt < earliest) {
        earliest = entry.expiresAt;
        victim = key;
      }
    }
    if (victim !== undefined) this.store.delete(victim);
  }
}

function assertTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new InvalidArgumentError(`TTL must be a positive number of milliseconds, got ${ttlMs}`);
  }
}
