/**
 * Coalesces concurrent calls that share a key: while one call is in flight,
 * later callers with the same key await its promise instead of starting
 * their own.
 */
export class SingleFlight<T> {
  private inflight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const promise = fn().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return promise;
  }

  get pending(): number {
    return this.inflight.size;
  }
}
