/**
 * Interactions Gateway - TTL Cache
 *
 * In-memory cache with time-based expiration and a size bound. The endpoint
 * uses it as the replay cache: interaction id -> promise of the first
 * initial response, so a redelivered interaction gets the same body.
 */

export interface CacheOptions {
  ttlMs: number;
  maxSize?: number;
  now?: () => number;
}

export class Cache<T> {
  private store = new Map<string, { value: T; storedAt: number }>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private cleanupIntervalId: ReturnType<typeof setInterval> | null = null;

  constructor(options: CacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSize = options.maxSize ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  /** A TTL of 0 or less turns the cache off. */
  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  private expired(storedAt: number, now: number): boolean {
    return now - storedAt >= this.ttlMs;
  }

  get(key: string): T | undefined {
    if (!this.enabled) return undefined;
    const entry = this.store.get(key);
    if (!entry) return undefined;

    if (this.expired(entry.storedAt, this.now())) {
      this.store.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    if (!this.enabled) return;
    // Evict the oldest insertion when full
    if (this.store.size >= this.maxSize && !this.store.has(key)) {
      const oldestKey = this.store.keys().next().value;
      if (oldestKey !== undefined) {
        this.store.delete(oldestKey);
      }
    }
    this.store.delete(key);
    this.store.set(key, { value, storedAt: this.now() });
  }

  delete(key: string): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  /** Remove all expired entries. Returns how many were dropped. */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (this.expired(entry.storedAt, now)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  startCleanup(intervalMs: number): void {
    this.stopCleanup();
    if (!this.enabled) return;
    this.cleanupIntervalId = setInterval(() => this.cleanup(), intervalMs);
    this.cleanupIntervalId.unref();
  }

  stopCleanup(): void {
    if (this.cleanupIntervalId !== null) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
  }
}
