// src/server/indent/cache.ts

/**
 * Single-value cache refreshed lazily on access once older than the caller's
 * max age. Concurrent misses share one in-flight load. A load that started
 * before `invalidate()` never stores its result.
 */
export class TtlCache<T> {
  private value: T | undefined;
  private fetchedAt = 0;
  private pending: Promise<T> | null = null;
  private generation = 0;

  constructor(
    private readonly loader: () => Promise<T>,
    private readonly clock: () => number = Date.now,
  ) {}

  get lastFetchedAt(): number | null {
    return this.value === undefined ? null : this.fetchedAt;
  }

  async get(maxAgeMs: number): Promise<T> {
    if (this.value !== undefined && this.clock() - this.fetchedAt <= maxAgeMs) return this.value;
    if (!this.pending) {
      const gen = this.generation;
      const load: Promise<T> = this.loader()
        .then((v) => {
          if (gen === this.generation) {
            this.value = v;
            this.fetchedAt = this.clock();
          }
          return v;
        })
        .finally(() => {
          if (this.pending === load) this.pending = null;
        });
      this.pending = load;
    }
    return this.pending;
  }

  invalidate(): void {
    this.generation += 1;
    this.value = undefined;
    this.fetchedAt = 0;
    this.pending = null;
  }
}
