// ──────────────────────────────────────────────
// Strand - Single-Value TTL Cache
// Whole-value replacement only; the clock is injectable for tests
// ──────────────────────────────────────────────

export type Clock = () => number;

export interface TtlCache<T> {
  get(): T | undefined;
  set(value: T): void;
  clear(): void;
  /** Milliseconds since the current value was stored, or null when empty/expired. */
  age(): number | null;
  readonly ttlMs: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  now?: Clock;
}

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export function createTtlCache<T>(options: TtlCacheOptions): TtlCache<T> {
  const now = options.now ?? Date.now;
  let entry: CacheEntry<T> | null = null;

  const isFresh = (current: CacheEntry<T>): boolean => now() - current.storedAt < options.ttlMs;

  return {
    ttlMs: options.ttlMs,

    get() {
      if (!entry) return undefined;
      if (!isFresh(entry)) {
        entry = null;
        return undefined;
      }
      return entry.value;
    },

    set(value: T) {
      entry = { value, storedAt: now() };
    },

    clear() {
      entry = null;
    },

    age() {
      if (!entry || !isFresh(entry)) return null;
      return now() - entry.storedAt;
    },
  };
}
