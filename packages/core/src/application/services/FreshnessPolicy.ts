/**
 * Anything stamped with the time it was fetched
 */
export interface Timestamped {
  /** Milliseconds since the epoch */
  readonly cachedAt: number;
}

/**
 * Slot that starts empty and is filled by its first successful fetch
 */
export type LazySlot<T> = { readonly populated: false } | { readonly populated: true; readonly value: T };

export const EMPTY_SLOT: LazySlot<never> = { populated: false };

export function populatedSlot<T>(value: T): LazySlot<T> {
  return { populated: true, value };
}

/**
 * Time-based expiry: an entry fetched at `t` is fresh strictly before `t + ttlMs`
 */
export class TimeToLivePolicy {
  readonly ttlMs: number;

  constructor(ttlMs: number) {
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new Error(`Invalid ttl: ${ttlMs}. Must be a non-negative number of milliseconds.`);
    }
    this.ttlMs = ttlMs;
  }

  isFresh<E extends Timestamped>(entry: E | null, now: number): entry is E {
    if (!entry) return false;
    return now - entry.cachedAt < this.ttlMs;
  }
}

/**
 * Driving-value expiry: an entry stays fresh while the values it was
 * fetched for (chain height, request parameters) are unchanged
 */
export class DrivingValuePolicy<TEntry, TKey extends readonly unknown[]> {
  private readonly keyOf: (entry: TEntry) => TKey;

  constructor(keyOf: (entry: TEntry) => TKey) {
    this.keyOf = keyOf;
  }

  isFresh(entry: TEntry | null, current: TKey): entry is TEntry {
    if (!entry) return false;
    const cached = this.keyOf(entry);
    return cached.length === current.length && cached.every((value, i) => Object.is(value, current[i]));
  }
}

/**
 * Populate-once: a slot never expires after its first successful fetch
 */
export class PopulateOncePolicy {
  isFresh<T>(slot: LazySlot<T>): slot is { readonly populated: true; readonly value: T } {
    return slot.populated;
  }
}
