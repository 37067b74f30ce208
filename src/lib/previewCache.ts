import type { MetaData } from "./metadata";

/** Entry lifetime in seconds; also sent as the Cache-Control max-age. */
export const MAX_AGE = 86_400;

export type Outcome =
  | { readonly ok: true; readonly metadata: MetaData }
  | { readonly ok: false; readonly error: string };

export function success(metadata: MetaData): Outcome {
  return Object.freeze({ ok: true as const, metadata });
}

export function failure(error: string): Outcome {
  return Object.freeze({ ok: false as const, error });
}

export type CacheEntry<V> = {
  readonly value: V;
  readonly insertedAt: number;
  readonly expiresAt: number;
};

/**
 * Keyed store of outcomes. Keys are compared verbatim; no URL normalization.
 */
export interface PreviewCache<V = Outcome> {
  get(key: string): CacheEntry<V> | undefined;
  insert(key: string, value: V): void;
}

export type TtlCacheOptions = {
  ttlMs?: number;
  now?: () => number;
};

export class TtlCache<V = Outcome> implements PreviewCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: TtlCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? MAX_AGE * 1000;
    this.now = opts.now ?? Date.now;
  }

  /** Live entry for `key`; entries past their TTL read as absent. */
  get(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) return undefined;
    return entry;
  }

  insert(key: string, value: V): void {
    const insertedAt = this.now();
    this.entries.set(key, Object.freeze({ value, insertedAt, expiresAt: insertedAt + this.ttlMs }));
  }

  /** Drops expired entries; returns how many were removed. */
  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Physically stored entries, expired ones included until purged. */
  get size(): number {
    return this.entries.size;
  }
}
