import { scopedLogger } from "../../infra/logger";
import type { MenuRecord } from "../../shared/schemas";
import type { CacheInvalidator } from "./reconciler";

const log = scopedLogger("SERVICE", "CACHE");

export const ALL_PROVIDERS = "*";

export interface CacheKey {
  providerId: string; // or ALL_PROVIDERS
  from: string;
  to: string;
}

export interface MenuSnapshot {
  records: MenuRecord[];
  // "provider|date|slot" -> version the snapshot was built from
  versions: Record<string, number>;
  builtAt: string;
}

export type CacheLookup =
  | { status: "fresh"; snapshot: MenuSnapshot }
  | { status: "expired"; snapshot: MenuSnapshot } // Past TTL, inside the stale grace window
  | { status: "miss" };

interface CacheEntry {
  key: CacheKey;
  snapshot: MenuSnapshot;
  expiresAt: number;
}

export interface MenuCacheOptions {
  maxEntries: number;
  ttlMs: number;
  staleGraceMs: number;
  now?: () => number;
}

export function cacheKeyId(key: CacheKey): string {
  return `${key.providerId}|${key.from}|${key.to}`;
}

export function buildSnapshot(records: MenuRecord[], builtAt: Date): MenuSnapshot {
  const versions: Record<string, number> = {};
  for (const record of records) {
    versions[`${record.providerId}|${record.servingDate}|${record.mealSlot}`] = record.version;
  }
  return { records, versions, builtAt: builtAt.toISOString() };
}

/**
 * LRU snapshot cache keyed by (provider, date range). Entries past their TTL are never
 * returned as fresh; within the grace window they are still handed out as "expired" so
 * a reader can fall back to them when the store is unreachable.
 */
export class MenuCache implements CacheInvalidator {
  // Map iteration order is the recency order: oldest first
  private entries = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(private readonly options: MenuCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get(key: CacheKey): CacheLookup {
    const id = cacheKeyId(key);
    const entry = this.entries.get(id);
    if (!entry) return { status: "miss" };

    const now = this.now();
    if (now >= entry.expiresAt + this.options.staleGraceMs) {
      this.entries.delete(id);
      return { status: "miss" };
    }

    this.entries.delete(id);
    this.entries.set(id, entry);
    return now < entry.expiresAt ? { status: "fresh", snapshot: entry.snapshot } : { status: "expired", snapshot: entry.snapshot };
  }

  put(key: CacheKey, snapshot: MenuSnapshot, ttlMs: number = this.options.ttlMs): void {
    const id = cacheKeyId(key);
    this.entries.delete(id);
    this.entries.set(id, { key, snapshot, expiresAt: this.now() + ttlMs });

    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      log.debug({ key: oldest.value }, "Evicted");
    }
  }

  invalidateKey(key: CacheKey): void {
    this.entries.delete(cacheKeyId(key));
  }

  /** Drops every entry whose provider and date range cover the given menu. */
  invalidate(providerId: string, servingDate: string): void {
    for (const [id, entry] of this.entries) {
      const providerMatches = entry.key.providerId === ALL_PROVIDERS || entry.key.providerId === providerId;
      if (providerMatches && entry.key.from <= servingDate && servingDate <= entry.key.to) {
        this.entries.delete(id);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
