/**
 * TTL cache: bounded, in-process key/value store with staged pressure response.
 *
 * The backing Map doubles as the LRU list: a hit deletes and re-inserts the
 * key, so iteration order runs from least to most recently used.
 *
 * Pressure = max(cached bytes / maxBytes, process memory probe). Maintenance
 * runs before every write and on demand:
 *   ≥ elevated  → purge expired entries
 *   ≥ high      → also evict LRU until below `elevated`
 *   ≥ critical  → evict LRU until below half of `elevated`
 *   ≥ emergency → drop everything
 */

import { Buffer } from "node:buffer";
import { type AppError, InvalidConfigError, validation } from "../../core/errors/app-error.js";
import {
  type Cache,
  type CacheEntryMetadata,
  type CacheLookup,
  type CacheStats,
  type MaintenanceReport,
  type MemoryProbe,
  PressureStage,
} from "../../core/ports/cache.js";
import type { Clock } from "../../core/ports/clock.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { idleMemoryProbe } from "./memory-probe.js";

export interface PressureThresholds {
  readonly elevated: number;
  readonly high: number;
  readonly critical: number;
  readonly emergency: number;
}

export interface TtlCacheOptions {
  readonly defaultTtlSeconds: number;
  readonly maxTtlSeconds: number;
  readonly maxBytes: number;
  readonly maxEntries: number;
  readonly maxKeyLength: number;
  readonly pressure: PressureThresholds;
}

export type EvictionReason = "expired" | "lru" | "emergency";

interface TtlCacheDeps {
  readonly clock: Pick<Clock, "now">;
  readonly memoryProbe?: MemoryProbe;
  readonly onEvict?: (reason: EvictionReason, count: number) => void;
}

interface CacheEntry {
  readonly value: unknown;
  readonly insertedAt: number;
  readonly ttlSeconds: number;
  readonly sizeEstimate: number;
  accessCount: number;
}

const validateOptions = (options: TtlCacheOptions): void => {
  const issues: Record<string, string[]> = {};
  const { elevated, high, critical, emergency } = options.pressure;
  if (!(elevated > 0 && elevated < high && high < critical && critical < emergency && emergency <= 1)) {
    issues["pressure"] = ["thresholds must be strictly ascending within (0, 1]"];
  }
  if (!(options.defaultTtlSeconds >= 1 && options.defaultTtlSeconds <= options.maxTtlSeconds)) {
    issues["defaultTtlSeconds"] = ["must be between 1 and maxTtlSeconds"];
  }
  if (!(options.maxBytes > 0)) issues["maxBytes"] = ["must be positive"];
  if (!(options.maxEntries >= 1)) issues["maxEntries"] = ["must be at least 1"];
  if (!(options.maxKeyLength >= 1)) issues["maxKeyLength"] = ["must be at least 1"];
  if (Object.keys(issues).length > 0) {
    throw new InvalidConfigError("Invalid cache options", issues);
  }
};

/** UTF-8 size of the JSON encoding; null when the value cannot be encoded. */
const estimateSize = (value: unknown): number | null => {
  try {
    const json = JSON.stringify(value);
    return json === undefined ? null : Buffer.byteLength(json, "utf8");
  } catch {
    return null;
  }
};

export const createTtlCache = (options: TtlCacheOptions, deps: TtlCacheDeps): Cache => {
  validateOptions(options);
  const { defaultTtlSeconds, maxTtlSeconds, maxBytes, maxEntries, maxKeyLength, pressure } =
    options;
  const { clock, onEvict } = deps;
  const memoryProbe = deps.memoryProbe ?? idleMemoryProbe;

  let store = new Map<string, CacheEntry>();
  let bytes = 0;
  let hits = 0;
  let misses = 0;
  let expirations = 0;
  let evictions = 0;
  let emergencyClears = 0;

  const isExpired = (entry: CacheEntry, now: number): boolean =>
    now - entry.insertedAt > entry.ttlSeconds * 1000;

  const remove = (key: string): boolean => {
    const entry = store.get(key);
    if (!entry) return false;
    store.delete(key);
    bytes -= entry.sizeEstimate;
    return true;
  };

  const expire = (key: string): void => {
    remove(key);
    expirations++;
    onEvict?.("expired", 1);
  };

  const currentPressure = (): number => Math.max(bytes / maxBytes, memoryProbe());

  const stageOf = (p: number): PressureStage => {
    if (p >= pressure.emergency) return PressureStage.EMERGENCY;
    if (p >= pressure.critical) return PressureStage.CRITICAL;
    if (p >= pressure.high) return PressureStage.HIGH;
    if (p >= pressure.elevated) return PressureStage.ELEVATED;
    return PressureStage.NORMAL;
  };

  /** Evict least-recently-used entries (never `keep`) while `shouldEvict` holds. */
  const evictLru = (shouldEvict: () => boolean, keep?: string): number => {
    let count = 0;
    for (const key of store.keys()) {
      if (!shouldEvict()) break;
      if (key === keep) continue;
      remove(key);
      count++;
    }
    if (count > 0) {
      evictions += count;
      onEvict?.("lru", count);
    }
    return count;
  };

  const dropAll = (): number => {
    const count = store.size;
    // Swap rather than mutate so no reader sees a half-emptied map
    store = new Map();
    bytes = 0;
    return count;
  };

  const cleanupExpired = (): number => {
    const now = clock.now();
    let count = 0;
    for (const [key, entry] of store) {
      if (isExpired(entry, now)) {
        remove(key);
        count++;
      }
    }
    if (count > 0) {
      expirations += count;
      onEvict?.("expired", count);
    }
    return count;
  };

  const maintain = (): MaintenanceReport => {
    const p = currentPressure();
    const stage = stageOf(p);

    if (stage === PressureStage.EMERGENCY) {
      const count = dropAll();
      emergencyClears++;
      if (count > 0) onEvict?.("emergency", count);
      return { stage, pressure: p, expiredRemoved: 0, evicted: count, cleared: true };
    }

    let expiredRemoved = 0;
    let evicted = 0;
    if (p >= pressure.elevated) {
      expiredRemoved = cleanupExpired();
    }
    if (p >= pressure.critical) {
      const target = pressure.elevated / 2;
      evicted = evictLru(() => currentPressure() >= target);
    } else if (p >= pressure.high) {
      evicted = evictLru(() => currentPressure() >= pressure.elevated);
    }
    return { stage, pressure: p, expiredRemoved, evicted, cleared: false };
  };

  const validateKey = (key: string): AppError | null => {
    if (key.length === 0 || key.length > maxKeyLength) {
      return validation(`Cache key must be 1–${maxKeyLength} characters`, {
        keyLength: key.length,
      });
    }
    return null;
  };

  const describe = (key: string, entry: CacheEntry, now: number): CacheEntryMetadata => ({
    key,
    insertedAt: entry.insertedAt,
    ttlSeconds: entry.ttlSeconds,
    sizeEstimate: entry.sizeEstimate,
    ageMs: now - entry.insertedAt,
    accessCount: entry.accessCount,
  });

  return {
    get<T = unknown>(key: string): CacheLookup<T> {
      const entry = store.get(key);
      if (!entry) {
        misses++;
        return { hit: false };
      }
      if (isExpired(entry, clock.now())) {
        expire(key);
        misses++;
        return { hit: false };
      }
      // Move to the most-recently-used end
      store.delete(key);
      store.set(key, entry);
      entry.accessCount++;
      hits++;
      return { hit: true, value: entry.value as T };
    },

    set<T = unknown>(
      key: string,
      value: T,
      ttlSeconds: number = defaultTtlSeconds,
    ): Result<CacheEntryMetadata, AppError> {
      const keyError = validateKey(key);
      if (keyError) return err(keyError);

      if (!Number.isInteger(ttlSeconds) || ttlSeconds < 1 || ttlSeconds > maxTtlSeconds) {
        return err(
          validation(`TTL must be an integer between 1 and ${maxTtlSeconds} seconds`, {
            ttlSeconds,
          }),
        );
      }

      const sizeEstimate = estimateSize(value);
      if (sizeEstimate === null) {
        return err(validation("Cache value must be JSON-serialisable", { key }));
      }
      if (sizeEstimate > maxBytes) {
        return err(validation("Cache value exceeds the cache byte limit", { sizeEstimate, maxBytes }));
      }

      maintain();
      remove(key);

      const entry: CacheEntry = {
        value,
        insertedAt: clock.now(),
        ttlSeconds,
        sizeEstimate,
        accessCount: 0,
      };
      store.set(key, entry);
      bytes += sizeEstimate;

      evictLru(() => store.size > maxEntries || bytes > maxBytes, key);

      return ok(describe(key, entry, entry.insertedAt));
    },

    has(key: string): boolean {
      const entry = store.get(key);
      if (!entry) return false;
      if (isExpired(entry, clock.now())) {
        expire(key);
        return false;
      }
      return true;
    },

    invalidate(key: string): boolean {
      return remove(key);
    },

    clear(): number {
      return dropAll();
    },

    metadata(key: string): CacheEntryMetadata | null {
      const entry = store.get(key);
      if (!entry) return null;
      const now = clock.now();
      if (isExpired(entry, now)) {
        expire(key);
        return null;
      }
      return describe(key, entry, now);
    },

    cleanupExpired,

    maintain,

    stats(): CacheStats {
      const p = currentPressure();
      return {
        entries: store.size,
        bytes,
        maxBytes,
        maxEntries,
        hits,
        misses,
        expirations,
        evictions,
        emergencyClears,
        pressure: p,
        stage: stageOf(p),
      };
    },
  };
};
