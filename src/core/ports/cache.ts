/**
 * Port: Cache: bounded, TTL-based key-value store with pressure-aware eviction.
 * A miss is a normal lookup result, not an error.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export type CacheLookup<T> =
  | { readonly hit: true; readonly value: T }
  | { readonly hit: false };

export const PressureStage = {
  NORMAL: "normal",
  ELEVATED: "elevated",
  HIGH: "high",
  CRITICAL: "critical",
  EMERGENCY: "emergency",
} as const;

export type PressureStage = (typeof PressureStage)[keyof typeof PressureStage];

export interface CacheEntryMetadata {
  readonly key: string;
  /** Monotonic ms at write time */
  readonly insertedAt: number;
  readonly ttlSeconds: number;
  readonly sizeEstimate: number;
  readonly ageMs: number;
  readonly accessCount: number;
}

export interface MaintenanceReport {
  readonly stage: PressureStage;
  readonly pressure: number;
  readonly expiredRemoved: number;
  readonly evicted: number;
  readonly cleared: boolean;
}

export interface CacheStats {
  readonly entries: number;
  readonly bytes: number;
  readonly maxBytes: number;
  readonly maxEntries: number;
  readonly hits: number;
  readonly misses: number;
  readonly expirations: number;
  readonly evictions: number;
  readonly emergencyClears: number;
  readonly pressure: number;
  readonly stage: PressureStage;
}

export interface Cache {
  get<T = unknown>(key: string): CacheLookup<T>;
  /** Write a value; TTL defaults to the configured default and may not exceed the configured maximum */
  set<T = unknown>(key: string, value: T, ttlSeconds?: number): Result<CacheEntryMetadata, AppError>;
  has(key: string): boolean;
  /** Remove a key; true if it existed */
  invalidate(key: string): boolean;
  /** Remove every entry; returns how many were dropped */
  clear(): number;
  metadata(key: string): CacheEntryMetadata | null;
  /** Remove expired entries; returns how many were removed */
  cleanupExpired(): number;
  /** Run the staged pressure response now */
  maintain(): MaintenanceReport;
  stats(): CacheStats;
}

/** Port: reports process memory pressure as a 0–1 fraction of the host ceiling. */
export type MemoryProbe = () => number;
