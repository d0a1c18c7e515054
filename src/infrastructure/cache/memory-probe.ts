import type { MemoryProbe } from "../../core/ports/cache.js";

const BYTES_PER_MB = 1024 * 1024;

/**
 * Resident set size as a fraction of the host's memory ceiling, clamped to 0–1.
 */
export const createProcessMemoryProbe = (limitMb: number): MemoryProbe => {
  const limitBytes = limitMb * BYTES_PER_MB;
  return () => Math.min(1, process.memoryUsage().rss / limitBytes);
};

/** Probe for hosts without a meaningful ceiling (and for tests). */
export const idleMemoryProbe: MemoryProbe = () => 0;
