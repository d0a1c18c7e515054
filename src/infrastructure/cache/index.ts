/**
 * Cache adapters: barrel export.
 */

export { createTtlCache, type TtlCacheOptions } from "./ttl-cache.js";
export { createProcessMemoryProbe, idleMemoryProbe } from "./memory-probe.js";
