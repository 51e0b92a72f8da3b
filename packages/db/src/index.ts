/**
 * @ttlink/db - Mapping Store Package
 *
 * The code → target table every other component runs on, in two
 * backends, plus the TTL-aware lookup path.
 *
 * Usage:
 * ```ts
 * import { MemoryMappingStore, lookup } from "@ttlink/db";
 *
 * const store = new MemoryMappingStore();
 * await store.createOrReplace("abc123", "https://example.com");
 * const result = await lookup(store, "abc123", { ttl: 600 });
 * ```
 */

// Store contract and pg driver surface
export * from "./types.js";

// Backends
export { MemoryMappingStore } from "./memory-store.js";
export {
  PgMappingStore,
  SQL,
  toStoreError,
  isUniqueViolation,
  likeSubstring,
  type PgMappingStoreOptions,
} from "./pg-store.js";
export { createPool, type PoolOptions } from "./client.js";

// Lookup path
export { lookup, type LookupOptions } from "./lookup.js";
