/**
 * Mapping Store Type Definitions
 *
 * The store is the single shared mutable resource. HTTP handlers and the
 * reaper hold the same instance; every method is safe to call
 * concurrently and atomic per entry.
 */

import type { QueryResultRow } from "pg";
import type { Entry, UpsertResult } from "@ttlink/shared";

// =============================================================================
// Store Contract
// =============================================================================

export interface MappingStore {
  /**
   * Insert a new entry, or overwrite the one already under `code`.
   * Either way `createdAt` is now and `hits` is 0; prior hits are lost.
   * A replace reports the overwritten target so its artifact can be released.
   */
  createOrReplace(code: string, target: string): Promise<UpsertResult>;

  /** The entry regardless of TTL, or null */
  get(code: string): Promise<Entry | null>;

  /**
   * Atomically add 1 to hits.
   * @returns false if the code has no entry
   */
  incrementHits(code: string): Promise<boolean>;

  /** Entries with `now - createdAt > ttl`, in no particular order */
  findExpired(now: number, ttl: number): Promise<Entry[]>;

  /**
   * Remove an entry. Deleting an absent code is not an error.
   * @returns true if a row was removed
   */
  delete(code: string): Promise<boolean>;

  /**
   * All entries, newest first, optionally narrowed to those whose code
   * or target contains `filter`.
   */
  list(filter?: string): Promise<Entry[]>;

  /** True if the backend answers */
  ping(): Promise<boolean>;

  close(): Promise<void>;
}

// =============================================================================
// PostgreSQL Driver Surface
// =============================================================================

/**
 * Minimal pg interfaces (what we actually use).
 * pg.Pool satisfies these; tests pass an in-process fake.
 */
export interface QueryResultLike {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export interface PoolClientLike {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  release(): void;
}

export interface PoolLike {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  connect(): Promise<PoolClientLike>;
  end(): Promise<void>;
}

/**
 * Query counters for the readiness and metrics endpoints
 */
export interface DbMetrics {
  totalQueries: number;
  slowQueries: number;
  errors: number;
  avgQueryTimeMs: number;
}
