/**
 * Shared Type Definitions
 */

// =============================================================================
// Entry Types
// =============================================================================

/**
 * A single code-to-target mapping.
 *
 * `code`, `target` and `createdAt` never change after creation;
 * `hits` only grows.
 */
export interface Entry {
  /** Short code (generated or caller-supplied), primary key */
  code: string;

  /** Redirect URL, or `/uploads/<file>` for an uploaded artifact */
  target: string;

  /** Creation time, seconds since epoch */
  createdAt: number;

  /** Successful lookups so far */
  hits: number;
}

/**
 * Which branch an upsert took.
 * "replaced" means the previous entry (and its hits) were discarded.
 */
export type UpsertOutcome = "inserted" | "replaced";

export interface UpsertResult {
  outcome: UpsertOutcome;
  /** Target of the overwritten entry; null on insert */
  replacedTarget: string | null;
}

// =============================================================================
// Lookup Types
// =============================================================================

export type LookupResult =
  | { status: "target"; target: string; entry: Entry }
  | { status: "expired"; entry: Entry }
  | { status: "not_found" };

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Wall clock in whole seconds since epoch.
 * Injected everywhere time matters so tests can pin it.
 */
export interface Clock {
  now(): number;
}
