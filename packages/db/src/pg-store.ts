/**
 * PostgreSQL Mapping Store
 *
 * One row per code in `entries`. Single-row statements are atomic on
 * their own; the upsert takes a row lock so concurrent writers to the
 * same code serialize and the last one wins cleanly.
 *
 * Upsert flow (explicit two branches, no ON CONFLICT):
 *   BEGIN → SELECT … FOR UPDATE → UPDATE (replace) | INSERT (new) → COMMIT
 * Two transactions inserting the same new code race past the lock; the
 * loser gets a unique violation (23505) and is retried once, at which
 * point it sees the row and takes the replace branch.
 *
 * Driver errors are mapped onto the store taxonomy:
 * - connection-level failures → StoreUnavailableError
 * - anything else             → StoreError
 */

import {
  StoreError,
  StoreUnavailableError,
  systemClock,
  type Clock,
  type Entry,
  type UpsertResult,
} from "@ttlink/shared";
import { createLogger, type Logger } from "@ttlink/logger";
import type { QueryResultRow } from "pg";
import type { DbMetrics, MappingStore, PoolClientLike, PoolLike } from "./types.js";

// =============================================================================
// SQL
// =============================================================================

const COLUMNS = "code, target, created_at, hits";

export const SQL = {
  CREATE_TABLE: `
    CREATE TABLE IF NOT EXISTS entries (
      code       TEXT PRIMARY KEY,
      target     TEXT NOT NULL,
      created_at BIGINT NOT NULL,
      hits       INTEGER NOT NULL DEFAULT 0
    )
  `,
  CREATE_INDEX: "CREATE INDEX IF NOT EXISTS entries_created_at_idx ON entries (created_at)",
  BEGIN: "BEGIN",
  COMMIT: "COMMIT",
  ROLLBACK: "ROLLBACK",
  LOCK_ENTRY: "SELECT target FROM entries WHERE code = $1 FOR UPDATE",
  INSERT_ENTRY: "INSERT INTO entries (code, target, created_at, hits) VALUES ($1, $2, $3, 0)",
  REPLACE_ENTRY: "UPDATE entries SET target = $2, created_at = $3, hits = 0 WHERE code = $1",
  GET_ENTRY: `SELECT ${COLUMNS} FROM entries WHERE code = $1`,
  INCREMENT_HITS: "UPDATE entries SET hits = hits + 1 WHERE code = $1",
  FIND_EXPIRED: `SELECT ${COLUMNS} FROM entries WHERE $1::bigint - created_at > $2::bigint`,
  DELETE_ENTRY: "DELETE FROM entries WHERE code = $1",
  LIST_ALL: `SELECT ${COLUMNS} FROM entries ORDER BY created_at DESC`,
  LIST_FILTERED: `
    SELECT ${COLUMNS} FROM entries
    WHERE code LIKE $1 ESCAPE '\\' OR target LIKE $1 ESCAPE '\\'
    ORDER BY created_at DESC
  `,
  PING: "SELECT 1",
} as const;

// =============================================================================
// Error Mapping
// =============================================================================

/** Node socket errors that mean the server is unreachable */
const UNREACHABLE_ERRNOS = new Set(["ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "ECONNRESET", "EAI_AGAIN", "EPIPE"]);

/**
 * SQLSTATEs outside class 08 that still mean "stop":
 * admin/crash shutdown, cannot connect now, unknown database, corruption
 */
const UNAVAILABLE_SQLSTATES = new Set(["57P01", "57P02", "57P03", "3D000", "XX001", "XX002"]);

const UNIQUE_VIOLATION = "23505";

/** Messages pg raises without a code when the socket or pool gives up */
const UNAVAILABLE_MESSAGE = /Connection terminated|timeout exceeded when trying to connect|Client has encountered a connection error/i;

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  return errorCode(err) === UNIQUE_VIOLATION;
}

/**
 * Map a driver error onto the store taxonomy.
 */
export function toStoreError(err: unknown, operation: string): StoreError {
  if (err instanceof StoreError) return err;

  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  const unavailable =
    (code !== undefined &&
      (UNREACHABLE_ERRNOS.has(code) || UNAVAILABLE_SQLSTATES.has(code) || code.startsWith("08"))) ||
    UNAVAILABLE_MESSAGE.test(message);

  if (unavailable) {
    return new StoreUnavailableError(`PostgreSQL unavailable during ${operation}: ${message}`, { cause: err });
  }
  return new StoreError(`${operation} failed: ${message}`, { cause: err });
}

// =============================================================================
// Row Mapping
// =============================================================================

/**
 * BIGINT comes back from pg as a string; normalize to numbers.
 */
function toEntry(row: QueryResultRow): Entry {
  return {
    code: String(row.code),
    target: String(row.target),
    createdAt: Number(row.created_at),
    hits: Number(row.hits),
  };
}

/**
 * Escape LIKE wildcards so the filter is a plain substring match
 */
export function likeSubstring(filter: string): string {
  return `%${filter.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

// =============================================================================
// Store
// =============================================================================

/** Queries slower than this are logged */
const SLOW_QUERY_THRESHOLD_MS = 100;

export interface PgMappingStoreOptions {
  clock?: Clock;
  logger?: Logger;
}

export class PgMappingStore implements MappingStore {
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly metrics: DbMetrics = {
    totalQueries: 0,
    slowQueries: 0,
    errors: 0,
    avgQueryTimeMs: 0,
  };

  constructor(private readonly pool: PoolLike, options: PgMappingStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("db");
  }

  /**
   * Create the entries table and its created_at index if missing.
   */
  async ensureSchema(): Promise<void> {
    await this.run("ensureSchema", async () => {
      await this.pool.query(SQL.CREATE_TABLE);
      await this.pool.query(SQL.CREATE_INDEX);
    });
  }

  async createOrReplace(code: string, target: string): Promise<UpsertResult> {
    const createdAt = this.clock.now();

    return this.run("createOrReplace", async () => {
      try {
        return await this.upsert(code, target, createdAt);
      } catch (err) {
        if (!isUniqueViolation(err)) throw err;
        this.log.debug({ code }, "Concurrent insert of same code, retrying as replace");
        return this.upsert(code, target, createdAt);
      }
    });
  }

  async get(code: string): Promise<Entry | null> {
    return this.run("get", async () => {
      const result = await this.pool.query(SQL.GET_ENTRY, [code]);
      const row = result.rows[0];
      return row ? toEntry(row) : null;
    });
  }

  async incrementHits(code: string): Promise<boolean> {
    return this.run("incrementHits", async () => {
      const result = await this.pool.query(SQL.INCREMENT_HITS, [code]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async findExpired(now: number, ttl: number): Promise<Entry[]> {
    return this.run("findExpired", async () => {
      const result = await this.pool.query(SQL.FIND_EXPIRED, [now, ttl]);
      return result.rows.map(toEntry);
    });
  }

  async delete(code: string): Promise<boolean> {
    return this.run("delete", async () => {
      const result = await this.pool.query(SQL.DELETE_ENTRY, [code]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async list(filter?: string): Promise<Entry[]> {
    return this.run("list", async () => {
      const result = filter
        ? await this.pool.query(SQL.LIST_FILTERED, [likeSubstring(filter)])
        : await this.pool.query(SQL.LIST_ALL);
      return result.rows.map(toEntry);
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query(SQL.PING);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  getMetrics(): DbMetrics {
    return { ...this.metrics };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async upsert(code: string, target: string, createdAt: number): Promise<UpsertResult> {
    const client = await this.pool.connect();

    try {
      await client.query(SQL.BEGIN);
      const locked = await client.query(SQL.LOCK_ENTRY, [code]);
      const row = locked.rows[0];

      let result: UpsertResult;
      if (row) {
        await client.query(SQL.REPLACE_ENTRY, [code, target, createdAt]);
        result = { outcome: "replaced", replacedTarget: String(row.target) };
      } else {
        await client.query(SQL.INSERT_ENTRY, [code, target, createdAt]);
        result = { outcome: "inserted", replacedTarget: null };
      }

      await client.query(SQL.COMMIT);
      return result;
    } catch (err) {
      await this.rollback(client, code);
      throw err;
    } finally {
      client.release();
    }
  }

  private async rollback(client: PoolClientLike, code: string): Promise<void> {
    try {
      await client.query(SQL.ROLLBACK);
    } catch (rollbackErr) {
      // The original error is the one worth surfacing
      this.log.warn({ err: rollbackErr, code }, "Rollback failed");
    }
  }

  /**
   * Time an operation, keep counters, and translate driver errors.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();

    try {
      const result = await fn();
      const duration = performance.now() - start;

      this.metrics.totalQueries++;
      this.metrics.avgQueryTimeMs =
        (this.metrics.avgQueryTimeMs * (this.metrics.totalQueries - 1) + duration) /
        this.metrics.totalQueries;

      if (duration > SLOW_QUERY_THRESHOLD_MS) {
        this.metrics.slowQueries++;
        this.log.warn({ operation, durationMs: Math.round(duration) }, "Slow query");
      }

      return result;
    } catch (err) {
      this.metrics.errors++;
      throw toStoreError(err, operation);
    }
  }
}
