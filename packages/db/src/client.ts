/**
 * PostgreSQL Pool Factory
 *
 * Creates the connection pool the mapping store runs on.
 * Uses `pg` directly - raw SQL, no ORM.
 *
 * Environment Variables (read by the service config, passed in here):
 * - DATABASE_URL: connection string
 * - DB_POOL_MAX: maximum pooled connections
 *
 * Usage:
 * ```ts
 * import { createPool, PgMappingStore } from "@ttlink/db";
 *
 * const pool = createPool({ connectionString: process.env.DATABASE_URL });
 * const store = new PgMappingStore(pool);
 * await store.ensureSchema();
 * ```
 */

import { Pool } from "pg";
import { createLogger } from "@ttlink/logger";
import type { PoolLike } from "./types.js";

const log = createLogger("db");

/**
 * Connection pool configuration
 */
export interface PoolOptions {
  /** PostgreSQL connection string */
  connectionString: string;
  /** Maximum connections in pool */
  max?: number;
  /** Close idle connections after this many ms */
  idleTimeoutMillis?: number;
  /** Connection acquisition timeout in ms */
  connectionTimeoutMillis?: number;
  /** Server-side statement timeout in ms */
  statementTimeoutMillis?: number;
}

/**
 * Create a pg pool.
 * Does not connect; the first query (or ensureSchema) does.
 */
export function createPool(options: PoolOptions): PoolLike {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 2000,
    statement_timeout: options.statementTimeoutMillis ?? 5000,
  });

  // An idle client dying must not take the process down with it;
  // the next query surfaces the failure to its caller.
  pool.on("error", (err) => {
    log.error({ err }, "Idle PostgreSQL client error");
  });

  return pool;
}
