/**
 * HTTP Service Type Definitions
 */

import type { DbMetrics, MappingStore } from "@ttlink/db";
import type { Logger, LogLevel } from "@ttlink/logger";
import type { LocalArtifactStore, ReaperStats } from "@ttlink/reaper";
import type { Clock } from "@ttlink/shared";

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Service configuration loaded from environment
 */
export interface Config {
  /** Environment name (development, staging, production) */
  env: "development" | "staging" | "production";

  /** HTTP server port */
  port: number;

  /** HTTP server host */
  host: string;

  /** Prefix for short links, no trailing slash */
  baseUrl: string;

  /** PostgreSQL connection URL; unset means the in-memory store */
  databaseUrl: string | null;

  /** pg pool size */
  dbPoolMax: number;

  /** Directory holding uploaded files */
  uploadDir: string;

  /** Entry lifetime (seconds) */
  ttlSeconds: number;

  /** Seconds between reaper sweeps */
  reapIntervalSeconds: number;

  /** Length of generated codes */
  codeLength: number;

  /** Upload body cap (bytes) */
  maxUploadBytes: number;

  logLevel: LogLevel;
}

// =============================================================================
// Application Wiring
// =============================================================================

/**
 * Everything a request handler may touch.
 * Built once by the server; tests build their own.
 */
export interface AppDeps {
  store: MappingStore;
  artifacts: LocalArtifactStore;
  clock: Clock;
  logger: Logger;
  ttlSeconds: number;
  codeLength: number;
  baseUrl: string;
  maxUploadBytes: number;
  /** Reaper state for readiness and metrics; absent when none runs */
  reaperStats?: () => ReaperStats;
  /** Query counters when the store is PostgreSQL */
  dbMetrics?: () => DbMetrics;
}

export type AppEnv = {
  Variables: {
    deps: AppDeps;
  };
};

// =============================================================================
// Response Bodies
// =============================================================================

export interface UploadResponse {
  code: string;
  shortUrl: string;
  target: string;
  /** Seconds until the entry expires */
  expiresIn: number;
}

export interface MetadataResponse {
  target: string;
  /** Epoch seconds */
  createdAt: number;
  expiresIn: number;
  hits: number;
}

export interface AdminEntry extends MetadataResponse {
  code: string;
}

export interface AdminResponse {
  entries: AdminEntry[];
}

export interface ErrorResponse {
  error: string;
}

/**
 * Liveness probe response
 */
export interface LivenessResponse {
  status: "ok";
}

/**
 * Readiness probe response
 */
export interface ReadinessResponse {
  status: "ok" | "unhealthy";
  checks: {
    store: "ok" | "error";
    reaper: "ok" | "stopped" | "disabled";
  };
}
