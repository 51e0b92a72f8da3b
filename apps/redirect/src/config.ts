/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 * No validation libraries - just simple parsing with defaults.
 *
 * Fails fast on startup if a value makes the service unusable.
 */

import { logger as defaultLogger, parseLogLevel, type Logger } from "@ttlink/logger";
import { ARTIFACT_CONFIG, LIFECYCLE_CONFIG, SHORTCODE_CONFIG } from "@ttlink/shared";
import type { Config } from "./types.js";

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 5050;
const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function optionalOrNull(env: Env, name: string): string | null {
  return env[name] || null;
}

/**
 * Parse integer with default. Garbage is an error, not the default.
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function parseEnvName(value: string | undefined): Config["env"] {
  if (value === "production" || value === "staging") return value;
  return "development";
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 */
export function loadConfig(env: Env = process.env): Config {
  const port = optionalInt(env, "PORT", DEFAULT_PORT);

  return {
    env: parseEnvName(env.NODE_ENV),

    // Server
    port,
    host: optional(env, "HOST", "0.0.0.0"),
    baseUrl: optional(env, "BASE_URL", `http://localhost:${port}`).replace(/\/+$/, ""),

    // Database
    databaseUrl: optionalOrNull(env, "DATABASE_URL"),
    dbPoolMax: optionalInt(env, "DB_POOL_MAX", 10),

    // Artifacts
    uploadDir: optional(env, "UPLOAD_DIR", ARTIFACT_CONFIG.DEFAULT_UPLOAD_DIR),
    maxUploadBytes: optionalInt(env, "MAX_UPLOAD_BYTES", DEFAULT_MAX_UPLOAD_BYTES),

    // Lifecycle
    ttlSeconds: optionalInt(env, "TTL_SECONDS", LIFECYCLE_CONFIG.DEFAULT_TTL_SECONDS),
    reapIntervalSeconds: optionalInt(
      env,
      "REAP_INTERVAL_SECONDS",
      LIFECYCLE_CONFIG.DEFAULT_REAP_INTERVAL_SECONDS
    ),
    codeLength: optionalInt(env, "CODE_LENGTH", SHORTCODE_CONFIG.DEFAULT_LENGTH),

    // Logging
    logLevel: parseLogLevel(env.LOG_LEVEL, "info"),
  };
}

/**
 * Validate configuration at runtime.
 * Throws on unusable values, logs warnings for suboptimal ones.
 */
export function validateConfig(config: Config, log: Logger = defaultLogger): void {
  const positive: Array<[string, number]> = [
    ["PORT", config.port],
    ["DB_POOL_MAX", config.dbPoolMax],
    ["TTL_SECONDS", config.ttlSeconds],
    ["REAP_INTERVAL_SECONDS", config.reapIntervalSeconds],
    ["CODE_LENGTH", config.codeLength],
    ["MAX_UPLOAD_BYTES", config.maxUploadBytes],
  ];
  for (const [name, value] of positive) {
    if (value <= 0) {
      throw new Error(`${name} must be positive, got ${value}`);
    }
  }

  if (config.reapIntervalSeconds > config.ttlSeconds) {
    log.warn(
      { reapIntervalSeconds: config.reapIntervalSeconds, ttlSeconds: config.ttlSeconds },
      "REAP_INTERVAL_SECONDS exceeds TTL_SECONDS; expired rows will linger for more than a full TTL"
    );
  }

  if (config.codeLength < SHORTCODE_CONFIG.DEFAULT_LENGTH) {
    log.warn(
      { codeLength: config.codeLength },
      "CODE_LENGTH is short; generation will collide and retry more often"
    );
  }

  if (!config.databaseUrl && config.env === "production") {
    log.warn("DATABASE_URL not set; entries live in memory and are lost on restart");
  }
}
