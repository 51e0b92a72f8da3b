/**
 * Request Handlers
 *
 * Lookup, metadata, admin listing and health endpoints. Every handler
 * reads its collaborators from `c.get("deps")`.
 *
 * Lookup flow:
 * 1. Resolve the code through the TTL-aware lookup (bumps hits)
 * 2. not_found → 404, expired → 410
 * 3. Artifact target → streamed file download, otherwise 302 redirect
 *
 * Store errors are not caught here; the app's error handler maps
 * StoreUnavailableError to 503 and everything else to 500.
 */

import type { Stats } from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import type { Context } from "hono";
import { lookup } from "@ttlink/db";
import { secondsLeft, type Entry } from "@ttlink/shared";
import * as metrics from "./metrics.js";
import type {
  AdminResponse,
  AppEnv,
  ErrorResponse,
  LivenessResponse,
  MetadataResponse,
  ReadinessResponse,
} from "./types.js";

// =============================================================================
// Response Helpers
// =============================================================================

/**
 * Lookups change as entries expire; nothing here may be cached.
 */
const NO_STORE = "no-store";

function toMetadata(entry: Entry, ttl: number, now: number): MetadataResponse {
  return {
    target: entry.target,
    createdAt: entry.createdAt,
    expiresIn: secondsLeft(entry.createdAt, ttl, now),
    hits: entry.hits,
  };
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

// =============================================================================
// Lookup
// =============================================================================

export async function handleRedirect(c: Context<AppEnv, "/:code">): Promise<Response> {
  const start = performance.now();
  const { store, artifacts, clock, logger, ttlSeconds } = c.get("deps");
  const code = c.req.param("code");

  const result = await lookup(store, code, { ttl: ttlSeconds, clock, logger });

  if (result.status === "not_found") {
    metrics.recordLookup("not_found", performance.now() - start);
    return c.text("Not found", 404, { "Cache-Control": NO_STORE });
  }

  if (result.status === "expired") {
    metrics.recordLookup("expired", performance.now() - start);
    return c.text("Link expired", 410, { "Cache-Control": NO_STORE });
  }

  if (!artifacts.isArtifact(result.target)) {
    metrics.recordLookup("redirect", performance.now() - start);
    c.header("Cache-Control", NO_STORE);
    return c.redirect(result.target, 302);
  }

  const filePath = artifacts.resolvePath(result.target);
  if (!filePath) {
    logger.warn({ code, target: result.target }, "Artifact target outside the upload directory");
    metrics.recordLookup("not_found", performance.now() - start);
    return c.text("Not found", 404, { "Cache-Control": NO_STORE });
  }

  // The open handle keeps the file readable even if the reaper unlinks it mid-download
  let file: FileHandle;
  try {
    file = await open(filePath, "r");
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    logger.warn({ code, target: result.target }, "Artifact missing for live entry");
    metrics.recordLookup("not_found", performance.now() - start);
    return c.text("Not found", 404, { "Cache-Control": NO_STORE });
  }

  let stats: Stats;
  try {
    stats = await file.stat();
  } catch (err) {
    await file.close();
    throw err;
  }

  if (!stats.isFile()) {
    await file.close();
    logger.warn({ code, target: result.target }, "Artifact target is not a regular file");
    metrics.recordLookup("not_found", performance.now() - start);
    return c.text("Not found", 404, { "Cache-Control": NO_STORE });
  }

  metrics.recordLookup("download", performance.now() - start);
  return new Response(Readable.toWeb(file.createReadStream()), {
    status: 200,
    headers: {
      "Content-Type": "application/octet-stream",
      "Content-Length": String(stats.size),
      "Content-Disposition": `attachment; filename="${path.basename(filePath)}"`,
      "Cache-Control": NO_STORE,
      "X-Content-Type-Options": "nosniff",
    },
  });
}

// =============================================================================
// Metadata & Admin
// =============================================================================

/**
 * Entry details without counting a hit. Expired rows the reaper has not
 * removed yet are still reported, with `expiresIn` 0.
 */
export async function handleMetadata(c: Context<AppEnv, "/api/metadata/:code">): Promise<Response> {
  const { store, clock, ttlSeconds } = c.get("deps");
  const entry = await store.get(c.req.param("code"));

  if (!entry) {
    const notFound: ErrorResponse = { error: "Not found" };
    return c.json(notFound, 404);
  }

  const body: MetadataResponse = toMetadata(entry, ttlSeconds, clock.now());
  return c.json(body);
}

/**
 * All entries, newest first, narrowed by `?q=` on code or target
 */
export async function handleAdmin(c: Context<AppEnv>): Promise<Response> {
  const { store, clock, ttlSeconds } = c.get("deps");
  const query = (c.req.query("q") ?? "").trim();
  const now = clock.now();

  const entries = await store.list(query || undefined);

  const body: AdminResponse = {
    entries: entries.map((entry) => ({ code: entry.code, ...toMetadata(entry, ttlSeconds, now) })),
  };
  return c.json(body);
}

// =============================================================================
// Health Check Handlers
// =============================================================================

/**
 * Liveness probe - no dependencies
 */
export function handleLiveness(c: Context<AppEnv>): Response {
  const body: LivenessResponse = { status: "ok" };
  return c.json(body);
}

/**
 * Readiness probe - store answers and the reaper, if any, is running
 */
export async function handleReadiness(c: Context<AppEnv>): Promise<Response> {
  const { store, reaperStats } = c.get("deps");
  const storeOk = await store.ping();
  const reaper = reaperStats ? (reaperStats().running ? "ok" : "stopped") : "disabled";

  const healthy = storeOk && reaper !== "stopped";
  const body: ReadinessResponse = {
    status: healthy ? "ok" : "unhealthy",
    checks: {
      store: storeOk ? "ok" : "error",
      reaper,
    },
  };

  return c.json(body, healthy ? 200 : 503);
}

/**
 * Metrics endpoint - Prometheus format
 */
export function handleMetrics(c: Context<AppEnv>): Response {
  const { reaperStats, dbMetrics } = c.get("deps");
  c.header("Content-Type", "text/plain; version=0.0.4");
  return c.text(metrics.getMetrics({ reaper: reaperStats?.(), db: dbMetrics?.() }));
}
