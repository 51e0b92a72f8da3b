/**
 * Metrics Module
 *
 * In-memory counters for the HTTP service, rendered in Prometheus text
 * format. Reaper and pg figures are read at scrape time from their owners.
 */

import type { DbMetrics } from "@ttlink/db";
import type { ReaperStats } from "@ttlink/reaper";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Histogram buckets for lookup latency (in milliseconds)
 */
const LATENCY_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000];

// =============================================================================
// State
// =============================================================================

const counters = {
  // Lookup outcomes
  lookup_redirect: 0,
  lookup_download: 0,
  lookup_expired: 0,
  lookup_not_found: 0,

  // Creation
  upload_url: 0,
  upload_file: 0,
  upload_rejected: 0,
  upload_replaced: 0,

  // Failures
  store_unavailable: 0,
  internal_error: 0,
};

export type CounterName = keyof typeof counters;

export type LookupOutcome = "redirect" | "download" | "expired" | "not_found";

const latencyHistogram = {
  buckets: new Array<number>(LATENCY_BUCKETS.length + 1).fill(0),
  sum: 0,
  count: 0,
};

// =============================================================================
// Public API
// =============================================================================

export function increment(name: CounterName): void {
  counters[name]++;
}

export function recordLatency(latencyMs: number): void {
  latencyHistogram.sum += latencyMs;
  latencyHistogram.count++;

  const bucket = LATENCY_BUCKETS.findIndex((le) => latencyMs <= le);
  latencyHistogram.buckets[bucket === -1 ? LATENCY_BUCKETS.length : bucket]++;
}

/**
 * Record a lookup result (convenience method)
 */
export function recordLookup(outcome: LookupOutcome, latencyMs: number): void {
  counters[`lookup_${outcome}` as const]++;
  recordLatency(latencyMs);
}

export interface MetricsSources {
  reaper?: ReaperStats;
  db?: DbMetrics;
}

/**
 * Current metrics in Prometheus text format
 */
export function getMetrics(sources: MetricsSources = {}): string {
  const lines: string[] = [];

  const add = (name: string, type: "counter" | "gauge", value: number, help: string) => {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} ${type}`);
    lines.push(`${name} ${value}`);
  };

  // Lookup counters
  lines.push("# HELP ttlink_lookup_total Lookups by outcome");
  lines.push("# TYPE ttlink_lookup_total counter");
  lines.push(`ttlink_lookup_total{outcome="redirect"} ${counters.lookup_redirect}`);
  lines.push(`ttlink_lookup_total{outcome="download"} ${counters.lookup_download}`);
  lines.push(`ttlink_lookup_total{outcome="expired"} ${counters.lookup_expired}`);
  lines.push(`ttlink_lookup_total{outcome="not_found"} ${counters.lookup_not_found}`);

  // Upload counters
  lines.push("# HELP ttlink_upload_total Accepted uploads by kind");
  lines.push("# TYPE ttlink_upload_total counter");
  lines.push(`ttlink_upload_total{kind="url"} ${counters.upload_url}`);
  lines.push(`ttlink_upload_total{kind="file"} ${counters.upload_file}`);
  add("ttlink_upload_rejected_total", "counter", counters.upload_rejected, "Uploads rejected as invalid");
  add("ttlink_upload_replaced_total", "counter", counters.upload_replaced, "Uploads that overwrote an existing code");

  // Failures
  add("ttlink_store_unavailable_total", "counter", counters.store_unavailable, "Requests failed by an unavailable store");
  add("ttlink_internal_error_total", "counter", counters.internal_error, "Requests failed by other errors");

  // Latency histogram
  lines.push("# HELP ttlink_lookup_latency_ms Lookup latency in milliseconds");
  lines.push("# TYPE ttlink_lookup_latency_ms histogram");

  let cumulative = 0;
  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    cumulative += latencyHistogram.buckets[i] ?? 0;
    lines.push(`ttlink_lookup_latency_ms_bucket{le="${LATENCY_BUCKETS[i]}"} ${cumulative}`);
  }
  cumulative += latencyHistogram.buckets[LATENCY_BUCKETS.length] ?? 0;
  lines.push(`ttlink_lookup_latency_ms_bucket{le="+Inf"} ${cumulative}`);
  lines.push(`ttlink_lookup_latency_ms_sum ${latencyHistogram.sum}`);
  lines.push(`ttlink_lookup_latency_ms_count ${latencyHistogram.count}`);

  if (sources.reaper) {
    const { reaper } = sources;
    add("ttlink_reaper_running", "gauge", reaper.running ? 1 : 0, "1 while the reaper loop is scheduled");
    add("ttlink_reaper_sweeps_total", "counter", reaper.sweeps, "Completed sweeps");
    add("ttlink_reaper_failed_sweeps_total", "counter", reaper.failedSweeps, "Sweeps that failed");
    add("ttlink_reaper_deleted_total", "counter", reaper.deleted, "Expired entries deleted");
    add("ttlink_reaper_artifact_failures_total", "counter", reaper.artifactFailures, "Artifact removals that failed");
  }

  if (sources.db) {
    const { db } = sources;
    add("ttlink_db_queries_total", "counter", db.totalQueries, "Queries issued");
    add("ttlink_db_slow_queries_total", "counter", db.slowQueries, "Queries slower than 100ms");
    add("ttlink_db_errors_total", "counter", db.errors, "Queries that failed");
  }

  return lines.join("\n");
}

/**
 * Reset all metrics (for testing)
 */
export function reset(): void {
  for (const key of Object.keys(counters)) {
    if (isCounterName(key)) counters[key] = 0;
  }
  latencyHistogram.buckets.fill(0);
  latencyHistogram.sum = 0;
  latencyHistogram.count = 0;
}

function isCounterName(key: string): key is CounterName {
  return key in counters;
}
