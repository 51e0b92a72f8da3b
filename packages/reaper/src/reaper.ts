/**
 * Expiry Reaper
 *
 * Periodically removes expired entries from the mapping store, deleting
 * the uploaded file behind each artifact entry first.
 *
 * ┌─────────────┐  findExpired  ┌─────────────┐  remove   ┌─────────────┐
 * │   Reaper    │──────────────▶│ MappingStore│           │  Artifacts  │
 * │ (interval)  │───── delete ─▶│             │  ◀────────│ (uploadDir) │
 * └─────────────┘               └─────────────┘           └─────────────┘
 *
 * - Sweeps never overlap; a tick that finds one in flight is skipped
 * - Artifact and per-entry failures are logged, the sweep continues
 * - A failed sweep is retried on the next tick
 * - StoreUnavailableError halts the loop and goes to `onFatal`
 *
 * Lookups re-check TTL on every read, so an entry that outlives its TTL
 * by up to one interval is reported expired, never served.
 */

import type { MappingStore } from "@ttlink/db";
import { createLogger, type Logger } from "@ttlink/logger";
import {
  LIFECYCLE_CONFIG,
  isStoreUnavailable,
  systemClock,
  type Clock,
  type Entry,
} from "@ttlink/shared";
import type { ArtifactRemover } from "./artifacts.js";

// =============================================================================
// Types
// =============================================================================

export interface ReaperOptions {
  store: MappingStore;
  artifacts: ArtifactRemover;
  /** Entry TTL in seconds */
  ttl: number;
  /** Milliseconds between sweeps */
  intervalMs?: number;
  /** Sweep once as soon as `start()` is called */
  runOnStart?: boolean;
  clock?: Clock;
  logger?: Logger;
  /** Receives the error that halted the loop */
  onFatal?: (error: Error) => void;
}

export interface SweepResult {
  /** Expired entries returned by the store */
  scanned: number;
  deleted: number;
  /** Entries replaced since the scan; left alone */
  skipped: number;
  artifactsRemoved: number;
  artifactFailures: number;
  entryFailures: number;
}

export interface ReaperStats {
  running: boolean;
  sweeps: number;
  failedSweeps: number;
  deleted: number;
  artifactFailures: number;
  /** Clock seconds at the end of the last completed sweep */
  lastSweepAt: number | null;
}

const defaultLogger = createLogger("reaper");

// =============================================================================
// Reaper
// =============================================================================

export class Reaper {
  private readonly store: MappingStore;
  private readonly artifacts: ArtifactRemover;
  private readonly ttl: number;
  private readonly intervalMs: number;
  private readonly runOnStart: boolean;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly onFatal: (error: Error) => void;

  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  // Metrics
  private sweeps = 0;
  private failedSweeps = 0;
  private totalDeleted = 0;
  private totalArtifactFailures = 0;
  private lastSweepAt: number | null = null;

  constructor(options: ReaperOptions) {
    this.store = options.store;
    this.artifacts = options.artifacts;
    this.ttl = options.ttl;
    this.intervalMs = options.intervalMs ?? LIFECYCLE_CONFIG.DEFAULT_REAP_INTERVAL_SECONDS * 1000;
    this.runOnStart = options.runOnStart ?? false;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger;
    this.onFatal = options.onFatal ?? (() => undefined);

    if (!Number.isFinite(this.intervalMs) || this.intervalMs <= 0) {
      throw new RangeError(`Reaper interval must be positive, got ${this.intervalMs}`);
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * One pass over every expired entry.
   * Throws only if the scan itself fails or the store becomes unavailable.
   */
  async sweep(): Promise<SweepResult> {
    const now = this.clock.now();
    const expired = await this.store.findExpired(now, this.ttl);

    const result: SweepResult = {
      scanned: expired.length,
      deleted: 0,
      skipped: 0,
      artifactsRemoved: 0,
      artifactFailures: 0,
      entryFailures: 0,
    };

    for (const entry of expired) {
      try {
        await this.reapEntry(entry, result);
      } catch (err) {
        if (isStoreUnavailable(err)) throw err;
        result.entryFailures++;
        this.log.warn({ err, code: entry.code }, "Failed to delete expired entry");
      }
    }

    if (result.scanned > 0) {
      this.log.info({ ...result }, "Sweep complete");
    }
    return result;
  }

  /**
   * Begin sweeping every `intervalMs`. Calling it twice is a no-op.
   */
  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.log.info({ intervalMs: this.intervalMs, ttl: this.ttl }, "Reaper started");

    if (this.runOnStart) {
      this.tick();
    }
  }

  /**
   * Stop scheduling sweeps and wait for the one in flight, if any
   */
  async stop(): Promise<void> {
    const wasRunning = this.halt();
    if (this.inFlight) {
      await this.inFlight;
    }
    if (wasRunning) {
      this.log.info({ sweeps: this.sweeps, deleted: this.totalDeleted }, "Reaper stopped");
    }
  }

  getStats(): ReaperStats {
    return {
      running: this.running,
      sweeps: this.sweeps,
      failedSweeps: this.failedSweeps,
      deleted: this.totalDeleted,
      artifactFailures: this.totalArtifactFailures,
      lastSweepAt: this.lastSweepAt,
    };
  }

  // ---------------------------------------------------------------------------

  private async reapEntry(entry: Entry, result: SweepResult): Promise<void> {
    // Re-read: the code may have been re-created since the scan
    const current = await this.store.get(entry.code);
    const replaced = current !== null && current.createdAt !== entry.createdAt;

    const stillReferenced = current !== null && replaced && current.target === entry.target;

    if (this.artifacts.isArtifact(entry.target) && !stillReferenced) {
      await this.removeArtifact(entry, result);
    }

    if (replaced) {
      result.skipped++;
      this.log.debug({ code: entry.code }, "Entry replaced since scan, not deleting");
      return;
    }

    if (await this.store.delete(entry.code)) {
      result.deleted++;
    }
  }

  private async removeArtifact(entry: Entry, result: SweepResult): Promise<void> {
    try {
      if (await this.artifacts.remove(entry.target)) {
        result.artifactsRemoved++;
      } else {
        this.log.debug({ code: entry.code, target: entry.target }, "Artifact already gone");
      }
    } catch (err) {
      result.artifactFailures++;
      this.log.warn({ err, code: entry.code, target: entry.target }, "ArtifactRemovalFailed");
    }
  }

  private tick(): void {
    if (this.inFlight) {
      this.log.debug("Previous sweep still running, skipping tick");
      return;
    }

    this.inFlight = this.sweep()
      .then((result) => {
        this.sweeps++;
        this.totalDeleted += result.deleted;
        this.totalArtifactFailures += result.artifactFailures;
        this.lastSweepAt = this.clock.now();
      })
      .catch((err: unknown) => this.handleSweepError(err))
      .finally(() => {
        this.inFlight = null;
      });
  }

  private handleSweepError(err: unknown): void {
    this.failedSweeps++;

    if (isStoreUnavailable(err)) {
      this.halt();
      this.log.fatal({ err }, "Store unavailable, reaper halted");
      this.onFatal(err);
      return;
    }

    this.log.error({ err }, "Sweep failed, retrying next interval");
  }

  private halt(): boolean {
    if (!this.timer) return false;
    clearInterval(this.timer);
    this.timer = null;
    return true;
  }
}
