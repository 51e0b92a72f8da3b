/**
 * @ttlink/reaper - Expiry Reaper Package
 *
 * Usage:
 * ```ts
 * import { Reaper, LocalArtifactStore } from "@ttlink/reaper";
 *
 * const reaper = new Reaper({
 *   store,
 *   artifacts: new LocalArtifactStore("static/uploads"),
 *   ttl: 600,
 *   intervalMs: 60_000,
 *   onFatal: () => process.exit(1),
 * });
 * reaper.start();
 * ```
 */

export {
  Reaper,
  type ReaperOptions,
  type ReaperStats,
  type SweepResult,
} from "./reaper.js";

export {
  LocalArtifactStore,
  sanitizeFilename,
  type ArtifactRemover,
  type SavedArtifact,
} from "./artifacts.js";
