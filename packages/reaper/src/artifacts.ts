/**
 * Upload Artifact Store
 *
 * Files live flat in one upload directory as `<epochSeconds>_<name>`;
 * entries reference them as `/uploads/<epochSeconds>_<name>`.
 *
 * The creation path only writes new files (exclusive create), the reaper
 * only removes them, so no two writers ever touch the same path.
 */

import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  ARTIFACT_CONFIG,
  ArtifactRemovalError,
  generateCode,
  systemClock,
  type Clock,
} from "@ttlink/shared";

// =============================================================================
// Types
// =============================================================================

/**
 * What the reaper needs from a file store
 */
export interface ArtifactRemover {
  /** True if `target` references a stored file rather than a URL */
  isArtifact(target: string): boolean;

  /**
   * Remove the file behind `target`.
   * @returns false if it was already gone
   * @throws ArtifactRemovalError for anything else
   */
  remove(target: string): Promise<boolean>;
}

export interface SavedArtifact {
  /** Entry target, e.g. `/uploads/1700000000_report.pdf` */
  target: string;
  /** Absolute path on disk */
  filePath: string;
}

// =============================================================================
// Filename Sanitizing
// =============================================================================

/**
 * Reduce a client-supplied filename to a safe flat name:
 * ASCII letters, digits, `_`, `-` and `.` only, whitespace and path
 * separators collapsed to `_`, no leading dots or underscores.
 *
 * @example
 * sanitizeFilename("../../etc/passwd") // "etc_passwd"
 * sanitizeFilename("My Résumé.pdf")    // "My_Resume.pdf"
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name
    .normalize("NFKD")
    .replace(/[^\x20-\x7e]/g, "")
    .replace(/[/\\]/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+/, "");

  return cleaned || "file";
}

// =============================================================================
// Local Directory Store
// =============================================================================

export class LocalArtifactStore implements ArtifactRemover {
  readonly uploadDir: string;

  constructor(uploadDir: string, private readonly clock: Clock = systemClock) {
    this.uploadDir = path.resolve(uploadDir);
  }

  async ensureDir(): Promise<void> {
    await mkdir(this.uploadDir, { recursive: true });
  }

  isArtifact(target: string): boolean {
    return target.startsWith(ARTIFACT_CONFIG.TARGET_PREFIX);
  }

  /**
   * Absolute path for an artifact target.
   * Returns null for URL targets and for names that would escape the
   * upload directory.
   */
  resolvePath(target: string): string | null {
    if (!this.isArtifact(target)) return null;

    const name = target.slice(ARTIFACT_CONFIG.TARGET_PREFIX.length);
    const filePath = path.resolve(this.uploadDir, name);
    if (name.length === 0 || path.dirname(filePath) !== this.uploadDir) {
      return null;
    }
    return filePath;
  }

  /**
   * Write an uploaded file under a timestamp-prefixed name.
   * A same-second collision on the same name gets a short random infix.
   */
  async save(originalName: string, data: Uint8Array): Promise<SavedArtifact> {
    const safeName = sanitizeFilename(originalName);
    const stamp = this.clock.now();

    try {
      return await this.writeExclusive(`${stamp}_${safeName}`, data);
    } catch (err) {
      if (!isErrno(err, "EEXIST")) throw err;
      return this.writeExclusive(`${stamp}_${generateCode(4)}_${safeName}`, data);
    }
  }

  async remove(target: string): Promise<boolean> {
    const filePath = this.resolvePath(target);
    if (!filePath) {
      throw new ArtifactRemovalError(`Refusing to remove ${target}: not inside the upload directory`, target);
    }

    try {
      await rm(filePath);
      return true;
    } catch (err) {
      if (isErrno(err, "ENOENT")) return false;
      throw new ArtifactRemovalError(`Failed to remove ${filePath}`, target, { cause: err });
    }
  }

  private async writeExclusive(fileName: string, data: Uint8Array): Promise<SavedArtifact> {
    const filePath = path.join(this.uploadDir, fileName);
    await writeFile(filePath, data, { flag: "wx" });
    return { target: `${ARTIFACT_CONFIG.TARGET_PREFIX}${fileName}`, filePath };
  }
}

function isErrno(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}
