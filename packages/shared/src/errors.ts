/**
 * Error Taxonomy
 *
 * NotFound and Expired are ordinary lookup results, not errors.
 * Everything here is thrown.
 */

export const ErrorCode = {
  STORE_ERROR: "STORE_ERROR",
  STORE_UNAVAILABLE: "STORE_UNAVAILABLE",
  CODE_GENERATION_FAILED: "CODE_GENERATION_FAILED",
  ARTIFACT_REMOVAL_FAILED: "ARTIFACT_REMOVAL_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * A single store operation failed. The next call may succeed.
 */
export class StoreError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }, code: ErrorCode = ErrorCode.STORE_ERROR) {
    super(message, options);
    this.name = "StoreError";
    this.code = code;
  }
}

/**
 * The storage backend is unreachable or corrupt.
 * Nothing can proceed safely; callers let it reach the process boundary.
 */
export class StoreUnavailableError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options, ErrorCode.STORE_UNAVAILABLE);
    this.name = "StoreUnavailableError";
  }
}

export class CodeGenerationError extends Error {
  public readonly code = ErrorCode.CODE_GENERATION_FAILED;

  constructor(message: string) {
    super(message);
    this.name = "CodeGenerationError";
  }
}

/**
 * Removing an uploaded file failed. Only the reaper sees this; it logs
 * and moves on to deleting the entry.
 */
export class ArtifactRemovalError extends Error {
  public readonly code = ErrorCode.ARTIFACT_REMOVAL_FAILED;

  constructor(
    message: string,
    public readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ArtifactRemovalError";
  }
}

export function isStoreUnavailable(err: unknown): err is StoreUnavailableError {
  return err instanceof StoreUnavailableError;
}
