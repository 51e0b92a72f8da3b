/**
 * @ttlink/shared - Shared Package Exports
 *
 * Entry model, code generation, TTL arithmetic and the error taxonomy.
 * Import from the package root only:
 *
 * ```ts
 * import { generateCode, secondsLeft, type Entry } from "@ttlink/shared";
 * ```
 */

// Types (Entry, LookupResult, Clock)
export * from "./types/index.js";

// Utilities (code generation, TTL helpers)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, LIFECYCLE_CONFIG, ARTIFACT_CONFIG)
export * from "./constants/index.js";

// Errors
export * from "./errors.js";
