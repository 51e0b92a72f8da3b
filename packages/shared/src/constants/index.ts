/**
 * Short Code Configuration Constants
 *
 * Single source of truth for code generation parameters.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Default length for generated short codes.
   * 6 chars = 62^6 = ~5.7 x 10^10 combinations.
   */
  DEFAULT_LENGTH: 6,

  /**
   * Alphanumeric alphabet: A-Za-z0-9
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789",

  /** Maximum collision retry attempts for generateUniqueCode */
  MAX_RETRIES: 5,
} as const;

/**
 * Entry Lifecycle Constants
 */
export const LIFECYCLE_CONFIG = {
  /** Seconds an entry stays live after creation (10 minutes) */
  DEFAULT_TTL_SECONDS: 600,

  /** Seconds between reaper sweeps */
  DEFAULT_REAP_INTERVAL_SECONDS: 60,
} as const;

/**
 * Uploaded file artifacts
 *
 * Targets starting with this prefix reference a file in the upload
 * directory; everything else is a redirect URL.
 */
export const ARTIFACT_CONFIG = {
  TARGET_PREFIX: "/uploads/",
  DEFAULT_UPLOAD_DIR: "static/uploads",
} as const;
