/**
 * Short Code Generation Module
 *
 * Strategy: Random alphanumeric
 * - Length: 6 characters by default (62^6 = ~5.7 x 10^10 combinations)
 * - Alphabet: A-Za-z0-9 (62 URL-safe characters)
 * - Uniqueness: not the generator's job. The store's upsert policy
 *   decides what a repeated code means; generateUniqueCode is the
 *   optional collision check for callers that want a fresh code.
 *
 * Randomness comes from `crypto.getRandomValues()`. Bytes >= 248 are
 * discarded so every symbol is equally likely (248 = 62 * 4).
 */

import { webcrypto } from "node:crypto";
import { SHORTCODE_CONFIG } from "../constants/index.js";
import { CodeGenerationError } from "../errors.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Function signature for checking whether a code is already taken
 */
export type ExistsChecker = (code: string) => Promise<boolean>;

/** Largest multiple of the alphabet size that fits in a byte */
const UNBIASED_BYTE_LIMIT =
  Math.floor(256 / SHORTCODE_CONFIG.ALPHABET.length) * SHORTCODE_CONFIG.ALPHABET.length;

// =============================================================================
// GENERATION
// =============================================================================

/**
 * Generate a random alphanumeric short code.
 *
 * @param length - Code length (default: SHORTCODE_CONFIG.DEFAULT_LENGTH)
 * @throws RangeError if length is not a positive integer
 *
 * @example
 * ```ts
 * const code = generateCode();    // "aB3xY9"
 * const longer = generateCode(10); // "aB3xY9kM2p"
 * ```
 */
export function generateCode(length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Code length must be a positive integer, got ${length}`);
  }

  const alphabet = SHORTCODE_CONFIG.ALPHABET;
  let code = "";

  while (code.length < length) {
    // Over-draw a little so one batch is almost always enough
    const bytes = new Uint8Array(length - code.length + 4);
    webcrypto.getRandomValues(bytes);

    for (const byte of bytes) {
      if (byte >= UNBIASED_BYTE_LIMIT) continue;
      code += alphabet[byte % alphabet.length];
      if (code.length === length) break;
    }
  }

  return code;
}

/**
 * Generate a code that is not currently taken.
 *
 * Flow: generate → existence check → retry (max SHORTCODE_CONFIG.MAX_RETRIES)
 *
 * The check and the later insert are not atomic; a code created in
 * between is overwritten by the upsert, which is the store's contract.
 *
 * @param existsCheck - Resolves true if the code is already in use
 * @param length - Code length
 * @param maxAttempts - Attempts before giving up
 * @throws CodeGenerationError after maxAttempts collisions
 */
export async function generateUniqueCode(
  existsCheck: ExistsChecker,
  length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH,
  maxAttempts: number = SHORTCODE_CONFIG.MAX_RETRIES
): Promise<string> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const code = generateCode(length);
    if (!(await existsCheck(code))) {
      return code;
    }
  }

  throw new CodeGenerationError(
    `Failed to generate unique short code after ${maxAttempts} attempts. ` +
      `Consider increasing code length.`
  );
}
