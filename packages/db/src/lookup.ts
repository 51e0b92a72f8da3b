/**
 * Lookup / Hit-Increment Path
 *
 * Resolves a code to one of three outcomes:
 *   target    - live entry; hits were bumped on the way out
 *   expired   - row still present but past TTL (the reaper has not run yet)
 *   not_found - no row at all
 *
 * TTL is re-checked here on every read. The reaper removes rows only once
 * per interval, so the stored row alone cannot be trusted to be live.
 *
 * A failed hit increment never blocks the redirect: it is logged and the
 * target is returned with the hit count it had.
 */

import {
  isExpired,
  isStoreUnavailable,
  systemClock,
  type Clock,
  type LookupResult,
} from "@ttlink/shared";
import { createLogger, type Logger } from "@ttlink/logger";
import type { MappingStore } from "./types.js";

export interface LookupOptions {
  /** Entry TTL in seconds */
  ttl: number;
  clock?: Clock;
  logger?: Logger;
}

const defaultLogger = createLogger("lookup");

export async function lookup(
  store: MappingStore,
  code: string,
  options: LookupOptions
): Promise<LookupResult> {
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? defaultLogger;

  const entry = await store.get(code);
  if (!entry) {
    return { status: "not_found" };
  }

  if (isExpired(entry.createdAt, options.ttl, clock.now())) {
    return { status: "expired", entry };
  }

  let hits = entry.hits;
  try {
    if (await store.incrementHits(code)) {
      hits += 1;
    } else {
      // Reaped between get and increment; still served once
      log.debug({ code }, "Entry vanished before hit increment");
    }
  } catch (err) {
    if (isStoreUnavailable(err)) {
      log.error({ err, code }, "Store unavailable during hit increment, serving target");
    } else {
      log.warn({ err, code }, "Hit increment failed, serving target");
    }
  }

  return { status: "target", target: entry.target, entry: { ...entry, hits } };
}
