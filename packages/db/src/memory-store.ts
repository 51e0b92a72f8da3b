/**
 * In-Memory Mapping Store
 *
 * Default backend when no DATABASE_URL is configured.
 * Every method does its read-modify-write without awaiting in between,
 * so on the single Node.js event loop each operation is atomic per entry
 * and no increment is lost.
 *
 * Entries are copied on the way in and out; callers never hold a
 * reference into the map.
 */

import {
  StoreUnavailableError,
  systemClock,
  type Clock,
  type Entry,
  type UpsertResult,
} from "@ttlink/shared";
import type { MappingStore } from "./types.js";

export class MemoryMappingStore implements MappingStore {
  private readonly entries = new Map<string, Entry>();
  private closed = false;

  constructor(private readonly clock: Clock = systemClock) {}

  async createOrReplace(code: string, target: string): Promise<UpsertResult> {
    this.assertOpen();
    const createdAt = this.clock.now();
    const previous = this.entries.get(code);

    // Overwrite or insert: new target, new creation time, hits reset
    this.entries.set(code, { code, target, createdAt, hits: 0 });

    return previous
      ? { outcome: "replaced", replacedTarget: previous.target }
      : { outcome: "inserted", replacedTarget: null };
  }

  async get(code: string): Promise<Entry | null> {
    this.assertOpen();
    const entry = this.entries.get(code);
    return entry ? { ...entry } : null;
  }

  async incrementHits(code: string): Promise<boolean> {
    this.assertOpen();
    const entry = this.entries.get(code);
    if (!entry) return false;

    this.entries.set(code, { ...entry, hits: entry.hits + 1 });
    return true;
  }

  async findExpired(now: number, ttl: number): Promise<Entry[]> {
    this.assertOpen();
    const expired: Entry[] = [];
    for (const entry of this.entries.values()) {
      if (now - entry.createdAt > ttl) {
        expired.push({ ...entry });
      }
    }
    return expired;
  }

  async delete(code: string): Promise<boolean> {
    this.assertOpen();
    return this.entries.delete(code);
  }

  async list(filter?: string): Promise<Entry[]> {
    this.assertOpen();
    const all = Array.from(this.entries.values(), (entry) => ({ ...entry }));
    const matching = filter
      ? all.filter((entry) => entry.code.includes(filter) || entry.target.includes(filter))
      : all;

    return matching.sort((a, b) => b.createdAt - a.createdAt);
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.entries.clear();
  }

  /** Number of stored entries, live or expired */
  get size(): number {
    return this.entries.size;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError("Memory store is closed");
    }
  }
}
