/**
 * TTL arithmetic
 *
 * All times are whole seconds since epoch. An entry is expired only
 * once strictly more than `ttl` seconds have passed, so at exactly
 * `createdAt + ttl` it is still live with zero seconds left.
 */

import type { Clock } from "../types/index.js";

export function isExpired(createdAt: number, ttl: number, now: number): boolean {
  return now - createdAt > ttl;
}

/**
 * max(0, ttl - (now - createdAt))
 */
export function secondsLeft(createdAt: number, ttl: number, now: number): number {
  return Math.max(0, ttl - (now - createdAt));
}

/**
 * Current time in whole seconds
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export const systemClock: Clock = {
  now: nowSeconds,
};

/**
 * A clock that only moves when told to. Used by tests and tooling
 * that need to step through a TTL window.
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
