/**
 * Shared test wiring: an app over the in-memory store, a manual clock
 * and a throwaway upload directory.
 */

import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { MemoryMappingStore } from "@ttlink/db";
import { createLogger } from "@ttlink/logger";
import { LocalArtifactStore } from "@ttlink/reaper";
import { ManualClock } from "@ttlink/shared";
import { createApp } from "../src/app.js";
import type { AppDeps } from "../src/types.js";

export const TTL = 600;
export const T0 = 1000;
export const BASE_URL = "http://short.test";

export interface TestContext {
  app: ReturnType<typeof createApp>;
  deps: AppDeps;
  store: MemoryMappingStore;
  artifacts: LocalArtifactStore;
  clock: ManualClock;
  uploadDir: string;
  cleanup: () => Promise<void>;
}

export async function setup(overrides: Partial<AppDeps> = {}): Promise<TestContext> {
  const uploadDir = await mkdtemp(path.join(os.tmpdir(), "ttlink-http-"));
  const clock = new ManualClock(T0);
  const store = new MemoryMappingStore(clock);
  const artifacts = new LocalArtifactStore(uploadDir, clock);

  const deps: AppDeps = {
    store,
    artifacts,
    clock,
    logger: createLogger("test", "silent"),
    ttlSeconds: TTL,
    codeLength: 6,
    baseUrl: BASE_URL,
    maxUploadBytes: 1024,
    ...overrides,
  };

  return {
    app: createApp(deps),
    deps,
    store,
    artifacts,
    clock,
    uploadDir,
    cleanup: () => rm(uploadDir, { recursive: true, force: true }),
  };
}
