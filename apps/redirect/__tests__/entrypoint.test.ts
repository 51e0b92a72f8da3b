/**
 * Entrypoint Wiring Tests
 *
 * The service runs from its TypeScript sources; these checks keep the
 * start script and the workspace manifests pointing at files that exist.
 */

import { describe, it, expect } from "@jest/globals";
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

const ROOT = path.resolve(__dirname, "../../..");

const ManifestSchema = z.object({
  name: z.string(),
  main: z.string().optional(),
  scripts: z.record(z.string()).optional(),
  devDependencies: z.record(z.string()).optional(),
  workspaces: z.array(z.string()).optional(),
});

function readManifest(dir: string): z.infer<typeof ManifestSchema> {
  return ManifestSchema.parse(JSON.parse(readFileSync(path.join(ROOT, dir, "package.json"), "utf8")));
}

describe("service entrypoint", () => {
  const root = readManifest(".");

  it("should start the redirect service from its sources through tsx", () => {
    expect(root.scripts?.start).toBe("tsx apps/redirect/src/index.ts");
    expect(root.devDependencies).toHaveProperty("tsx");
    expect(existsSync(path.join(ROOT, "apps/redirect/src/index.ts"))).toBe(true);
  });

  it("should point every workspace's main at an existing file", () => {
    const workspaces = root.workspaces ?? [];

    expect(workspaces).toHaveLength(5);
    for (const dir of workspaces) {
      const manifest = readManifest(dir);
      expect(manifest.name).toMatch(/^@ttlink\//);
      expect(manifest.main).toBeDefined();
      expect(existsSync(path.join(ROOT, dir, manifest.main ?? ""))).toBe(true);
    }
  });
});
