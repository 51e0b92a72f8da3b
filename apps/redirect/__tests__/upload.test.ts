/**
 * Upload Route Tests
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { existsSync } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { Reaper } from "@ttlink/reaper";
import { StoreError } from "@ttlink/shared";
import * as metrics from "../src/metrics.js";
import { UPLOAD_ERRORS } from "../src/upload.js";
import { setup, BASE_URL, T0, TTL, type TestContext } from "./helpers.js";

function form(fields: Record<string, string | { content: string; filename: string }>): FormData {
  const data = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    if (typeof value === "string") {
      data.append(name, value);
    } else {
      data.append(name, new Blob([value.content]), value.filename);
    }
  }
  return data;
}

describe("POST /upload", () => {
  let ctx: TestContext;

  const upload = (body: FormData) => ctx.app.request("/upload", { method: "POST", body });

  beforeEach(async () => {
    metrics.reset();
    ctx = await setup();
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  describe("URL targets", () => {
    it("should create an entry under a generated code", async () => {
      const res = await upload(form({ url: "https://example.com/page" }));

      expect(res.status).toBe(201);
      const body = await res.json();
      expect(body).toEqual({
        code: expect.stringMatching(/^[A-Za-z0-9]{6}$/),
        shortUrl: expect.stringMatching(/^http:\/\/short\.test\/[A-Za-z0-9]{6}$/),
        target: "https://example.com/page",
        expiresIn: TTL,
      });
      expect(ctx.store.size).toBe(1);
    });

    it("should use a custom code as given", async () => {
      const res = await upload(form({ url: "https://example.com", code: "  Ninja  " }));

      expect(await res.json()).toEqual({
        code: "Ninja",
        shortUrl: `${BASE_URL}/Ninja`,
        target: "https://example.com",
        expiresIn: TTL,
      });
      expect(await ctx.store.get("Ninja")).toEqual({
        code: "Ninja",
        target: "https://example.com",
        createdAt: T0,
        hits: 0,
      });
    });

    it("should overwrite an existing custom code and reset its hits", async () => {
      await upload(form({ url: "https://example.com/old", code: "Ninja" }));
      await ctx.app.request("/Ninja");
      ctx.clock.set(T0 + 30);

      const res = await upload(form({ url: "https://example.com/new", code: "Ninja" }));

      expect(res.status).toBe(201);
      expect(await ctx.store.get("Ninja")).toEqual({
        code: "Ninja",
        target: "https://example.com/new",
        createdAt: T0 + 30,
        hits: 0,
      });
    });

    it("should reject a malformed URL", async () => {
      const res = await upload(form({ url: "not a url" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid URL" });
      expect(ctx.store.size).toBe(0);
    });

    it("should reject non-http schemes", async () => {
      const res = await upload(form({ url: "ftp://files.example.com/a" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "URL must use http or https" });
    });
  });

  describe("field rules", () => {
    it("should reject a URL and a file together", async () => {
      const res = await upload(
        form({ url: "https://example.com", file: { content: "x", filename: "a.txt" } })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: UPLOAD_ERRORS.BOTH });
    });

    it("should reject an empty submission", async () => {
      const res = await upload(form({ url: "   ", code: "Ninja" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: UPLOAD_ERRORS.NEITHER });
      expect(ctx.store.size).toBe(0);
    });

    it("should reject reserved codes", async () => {
      const res = await upload(form({ url: "https://example.com", code: "Admin" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Custom code is reserved" });
    });

    it("should reject codes that cannot be a single path segment", async () => {
      const res = await upload(form({ url: "https://example.com", code: "a/b" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Custom code may only contain letters, digits and . _ ~ -",
      });
    });

    it("should reject bodies over the size cap", async () => {
      const body = `url=https://example.com/${"a".repeat(2000)}`;

      const res = await ctx.app.request("/upload", {
        method: "POST",
        body,
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          "Content-Length": String(body.length),
        },
      });

      expect(res.status).toBe(413);
      expect(ctx.store.size).toBe(0);
    });

    it("should count accepted and rejected uploads", async () => {
      await upload(form({ url: "https://example.com" }));
      await upload(form({ url: "" }));

      const lines = (await (await ctx.app.request("/metrics")).text()).split("\n");
      expect(lines).toContain('ttlink_upload_total{kind="url"} 1');
      expect(lines).toContain("ttlink_upload_rejected_total 1");
    });
  });

  describe("file targets", () => {
    it("should store the file and point the entry at it", async () => {
      const res = await upload(form({ file: { content: "hello", filename: "My Notes.txt" }, code: "notes" }));

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        code: "notes",
        shortUrl: `${BASE_URL}/notes`,
        target: "/uploads/1000_My_Notes.txt",
        expiresIn: TTL,
      });
      expect(await readFile(path.join(ctx.uploadDir, "1000_My_Notes.txt"), "utf8")).toBe("hello");
    });

    it("should download what was uploaded", async () => {
      await upload(form({ file: { content: "hello", filename: "notes.txt" }, code: "notes" }));

      const res = await ctx.app.request("/notes");

      expect(res.status).toBe(200);
      expect(res.headers.get("content-disposition")).toBe('attachment; filename="1000_notes.txt"');
      expect(await res.text()).toBe("hello");
    });

    it("should be gone from disk and lookup after the reaper runs", async () => {
      await upload(form({ file: { content: "hello", filename: "notes.txt" }, code: "notes" }));
      const filePath = path.join(ctx.uploadDir, "1000_notes.txt");
      ctx.clock.set(T0 + TTL + 1);

      expect((await ctx.app.request("/notes")).status).toBe(410);

      const reaper = new Reaper({
        store: ctx.store,
        artifacts: ctx.artifacts,
        ttl: TTL,
        clock: ctx.clock,
        logger: ctx.deps.logger,
      });
      const result = await reaper.sweep();

      expect(result).toMatchObject({ deleted: 1, artifactsRemoved: 1 });
      expect(existsSync(filePath)).toBe(false);
      expect((await ctx.app.request("/notes")).status).toBe(404);
    });

    it("should delete the saved file when the store write fails", async () => {
      jest.spyOn(ctx.store, "createOrReplace").mockRejectedValueOnce(new StoreError("write failed"));

      const res = await upload(form({ file: { content: "hello", filename: "notes.txt" }, code: "notes" }));

      expect(res.status).toBe(500);
      expect(await readdir(ctx.uploadDir)).toEqual([]);
      expect(ctx.store.size).toBe(0);

      const lines = (await (await ctx.app.request("/metrics")).text()).split("\n");
      expect(lines).toContain('ttlink_upload_total{kind="file"} 0');
    });

    it("should delete the old file when a URL replaces it", async () => {
      await upload(form({ file: { content: "hello", filename: "notes.txt" }, code: "x" }));

      const res = await upload(form({ url: "https://example.com", code: "x" }));

      expect(res.status).toBe(201);
      expect(await readdir(ctx.uploadDir)).toEqual([]);
      expect((await ctx.store.get("x"))?.target).toBe("https://example.com");
    });

    it("should keep only the newest file when a file replaces a file", async () => {
      await upload(form({ file: { content: "one", filename: "a.txt" }, code: "x" }));
      ctx.clock.set(T0 + 10);

      await upload(form({ file: { content: "two", filename: "b.txt" }, code: "x" }));

      expect(await readdir(ctx.uploadDir)).toEqual(["1010_b.txt"]);
      expect((await ctx.store.get("x"))?.target).toBe("/uploads/1010_b.txt");
    });
  });
});
