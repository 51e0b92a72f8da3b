/**
 * Memory Mapping Store Tests
 *
 * Contract tests for create/get/increment/expire/delete/list.
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { ManualClock, StoreUnavailableError } from "@ttlink/shared";
import { MemoryMappingStore } from "../src/index.js";

describe("MemoryMappingStore", () => {
  let clock: ManualClock;
  let store: MemoryMappingStore;

  beforeEach(() => {
    clock = new ManualClock(1000);
    store = new MemoryMappingStore(clock);
  });

  describe("createOrReplace", () => {
    it("should insert a new entry with hits 0 and createdAt now", async () => {
      const outcome = await store.createOrReplace("abc123", "https://example.com");

      expect(outcome).toEqual({ outcome: "inserted", replacedTarget: null });
      expect(await store.get("abc123")).toEqual({
        code: "abc123",
        target: "https://example.com",
        createdAt: 1000,
        hits: 0,
      });
    });

    it("should replace an existing entry and reset hits", async () => {
      await store.createOrReplace("abc123", "https://one.example");
      await store.incrementHits("abc123");
      await store.incrementHits("abc123");
      clock.advance(30);

      const outcome = await store.createOrReplace("abc123", "https://two.example");

      expect(outcome).toEqual({ outcome: "replaced", replacedTarget: "https://one.example" });
      expect(await store.get("abc123")).toEqual({
        code: "abc123",
        target: "https://two.example",
        createdAt: 1030,
        hits: 0,
      });
      expect(store.size).toBe(1);
    });

    it("should accept any caller-supplied string as a code", async () => {
      await store.createOrReplace("", "https://empty.example");
      await store.createOrReplace("with space/and?query", "https://odd.example");

      expect((await store.get(""))?.target).toBe("https://empty.example");
      expect((await store.get("with space/and?query"))?.target).toBe("https://odd.example");
    });

    it("should let the last of many concurrent writes win", async () => {
      await Promise.all(
        Array.from({ length: 20 }, (_, i) => store.createOrReplace("race", `https://example.com/${i}`))
      );

      const entry = await store.get("race");
      expect(entry?.target).toBe("https://example.com/19");
      expect(entry?.hits).toBe(0);
      expect(store.size).toBe(1);
    });
  });

  describe("get", () => {
    it("should return null for an unknown code", async () => {
      expect(await store.get("nope")).toBeNull();
    });

    it("should return entries regardless of TTL", async () => {
      await store.createOrReplace("old", "https://example.com");
      clock.advance(10_000);

      expect(await store.get("old")).not.toBeNull();
    });

    it("should return a copy callers cannot mutate", async () => {
      await store.createOrReplace("abc123", "https://example.com");

      const entry = await store.get("abc123");
      if (entry) entry.hits = 99;

      expect((await store.get("abc123"))?.hits).toBe(0);
    });
  });

  describe("incrementHits", () => {
    it("should add one per call", async () => {
      await store.createOrReplace("abc123", "https://example.com");

      expect(await store.incrementHits("abc123")).toBe(true);
      expect(await store.incrementHits("abc123")).toBe(true);

      expect((await store.get("abc123"))?.hits).toBe(2);
    });

    it("should report false for an absent code", async () => {
      expect(await store.incrementHits("missing")).toBe(false);
      expect(store.size).toBe(0);
    });

    it("should not lose concurrent increments", async () => {
      await store.createOrReplace("busy", "https://example.com");
      await store.createOrReplace("other", "https://example.org");

      await Promise.all([
        ...Array.from({ length: 100 }, () => store.incrementHits("busy")),
        ...Array.from({ length: 40 }, () => store.incrementHits("other")),
      ]);

      expect((await store.get("busy"))?.hits).toBe(100);
      expect((await store.get("other"))?.hits).toBe(40);
    });
  });

  describe("findExpired", () => {
    it("should return only entries strictly past the TTL", async () => {
      clock.set(0);
      await store.createOrReplace("t0", "https://a.example");
      clock.set(1);
      await store.createOrReplace("t1", "https://b.example");
      clock.set(2);
      await store.createOrReplace("t2", "https://c.example");

      const expired = await store.findExpired(601, 600);

      expect(expired.map((entry) => entry.code)).toEqual(["t0"]);
    });

    it("should return nothing when all entries are live", async () => {
      await store.createOrReplace("fresh", "https://example.com");

      expect(await store.findExpired(1600, 600)).toEqual([]);
    });
  });

  describe("delete", () => {
    it("should remove the entry", async () => {
      await store.createOrReplace("abc123", "https://example.com");

      expect(await store.delete("abc123")).toBe(true);
      expect(await store.get("abc123")).toBeNull();
    });

    it("should be idempotent", async () => {
      await store.createOrReplace("abc123", "https://example.com");
      await store.delete("abc123");

      await expect(store.delete("abc123")).resolves.toBe(false);
      await expect(store.delete("never-existed")).resolves.toBe(false);
    });
  });

  describe("list", () => {
    beforeEach(async () => {
      clock.set(100);
      await store.createOrReplace("alpha1", "https://alpha.example/docs");
      clock.set(300);
      await store.createOrReplace("beta22", "/uploads/300_report.pdf");
      clock.set(200);
      await store.createOrReplace("gamma3", "https://gamma.example");
    });

    it("should order by createdAt descending", async () => {
      const codes = (await store.list()).map((entry) => entry.code);
      expect(codes).toEqual(["beta22", "gamma3", "alpha1"]);
    });

    it("should filter by substring of code", async () => {
      const codes = (await store.list("ta2")).map((entry) => entry.code);
      expect(codes).toEqual(["beta22"]);
    });

    it("should filter by substring of target", async () => {
      const codes = (await store.list("example")).map((entry) => entry.code);
      expect(codes).toEqual(["gamma3", "alpha1"]);
    });

    it("should match case-sensitively", async () => {
      expect(await store.list("ALPHA")).toEqual([]);
    });

    it("should treat an empty filter as no filter", async () => {
      expect(await store.list("")).toHaveLength(3);
    });
  });

  describe("close", () => {
    it("should fail every operation as unavailable once closed", async () => {
      await store.close();

      expect(await store.ping()).toBe(false);
      await expect(store.get("abc123")).rejects.toThrow(StoreUnavailableError);
      await expect(store.findExpired(0, 600)).rejects.toThrow(StoreUnavailableError);
      await expect(store.createOrReplace("x", "y")).rejects.toThrow(StoreUnavailableError);
    });
  });
});
