import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { StorageError } from "@keyturn/core";
import { MemoryStorage, createMemoryStorage } from "./memory.js";

describe("@keyturn/auth - MemoryStorage", () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  describe("basic operations", () => {
    it("should set and get a value", async () => {
      await storage.set("key1", "value1");
      expect(await storage.get("key1")).toBe("value1");
    });

    it("should return null for non-existent key", async () => {
      expect(await storage.get("nonexistent")).toBeNull();
    });

    it("should delete a value", async () => {
      await storage.set("key1", "value1");
      await storage.delete("key1");
      expect(await storage.get("key1")).toBeNull();
    });

    it("should ignore deletes of missing keys", async () => {
      await expect(storage.delete("missing")).resolves.toBeUndefined();
    });

    it("should check if key exists", async () => {
      await storage.set("key1", "value1");
      expect(await storage.has("key1")).toBe(true);
      expect(await storage.has("nonexistent")).toBe(false);
    });
  });

  describe("TTL (Time To Live)", () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-03-01T12:00:00.000Z"));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should expire value after TTL", async () => {
      await storage.set("expiring", "value", 1);
      expect(await storage.get("expiring")).toBe("value");

      vi.advanceTimersByTime(999);
      expect(await storage.get("expiring")).toBe("value");

      vi.advanceTimersByTime(1);
      expect(await storage.get("expiring")).toBeNull();
      expect(await storage.has("expiring")).toBe(false);
    });

    it("should not expire value without TTL", async () => {
      await storage.set("permanent", "value");
      vi.advanceTimersByTime(365 * 24 * 60 * 60 * 1000);
      expect(await storage.get("permanent")).toBe("value");
    });
  });

  describe("compareAndSwap", () => {
    it("should write when the stored value matches", async () => {
      await storage.set("slot", "old");
      expect(await storage.compareAndSwap("slot", "old", "new")).toBe(true);
      expect(await storage.get("slot")).toBe("new");
    });

    it("should refuse when the stored value differs", async () => {
      await storage.set("slot", "other");
      expect(await storage.compareAndSwap("slot", "old", "new")).toBe(false);
      expect(await storage.get("slot")).toBe("other");
    });

    it("should refuse when the key is missing", async () => {
      expect(await storage.compareAndSwap("slot", "old", "new")).toBe(false);
      expect(await storage.get("slot")).toBeNull();
    });

    it("should let exactly one of two concurrent swaps win", async () => {
      await storage.set("slot", "old");
      const results = await Promise.all([
        storage.compareAndSwap("slot", "old", "a"),
        storage.compareAndSwap("slot", "old", "b"),
      ]);
      expect(results.filter(Boolean)).toHaveLength(1);
      expect(await storage.get("slot")).toBe(results[0] ? "a" : "b");
    });

    it("should apply the new TTL", async () => {
      vi.useFakeTimers();
      try {
        await storage.set("slot", "old");
        await storage.compareAndSwap("slot", "old", "new", 10);
        vi.advanceTimersByTime(10_000);
        expect(await storage.get("slot")).toBeNull();
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe("prefix", () => {
    it("should isolate keys with different prefixes", async () => {
      const storage1 = new MemoryStorage({ prefix: "app1" });
      const storage2 = new MemoryStorage({ prefix: "app2" });

      await storage1.set("key", "value1");
      await storage2.set("key", "value2");

      expect(await storage1.get("key")).toBe("value1");
      expect(await storage2.get("key")).toBe("value2");
    });
  });

  describe("clear", () => {
    it("should clear all values", async () => {
      await storage.set("a", "1");
      await storage.set("b", "2");

      await storage.clear();

      expect(await storage.get("a")).toBeNull();
      expect(storage.size).toBe(0);
    });
  });

  describe("capacity", () => {
    it("should refuse new keys when full of live entries", async () => {
      const small = new MemoryStorage({ maxSize: 2 });
      await small.set("revoked:a", "1");
      await small.set("revoked:b", "2");

      await expect(small.set("revoked:c", "3")).rejects.toThrow(
        "Memory storage is full (2 entries)"
      );
      await expect(small.set("revoked:c", "3")).rejects.toBeInstanceOf(StorageError);
      expect(await small.get("revoked:a")).toBe("1");
    });

    it("should hold 10000 live entries by default", async () => {
      const store = new MemoryStorage();
      for (let i = 0; i < 10000; i++) {
        await store.set(`revoked:${i}`, "1", 60);
      }

      await expect(store.set("session:u-1", "rt-1")).rejects.toBeInstanceOf(StorageError);
      expect(store.size).toBe(10000);
    });

    it("should still overwrite existing keys when full", async () => {
      const small = new MemoryStorage({ maxSize: 2 });
      await small.set("session:u-1", "rt-1");
      await small.set("session:u-2", "rt-2");

      expect(await small.compareAndSwap("session:u-1", "rt-1", "rt-3")).toBe(true);
      expect(await small.get("session:u-1")).toBe("rt-3");
    });

    it("should make room by purging expired entries", async () => {
      vi.useFakeTimers();
      try {
        const small = new MemoryStorage({ maxSize: 2 });
        await small.set("revoked:a", "1", 1);
        await small.set("revoked:b", "2");
        vi.advanceTimersByTime(1000);

        await small.set("revoked:c", "3");

        expect(small.size).toBe(2);
        expect(await small.get("revoked:b")).toBe("2");
        expect(await small.get("revoked:c")).toBe("3");
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe("createMemoryStorage", () => {
    it("should create a storage instance", async () => {
      const created = createMemoryStorage({ prefix: "auth" });
      await created.set("k", "v");
      expect(await created.get("k")).toBe("v");
    });
  });
});
