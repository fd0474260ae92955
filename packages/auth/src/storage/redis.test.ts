import { describe, it, expect, beforeEach, vi } from "vitest";
import { StorageError } from "@keyturn/core";
import { RedisStorage, createRedisStorage, COMPARE_AND_SWAP_SCRIPT } from "./redis.js";
import type { RedisClient } from "./types.js";

/**
 * In-process stand-in for the ioredis client.
 * `eval` understands only the compare-and-swap script.
 */
class FakeRedisClient implements RedisClient {
  readonly data = new Map<string, { value: string; ttl: number | null }>();
  failWith: Error | null = null;

  private check(): void {
    if (this.failWith) throw this.failWith;
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.data.get(key)?.value ?? null;
  }

  async set(key: string, value: string, mode?: "EX", seconds?: number): Promise<unknown> {
    this.check();
    this.data.set(key, { value, ttl: mode === "EX" && seconds !== undefined ? seconds : null });
    return "OK";
  }

  async del(key: string): Promise<number> {
    this.check();
    return this.data.delete(key) ? 1 : 0;
  }

  async eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown> {
    this.check();
    if (script !== COMPARE_AND_SWAP_SCRIPT || numKeys !== 1) {
      throw new Error("ERR unknown script");
    }
    const [key, expected, next, ttl] = args.map(String);
    if (key === undefined || next === undefined) throw new Error("ERR wrong number of arguments");
    if (this.data.get(key)?.value !== expected) return 0;
    const seconds = Number(ttl);
    this.data.set(key, { value: next, ttl: seconds > 0 ? seconds : null });
    return 1;
  }

  async quit(): Promise<unknown> {
    return "OK";
  }
}

describe("@keyturn/auth - RedisStorage", () => {
  let client: FakeRedisClient;
  let storage: RedisStorage;

  beforeEach(() => {
    client = new FakeRedisClient();
    storage = new RedisStorage(client, "keyturn");
  });

  it("should prefix keys", async () => {
    await storage.set("session:u-1", "rt");
    expect(client.data.get("keyturn:session:u-1")).toEqual({ value: "rt", ttl: null });
    expect(await storage.get("session:u-1")).toBe("rt");
  });

  it("should pass TTL as EX seconds", async () => {
    await storage.set("revoked:abc", "{}", 90);
    expect(client.data.get("keyturn:revoked:abc")).toEqual({ value: "{}", ttl: 90 });
  });

  it("should delete and report presence", async () => {
    await storage.set("k", "v");
    expect(await storage.has("k")).toBe(true);
    await storage.delete("k");
    expect(await storage.has("k")).toBe(false);
  });

  describe("compareAndSwap", () => {
    it("should send the script with key and arguments", async () => {
      const evalSpy = vi.spyOn(client, "eval");
      await storage.set("slot", "old");

      expect(await storage.compareAndSwap("slot", "old", "new", 60)).toBe(true);
      expect(evalSpy).toHaveBeenCalledWith(COMPARE_AND_SWAP_SCRIPT, 1, "keyturn:slot", "old", "new", 60);
      expect(client.data.get("keyturn:slot")).toEqual({ value: "new", ttl: 60 });
    });

    it("should pass 0 when no TTL is given", async () => {
      const evalSpy = vi.spyOn(client, "eval");
      await storage.set("slot", "old");

      await storage.compareAndSwap("slot", "old", "new");
      expect(evalSpy).toHaveBeenCalledWith(COMPARE_AND_SWAP_SCRIPT, 1, "keyturn:slot", "old", "new", 0);
    });

    it("should report a lost swap", async () => {
      await storage.set("slot", "current");
      expect(await storage.compareAndSwap("slot", "stale", "new")).toBe(false);
      expect(await storage.get("slot")).toBe("current");
    });
  });

  describe("failures", () => {
    it("should wrap client errors in StorageError", async () => {
      const cause = new Error("Command timed out");
      client.failWith = cause;

      const error = await storage.get("k").catch((err: unknown) => err);
      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({
        message: "Redis GET failed",
        code: "STORAGE_ERROR",
        statusCode: 503,
        cause,
      });
    });

    it("should wrap failed swaps", async () => {
      client.failWith = new Error("ECONNRESET");
      await expect(storage.compareAndSwap("k", "a", "b")).rejects.toThrow("Redis EVAL failed");
    });
  });

  describe("createRedisStorage", () => {
    it("should use a provided client", async () => {
      const created = await createRedisStorage({ client, prefix: "p" });
      await created.set("k", "v");
      expect(client.data.get("p:k")?.value).toBe("v");
    });

    it("should require url or client", async () => {
      await expect(createRedisStorage({})).rejects.toThrow(
        "Redis storage requires either url or client configuration"
      );
    });
  });
});
