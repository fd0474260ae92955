import { describe, it, expect } from "vitest";
import { createStorage, MemoryStorage, RedisStorage, StorageKeys } from "./index.js";
import type { KVStorage, RedisClient } from "./types.js";

const noopRedis: RedisClient = {
  get: async () => null,
  set: async () => "OK",
  del: async () => 0,
  eval: async () => 0,
  quit: async () => "OK",
};

describe("@keyturn/auth - createStorage", () => {
  it("should default to memory", async () => {
    expect(await createStorage()).toBeInstanceOf(MemoryStorage);
  });

  it("should pass the memory capacity through", async () => {
    const storage = await createStorage({ memory: { maxSize: 1 } });
    await storage.set("session:u-1", "rt-1");

    await expect(storage.set("session:u-2", "rt-2")).rejects.toThrow(
      "Memory storage is full (1 entries)"
    );
  });

  it("should pick redis when configured", async () => {
    expect(await createStorage({ redis: { client: noopRedis } })).toBeInstanceOf(RedisStorage);
  });

  it("should return a custom adapter as is", async () => {
    const custom: KVStorage = new MemoryStorage({ prefix: "custom" });
    expect(await createStorage({ type: "custom", custom })).toBe(custom);
  });

  it("should reject redis without configuration", async () => {
    await expect(createStorage({ type: "redis" })).rejects.toThrow(
      "Redis storage requires redis configuration (url or client)"
    );
  });

  it("should build storage keys", () => {
    expect(StorageKeys.session("u-1")).toBe("session:u-1");
    expect(StorageKeys.revoked("ab12")).toBe("revoked:ab12");
  });
});
