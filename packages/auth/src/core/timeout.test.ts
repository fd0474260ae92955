import { describe, it, expect, vi, afterEach } from "vitest";
import { StorageError } from "@keyturn/core";
import { withTimeout, StorageTimeoutError, DEFAULT_STORAGE_TIMEOUT_MS } from "./timeout.js";

describe("@keyturn/auth - withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve with the function result", async () => {
    await expect(withTimeout(async () => "ok", 100)).resolves.toBe("ok");
  });

  it("should pass rejections through", async () => {
    const error = new Error("boom");
    await expect(withTimeout(() => Promise.reject(error), 100)).rejects.toBe(error);
  });

  it("should reject with a StorageError after the timeout", async () => {
    vi.useFakeTimers();

    const pending = withTimeout(() => new Promise<string>(() => {}), 250, "Token lookup");
    const assertion = expect(pending).rejects.toThrow("Token lookup timed out after 250ms");

    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });

  it("should use the default timeout", async () => {
    vi.useFakeTimers();

    const pending = withTimeout(() => new Promise<string>(() => {}));
    const assertion = expect(pending).rejects.toBeInstanceOf(StorageTimeoutError);

    await vi.advanceTimersByTimeAsync(DEFAULT_STORAGE_TIMEOUT_MS);
    await assertion;
  });

  it("should map to STORAGE_ERROR", () => {
    const error = new StorageTimeoutError(100, "Storage call");
    expect(error).toBeInstanceOf(StorageError);
    expect(error.code).toBe("STORAGE_ERROR");
    expect(error.statusCode).toBe(503);
    expect(error.timeout).toBe(100);
  });
});
