import { describe, it, expect } from "vitest";
import { hashPassword, verifyPassword, Pbkdf2PasswordHasher } from "./password.js";

// Low iteration count keeps the suite fast; the format is the same.
const ITERATIONS = 1000;

describe("@keyturn/auth - PBKDF2 passwords", () => {
  it("should encode 16 bytes of salt and 32 of key as base64", async () => {
    const hash = await hashPassword("correct-horse", ITERATIONS);

    expect(hash).toMatch(/^[A-Za-z0-9+/]+={0,2}$/);
    expect(atob(hash)).toHaveLength(48);
  });

  it("should salt every hash", async () => {
    const first = await hashPassword("correct-horse", ITERATIONS);
    const second = await hashPassword("correct-horse", ITERATIONS);

    expect(first).not.toBe(second);
    expect(await verifyPassword("correct-horse", first, ITERATIONS)).toBe(true);
    expect(await verifyPassword("correct-horse", second, ITERATIONS)).toBe(true);
  });

  it("should reject other passwords, case included", async () => {
    const hash = await hashPassword("Correct-Horse", ITERATIONS);

    expect(await verifyPassword("correct-horse", hash, ITERATIONS)).toBe(false);
    expect(await verifyPassword("", hash, ITERATIONS)).toBe(false);
  });

  it("should not match under a different iteration count", async () => {
    const hash = await hashPassword("correct-horse", ITERATIONS);

    expect(await verifyPassword("correct-horse", hash, ITERATIONS + 1)).toBe(false);
  });

  it("should never match a malformed stored hash", async () => {
    expect(await verifyPassword("correct-horse", "not base64!", ITERATIONS)).toBe(false);
    // Valid base64 of the wrong length
    expect(await verifyPassword("correct-horse", "YWJjZGVm", ITERATIONS)).toBe(false);
  });

  it("should accept non-ASCII passwords", async () => {
    const password = "pässwörd-ключ-鍵";
    const hash = await hashPassword(password, ITERATIONS);

    expect(await verifyPassword(password, hash, ITERATIONS)).toBe(true);
  });

  describe("Pbkdf2PasswordHasher", () => {
    it("should verify what it hashed", async () => {
      const hasher = new Pbkdf2PasswordHasher({ iterations: ITERATIONS });
      const hash = await hasher.hash("correct-horse");

      expect(await hasher.matches("correct-horse", hash)).toBe(true);
      expect(await hasher.matches("wrong-horse", hash)).toBe(false);
    });

    it("should default to 100k iterations", async () => {
      const hash = await new Pbkdf2PasswordHasher().hash("correct-horse");

      expect(await verifyPassword("correct-horse", hash)).toBe(true);
      expect(await verifyPassword("correct-horse", hash, ITERATIONS)).toBe(false);
    });
  });
});
