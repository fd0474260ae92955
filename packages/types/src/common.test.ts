import { describe, it, expect } from "vitest";
import { type } from "arktype";
import { duration, email, failureResponse, timestamp, uuid } from "./common.js";

const rejects = (result: unknown) => result instanceof type.errors;

describe("@keyturn/types - Common Schemas", () => {
  it("uuid should accept identities issued by the store", () => {
    expect(rejects(uuid("550e8400-e29b-41d4-a716-446655440000"))).toBe(false);
    expect(rejects(uuid("u-1"))).toBe(true);
  });

  it("timestamp should accept ISO strings only", () => {
    expect(rejects(timestamp("2026-01-15T10:30:00.000Z"))).toBe(false);
    expect(rejects(timestamp("yesterday"))).toBe(true);
  });

  it("email should reject incomplete addresses", () => {
    expect(rejects(email("ada@example.com"))).toBe(false);
    expect(rejects(email("ada@"))).toBe(true);
  });

  describe("duration", () => {
    it("should accept every supported unit", () => {
      for (const value of ["30s", "15m", "1h", "14d", "2w"]) {
        expect(rejects(duration(value))).toBe(false);
      }
    });

    it("should reject unknown units, fractions and bare numbers", () => {
      expect(rejects(duration("10y"))).toBe(true);
      expect(rejects(duration("1.5h"))).toBe(true);
      expect(rejects(duration("900"))).toBe(true);
    });
  });

  describe("failureResponse", () => {
    it("should accept a result failure", () => {
      const body = { success: false, error: "Invalid refresh token", errorCode: "REFRESH_INVALID" };
      expect(failureResponse(body)).toEqual(body);
    });

    it("should accept field details", () => {
      const result = failureResponse({
        success: false,
        error: "Validation failed",
        errorCode: "VALIDATION_FAILED",
        details: { email: "must be an email address" },
      });
      expect(rejects(result)).toBe(false);
    });

    it("should reject a success body", () => {
      expect(rejects(failureResponse({ success: true, error: "x", errorCode: "X" }))).toBe(true);
    });
  });
});
