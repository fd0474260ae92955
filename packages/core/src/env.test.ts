import { afterEach, describe, it, expect, vi } from "vitest";
import { ValidationError } from "./errors.js";
import {
  createEnvConfig,
  getEnv,
  getEnvArray,
  getEnvMode,
  getEnvNumber,
  requireEnv,
} from "./env.js";

describe("@keyturn/core - Environment", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should treat an empty variable as unset", () => {
    vi.stubEnv("KEYTURN_ISSUER", "");
    expect(getEnv("KEYTURN_ISSUER", "keyturn")).toBe("keyturn");

    vi.stubEnv("KEYTURN_ISSUER", "auth.test");
    expect(getEnv("KEYTURN_ISSUER", "keyturn")).toBe("auth.test");
  });

  it("should name the missing variable", () => {
    vi.stubEnv("KEYTURN_SECRET", "");
    expect(() => requireEnv("KEYTURN_SECRET")).toThrow(
      'Required environment variable "KEYTURN_SECRET" is not set'
    );
  });

  it("should reject a number that does not parse", () => {
    vi.stubEnv("KEYTURN_STORAGE_TIMEOUT_MS", "2500");
    expect(getEnvNumber("KEYTURN_STORAGE_TIMEOUT_MS")).toBe(2500);

    vi.stubEnv("KEYTURN_STORAGE_TIMEOUT_MS", "soon");
    expect(() => getEnvNumber("KEYTURN_STORAGE_TIMEOUT_MS", 5000)).toThrow(
      'Environment variable "KEYTURN_STORAGE_TIMEOUT_MS" must be a number'
    );
  });

  it("should split comma-separated lists", () => {
    vi.stubEnv("KEYTURN_PREVIOUS_SECRETS", " first , ,second");
    expect(getEnvArray("KEYTURN_PREVIOUS_SECRETS")).toEqual(["first", "second"]);
  });

  it("should read unknown modes as development", () => {
    vi.stubEnv("NODE_ENV", "production");
    expect(getEnvMode()).toBe("production");

    vi.stubEnv("NODE_ENV", "staging");
    expect(getEnvMode()).toBe("development");
  });

  describe("createEnvConfig", () => {
    it("should apply types and defaults", () => {
      vi.stubEnv("KEYTURN_SECRET", "test-secret");
      vi.stubEnv("KEYTURN_STORAGE_TIMEOUT_MS", "");
      vi.stubEnv("KEYTURN_PREVIOUS_SECRETS", "old-1,old-2");

      const env = createEnvConfig({
        KEYTURN_SECRET: { required: true },
        KEYTURN_STORAGE_TIMEOUT_MS: { type: "number", default: 5000 },
        KEYTURN_PREVIOUS_SECRETS: { type: "array" },
      });

      expect(env).toEqual({
        KEYTURN_SECRET: "test-secret",
        KEYTURN_STORAGE_TIMEOUT_MS: 5000,
        KEYTURN_PREVIOUS_SECRETS: ["old-1", "old-2"],
      });
    });

    it("should report every missing variable together", () => {
      vi.stubEnv("KEYTURN_SECRET", "");
      vi.stubEnv("REDIS_URL", "");

      let caught: unknown;
      try {
        createEnvConfig({
          KEYTURN_SECRET: { required: true },
          REDIS_URL: { required: true },
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (!(caught instanceof ValidationError)) return;
      expect(caught.message).toBe(
        "Required environment variables are not set: KEYTURN_SECRET, REDIS_URL"
      );
      expect(caught.errors).toEqual([
        { field: "KEYTURN_SECRET", message: "is not set" },
        { field: "REDIS_URL", message: "is not set" },
      ]);
    });
  });
});
