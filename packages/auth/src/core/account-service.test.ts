import { describe, it, expect, beforeEach } from "vitest";
import { createLogger, DuplicateError, StorageError } from "@keyturn/core";
import { MemoryUserRepository } from "../users/memory.js";
import type { PasswordHasher } from "../utils/password.js";
import { AccountService } from "./account-service.js";

const fakeHasher: PasswordHasher = {
  hash: async (plain) => `hashed:${plain}`,
  matches: async (plain, hash) => hash === `hashed:${plain}`,
};

const silent = createLogger({ level: "SILENT" });

describe("@keyturn/auth - AccountService", () => {
  let users: MemoryUserRepository;
  let accounts: AccountService;

  beforeEach(() => {
    users = new MemoryUserRepository();
    accounts = new AccountService({ users, passwordHasher: fakeHasher, logger: silent });
  });

  describe("register", () => {
    it("should create the user and return it without the hash", async () => {
      const result = await accounts.register({
        email: "Ada@Example.com",
        password: "correct-horse",
        name: "Ada",
        weight: 61.5,
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.user).toMatchObject({
        email: "ada@example.com",
        name: "Ada",
        weight: 61.5,
        dailyCaffeineLimit: null,
      });
      expect(result.user).not.toHaveProperty("passwordHash");

      const stored = await users.findById(result.user.id);
      expect(stored?.passwordHash).toBe("hashed:correct-horse");
    });

    it("should reject a taken email without creating a record", async () => {
      await accounts.register({ email: "ada@example.com", password: "correct-horse", name: "Ada" });

      const result = await accounts.register({
        email: "ADA@example.com",
        password: "other-password",
        name: "Imposter",
      });

      expect(result).toEqual({
        success: false,
        error: "Email is already registered",
        errorCode: "DUPLICATE_EMAIL",
      });
      expect(users.size).toBe(1);
    });

    it("should map a duplicate raised by the store", async () => {
      users.existsByEmail = async () => false;
      users.create = async () => {
        throw new DuplicateError("User", "email");
      };

      const result = await accounts.register({
        email: "ada@example.com",
        password: "correct-horse",
        name: "Ada",
      });

      expect(result).toMatchObject({ success: false, errorCode: "DUPLICATE_EMAIL" });
    });

    it("should map store faults to STORAGE_ERROR", async () => {
      users.existsByEmail = async () => {
        throw new StorageError("connection reset");
      };

      const result = await accounts.register({
        email: "ada@example.com",
        password: "correct-horse",
        name: "Ada",
      });

      expect(result).toEqual({
        success: false,
        error: "Storage unavailable",
        errorCode: "STORAGE_ERROR",
      });
    });
  });

  describe("getUserInfo", () => {
    it("should return the public user", async () => {
      const user = await users.create({ email: "ada@example.com", passwordHash: "h", name: "Ada" });

      const result = await accounts.getUserInfo(user.id);

      expect(result).toEqual({
        success: true,
        user: {
          id: user.id,
          email: "ada@example.com",
          name: "Ada",
          weight: null,
          dailyCaffeineLimit: null,
          createdAt: user.createdAt.toISOString(),
          updatedAt: user.updatedAt.toISOString(),
        },
      });
    });

    it("should report unknown identities", async () => {
      expect(await accounts.getUserInfo("missing")).toEqual({
        success: false,
        error: "User not found",
        errorCode: "USER_NOT_FOUND",
      });
    });
  });

  describe("editUserInfo", () => {
    it("should update only the present fields", async () => {
      const user = await users.create({
        email: "ada@example.com",
        passwordHash: "h",
        name: "Ada",
        weight: 60,
      });

      const result = await accounts.editUserInfo(user.id, { dailyCaffeineLimit: 300 });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.user).toMatchObject({ name: "Ada", weight: 60, dailyCaffeineLimit: 300 });
    });

    it("should accept the caller's own email", async () => {
      const user = await users.create({ email: "ada@example.com", passwordHash: "h", name: "Ada" });

      const result = await accounts.editUserInfo(user.id, { email: "ada@example.com", name: "Ada L." });

      expect(result).toMatchObject({ success: true, user: { email: "ada@example.com", name: "Ada L." } });
    });

    it("should reject an email owned by another identity", async () => {
      await users.create({ email: "grace@example.com", passwordHash: "h", name: "Grace" });
      const ada = await users.create({ email: "ada@example.com", passwordHash: "h", name: "Ada" });

      const result = await accounts.editUserInfo(ada.id, { email: "Grace@example.com" });

      expect(result).toEqual({
        success: false,
        error: "Email is already registered",
        errorCode: "DUPLICATE_EMAIL",
      });
      expect((await users.findById(ada.id))?.email).toBe("ada@example.com");
    });

    it("should report unknown identities", async () => {
      expect(await accounts.editUserInfo("missing", { name: "x" })).toMatchObject({
        errorCode: "USER_NOT_FOUND",
      });
    });
  });
});
