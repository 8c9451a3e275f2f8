import { describe, it, expect } from "vitest";
import { deriveKey, generateSalt, hashPassword, verifyPassword } from "./key-derivation.js";

describe("Key Derivation", () => {
  describe("deriveKey", () => {
    it("produces a key of the requested length", async () => {
      const key = await deriveKey("password", Buffer.from("salt"), 1, 32);
      expect(key).toHaveLength(32);
    });

    it("produces consistent output for same inputs", async () => {
      const key1 = await deriveKey("password", Buffer.from("salt"), 1);
      const key2 = await deriveKey("password", Buffer.from("salt"), 1);
      expect(key1.equals(key2)).toBe(true);
    });

    it("produces different output for different salts", async () => {
      const key1 = await deriveKey("password", Buffer.from("salt1"), 1);
      const key2 = await deriveKey("password", Buffer.from("salt2"), 1);
      expect(key1.equals(key2)).toBe(false);
    });
  });

  describe("generateSalt", () => {
    it("produces 16 random bytes as hex by default", () => {
      expect(generateSalt()).toMatch(/^[0-9a-f]{32}$/);
      expect(generateSalt()).not.toBe(generateSalt());
    });
  });

  describe("hashPassword / verifyPassword", () => {
    it("formats the hash as pbkdf2$iterations$salt$hash", async () => {
      const stored = await hashPassword("test-password", 1000);
      expect(stored).toMatch(/^pbkdf2\$1000\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
    });

    it("accepts the right password", async () => {
      const stored = await hashPassword("test-password", 1000);
      await expect(verifyPassword("test-password", stored)).resolves.toBe(true);
    });

    it("rejects a wrong password", async () => {
      const stored = await hashPassword("test-password", 1000);
      await expect(verifyPassword("wrong-password", stored)).resolves.toBe(false);
    });

    it("rejects malformed stored values", async () => {
      await expect(verifyPassword("x", "plaintext")).resolves.toBe(false);
      await expect(verifyPassword("x", "bcrypt$10$aa$bb")).resolves.toBe(false);
      await expect(verifyPassword("x", "pbkdf2$zero$aa$bb")).resolves.toBe(false);
      await expect(verifyPassword("x", "pbkdf2$10$aa$")).resolves.toBe(false);
    });
  });
});
