import { describe, it, expect } from "vitest";
import {
  generateApiKey,
  generateKeySalt,
  hashApiKey,
  isWellFormedApiKey,
  keyPrefixOf,
  verifyApiKeyHash,
} from "./api-key.js";

describe("API keys", () => {
  describe("generateApiKey", () => {
    it("issues scoped keys as re_ plus 32 base62 characters", () => {
      const { key, prefix } = generateApiKey();
      expect(key).toMatch(/^re_[A-Za-z0-9]{32}$/);
      expect(prefix).toBe(key.slice(0, 11));
    });

    it("issues admin keys with the re_admin_ scheme", () => {
      const { key, prefix } = generateApiKey({ admin: true });
      expect(key).toMatch(/^re_admin_[A-Za-z0-9]{32}$/);
      expect(prefix).toHaveLength(11);
    });

    it("produces unique keys", () => {
      expect(generateApiKey().key).not.toBe(generateApiKey().key);
    });
  });

  describe("isWellFormedApiKey", () => {
    it("requires the re_ scheme and a full prefix", () => {
      expect(isWellFormedApiKey("re_abcdefgh")).toBe(true);
      expect(isWellFormedApiKey("re_abc")).toBe(false);
      expect(isWellFormedApiKey("sk_abcdefghijkl")).toBe(false);
    });
  });

  describe("keyPrefixOf", () => {
    it("takes the first 11 characters", () => {
      expect(keyPrefixOf("re_abcdefghXYZ")).toBe("re_abcdefgh");
    });
  });

  describe("hashing", () => {
    it("hashes key plus salt with SHA-256 as base64", () => {
      // sha256("abc") is ba7816bf...f20015ad
      expect(hashApiKey("ab", "c")).toBe("ungWv48Bz+pBQUDeXa4iI7ADYaOWF3qctBD/YfIAFa0=");
    });

    it("makes a 16-byte base64 salt", () => {
      expect(Buffer.from(generateKeySalt(), "base64")).toHaveLength(16);
    });

    it("verifies the matching key only", () => {
      const salt = generateKeySalt();
      const hash = hashApiKey("re_test_key_value", salt);

      expect(verifyApiKeyHash("re_test_key_value", salt, hash)).toBe(true);
      expect(verifyApiKeyHash("re_other_key_val", salt, hash)).toBe(false);
      expect(verifyApiKeyHash("re_test_key_value", generateKeySalt(), hash)).toBe(false);
    });

    it("rejects a stored hash of the wrong length", () => {
      expect(verifyApiKeyHash("re_x", "salt", "AAAA")).toBe(false);
    });
  });
});
