import { afterEach, describe, expect, test } from "vitest";
import {
  CredentialCipher,
  createCredentialCipher,
  ENCRYPTION_KEY_ENV,
  generateEncryptionKey,
  parseEncryptionKey,
} from "../../src/utils/crypto";
import { DecryptionError } from "../../src/utils/errors";

const TEST_KEY = Buffer.alloc(32, 7).toString("base64");

describe("crypto", () => {
  describe("parseEncryptionKey", () => {
    test("accepts a 32 byte key", () => {
      expect(parseEncryptionKey(TEST_KEY)).toHaveLength(32);
    });

    test("rejects a key of the wrong length", () => {
      const shortKey = Buffer.alloc(16, 1).toString("base64");
      expect(() => parseEncryptionKey(shortKey)).toThrow(DecryptionError);
    });
  });

  describe("generateEncryptionKey", () => {
    test("produces usable distinct keys", () => {
      const a = generateEncryptionKey();
      const b = generateEncryptionKey();

      expect(a).not.toBe(b);
      expect(parseEncryptionKey(a)).toHaveLength(32);
    });
  });

  describe("CredentialCipher", () => {
    test("decrypts what it encrypted", () => {
      const cipher = new CredentialCipher(TEST_KEY);
      const encrypted = cipher.encrypt("test-secret");

      expect(encrypted.startsWith("v1:")).toBe(true);
      expect(encrypted).not.toContain("test-secret");
      expect(cipher.decrypt(encrypted)).toBe("test-secret");
    });

    test("uses a fresh IV for every encryption", () => {
      const cipher = new CredentialCipher(TEST_KEY);
      expect(cipher.encrypt("test-secret")).not.toBe(cipher.encrypt("test-secret"));
    });

    test("fails with another key", () => {
      const encrypted = new CredentialCipher(TEST_KEY).encrypt("test-secret");
      const other = new CredentialCipher(Buffer.alloc(32, 9));

      expect(() => other.decrypt(encrypted)).toThrow(DecryptionError);
    });

    test("rejects values without the format prefix", () => {
      const cipher = new CredentialCipher(TEST_KEY);
      expect(() => cipher.decrypt("plaintext")).toThrow("Unsupported credential format");
    });

    test("rejects truncated values", () => {
      const cipher = new CredentialCipher(TEST_KEY);
      expect(() => cipher.decrypt("v1:AAAA")).toThrow("Encrypted credential is truncated");
    });

    test("detects tampering", () => {
      const cipher = new CredentialCipher(TEST_KEY);
      const encrypted = cipher.encrypt("test-secret");
      const blob = Buffer.from(encrypted.slice(3), "base64");
      blob[blob.length - 1] = (blob[blob.length - 1] ?? 0) ^ 0xff;

      expect(() => cipher.decrypt(`v1:${blob.toString("base64")}`)).toThrow(DecryptionError);
    });
  });

  describe("createCredentialCipher", () => {
    const original = process.env[ENCRYPTION_KEY_ENV];

    afterEach(() => {
      if (original === undefined) {
        delete process.env[ENCRYPTION_KEY_ENV];
      } else {
        process.env[ENCRYPTION_KEY_ENV] = original;
      }
    });

    test("prefers the configured key", () => {
      process.env[ENCRYPTION_KEY_ENV] = Buffer.alloc(32, 1).toString("base64");
      const encrypted = new CredentialCipher(TEST_KEY).encrypt("test-secret");

      expect(createCredentialCipher(TEST_KEY).decrypt(encrypted)).toBe("test-secret");
    });

    test("falls back to the environment", () => {
      process.env[ENCRYPTION_KEY_ENV] = TEST_KEY;
      const encrypted = new CredentialCipher(TEST_KEY).encrypt("test-secret");

      expect(createCredentialCipher(undefined).decrypt(encrypted)).toBe("test-secret");
    });

    test("throws when no key is available", () => {
      delete process.env[ENCRYPTION_KEY_ENV];
      expect(() => createCredentialCipher(undefined)).toThrow(DecryptionError);
    });
  });
});
