import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";
import { createReadStream } from "node:fs";
import { DecryptionError } from "./errors";

const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const FORMAT_PREFIX = "v1:";

export const ENCRYPTION_KEY_ENV = "BACKHAUL_ENCRYPTION_KEY";

export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/**
 * Decode and length-check a base64 key
 */
export function parseEncryptionKey(encoded: string): Buffer {
  const key = Buffer.from(encoded.trim(), "base64");
  if (key.length !== KEY_LENGTH) {
    throw new DecryptionError(
      `Encryption key must be ${KEY_LENGTH} bytes after base64 decoding, got ${key.length}`,
    );
  }
  return key;
}

export function generateEncryptionKey(): string {
  return randomBytes(KEY_LENGTH).toString("base64");
}

/**
 * AES-256-GCM for stored database credentials.
 *
 * Ciphertext layout: `v1:` + base64(iv | tag | data).
 */
export class CredentialCipher {
  private readonly key: Buffer;

  constructor(key: Buffer | string) {
    this.key = typeof key === "string" ? parseEncryptionKey(key) : key;
    if (this.key.length !== KEY_LENGTH) {
      throw new DecryptionError(`Encryption key must be ${KEY_LENGTH} bytes`);
    }
  }

  encrypt(plain: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv("aes-256-gcm", this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plain, "utf8"), cipher.final()]);
    const tag = cipher.getAuthTag();
    return FORMAT_PREFIX + Buffer.concat([iv, tag, encrypted]).toString("base64");
  }

  decrypt(ciphertext: string): string {
    if (!ciphertext.startsWith(FORMAT_PREFIX)) {
      throw new DecryptionError("Unsupported credential format");
    }

    const blob = Buffer.from(ciphertext.slice(FORMAT_PREFIX.length), "base64");
    if (blob.length < IV_LENGTH + TAG_LENGTH) {
      throw new DecryptionError("Encrypted credential is truncated");
    }

    const iv = blob.subarray(0, IV_LENGTH);
    const tag = blob.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const content = blob.subarray(IV_LENGTH + TAG_LENGTH);

    try {
      const decipher = createDecipheriv("aes-256-gcm", this.key, iv);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(content), decipher.final()]).toString("utf8");
    } catch {
      throw new DecryptionError("Credential could not be decrypted with the configured key");
    }
  }
}

/**
 * Build a cipher from config, falling back to the environment
 */
export function createCredentialCipher(configuredKey: string | undefined): CredentialCipher {
  const encoded = configuredKey ?? process.env[ENCRYPTION_KEY_ENV];
  if (!encoded) {
    throw new DecryptionError(
      `No encryption key configured. Set security.encryptionKey or ${ENCRYPTION_KEY_ENV}.`,
    );
  }
  return new CredentialCipher(encoded);
}
