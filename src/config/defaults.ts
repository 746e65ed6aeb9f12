/**
 * Default configuration values
 */

import * as os from "node:os";
import * as path from "node:path";
import type { BackhaulConfig } from "../types";
import { ENCRYPTION_KEY_ENV } from "../utils/crypto";

export const WEBHOOK_URL_ENV = "BACKHAUL_WEBHOOK_URL";

export const DEFAULT_CONFIG: Omit<BackhaulConfig, "version"> = {
  // version is intentionally NOT defaulted - it must be specified by the user
  database: {
    path: "./data/backhaul.db",
  },
  security: {},
  scheduler: {
    resyncIntervalSeconds: 300,
    backupNamespace: "backups",
    tempDir: path.join(os.tmpdir(), "backhaul"),
  },
  agents: {
    pollIntervalSeconds: 60,
    requestTimeoutSeconds: 30,
  },
  reports: {
    checkIntervalSeconds: 60,
  },
  storageCheck: {
    intervalSeconds: 86400,
  },
  notifications: {
    enabled: false,
    username: "Backup Server",
    timeoutSeconds: 10,
  },
  tools: {
    dump: "pg_dump",
    restore: "pg_restore",
    sql: "psql",
  },
  logging: {
    level: "info",
  },
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(target: object, source: unknown): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  if (!isPlainObject(source)) {
    return result;
  }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Values taken from the environment. File values take precedence.
 */
export function environmentDefaults(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const encryptionKey = env[ENCRYPTION_KEY_ENV];
  if (encryptionKey) {
    overrides.security = { encryptionKey };
  }

  const webhookUrl = env[WEBHOOK_URL_ENV];
  if (webhookUrl) {
    overrides.notifications = { webhookUrl };
  }

  return overrides;
}
