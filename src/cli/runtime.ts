/**
 * Config and database setup shared by commands
 */

import { findAndLoadConfig } from "../config/loader";
import { DatabaseDumpExecutor } from "../core/backup/dump-executor";
import { initDatabase } from "../db";
import type { BackhaulConfig } from "../types";
import { createCredentialCipher } from "../utils/crypto";
import { setLogLevel } from "../utils/logger";

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

export const COMMON_OPTIONS = {
  config: { type: "string", short: "c" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

/**
 * Load config, apply the log level and open the database
 */
export async function loadRuntime(options: CommonOptions): Promise<BackhaulConfig> {
  const config = await findAndLoadConfig(options.config);
  setLogLevel(options.verbose ? "debug" : config.logging.level);
  await initDatabase(config.database.path);
  return config;
}

export function createExecutor(config: BackhaulConfig): DatabaseDumpExecutor {
  return new DatabaseDumpExecutor({
    tools: config.tools,
    tempDir: config.scheduler.tempDir,
    backupNamespace: config.scheduler.backupNamespace,
    cipher: createCredentialCipher(config.security.encryptionKey),
  });
}

/**
 * Parse a positive integer id from a positional argument
 */
export function parseId(value: string | undefined, label: string): number {
  const id = value !== undefined && /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new Error(`${label} must be a positive integer, got: ${value ?? "(missing)"}`);
  }
  return id;
}
