/**
 * Storage module exports
 */

import type { S3Client } from "@aws-sdk/client-s3";
import { getLegacyObjectConfigById, getStorageConfigById } from "../db/storage-config-repository";
import type { DatabaseTaskRecord, StorageBackend } from "../types";
import { ConfigurationError } from "../utils/errors";
import type { ProcessRunner } from "../utils/process";
import { LocalStorage } from "./local";
import { NfsStorage } from "./nfs";
import { ObjectStorage } from "./object";
import { type NormalizedStorageConfig, normalizeStorageTarget, parseBackendSettings, type StorageTarget } from "./settings";
import { SftpStorage } from "./sftp";

export { FileTree, normalizePrefix } from "./filesystem";
export { DEFAULT_LOCAL_BASE_PATH, LocalStorage } from "./local";
export { DEFAULT_MOUNT_OPTIONS, DEFAULT_MOUNT_POINT, NfsStorage } from "./nfs";
export { buildObjectUri, normalizeEndpoint, ObjectStorage, objectKeyFromUri } from "./object";
export type { NormalizedStorageConfig, StorageTarget } from "./settings";
export { normalizeStorageTarget, parseBackendSettings } from "./settings";
export { DEFAULT_SFTP_PORT, SftpStorage } from "./sftp";

export interface StorageDeps {
  /** Command runner for mount checks */
  run?: ProcessRunner;
  /** Prebuilt client for object storage */
  objectClient?: S3Client;
}

/**
 * Build the backend for a storage config, legacy record or normalized config
 */
export function createStorageBackend(target: StorageTarget, deps: StorageDeps = {}): StorageBackend {
  const normalized = normalizeStorageTarget(target);
  const parsed = parseBackendSettings(normalized.storage_type, normalized.config_data);

  switch (parsed.type) {
    case "object":
      return new ObjectStorage(parsed.settings, { client: deps.objectClient });
    case "sftp":
      return new SftpStorage(parsed.settings);
    case "nfs":
      return new NfsStorage(parsed.settings, { run: deps.run });
    case "local":
      return new LocalStorage(parsed.settings);
  }
}

/**
 * Storage a database task writes to: the generic config when set, else the
 * legacy object-storage record
 */
export function resolveTaskStorage(
  task: Pick<DatabaseTaskRecord, "id" | "storage_config_id" | "legacy_config_id">,
): NormalizedStorageConfig {
  if (task.storage_config_id !== null) {
    const config = getStorageConfigById(task.storage_config_id);
    if (!config) {
      throw new ConfigurationError(
        `Storage config ${task.storage_config_id} for task ${task.id} does not exist`,
      );
    }
    return normalizeStorageTarget(config);
  }

  if (task.legacy_config_id !== null) {
    const legacy = getLegacyObjectConfigById(task.legacy_config_id);
    if (!legacy) {
      throw new ConfigurationError(
        `Legacy storage config ${task.legacy_config_id} for task ${task.id} does not exist`,
      );
    }
    return normalizeStorageTarget(legacy);
  }

  throw new ConfigurationError(`Task ${task.id} has no storage configured`);
}
