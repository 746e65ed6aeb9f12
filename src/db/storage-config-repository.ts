/**
 * Storage configuration repository
 */

import type { LegacyObjectConfigRecord, StorageConfigRecord, StorageType } from "../types";
import { getDatabase } from "./connection";
import {
  parseLegacyObjectConfigRow,
  parseStorageConfigRow,
  type RawLegacyObjectConfigRow,
  type RawStorageConfigRow,
  toFlag,
} from "./mappers";

export interface StorageConfigInsert {
  name: string;
  storage_type: StorageType;
  config_data: Record<string, unknown>;
}

export type LegacyObjectConfigInsert = Omit<LegacyObjectConfigRecord, "id">;

export interface StorageCheckUpdate {
  last_check: string;
  free_space_gb: number | null;
  total_space_gb: number | null;
  used_space_gb: number | null;
  connection_error: string | null;
}

export function insertStorageConfig(config: StorageConfigInsert): StorageConfigRecord {
  const database = getDatabase();

  const result = database
    .prepare<{ name: string; storage_type: string; config_data: string }>(
      `INSERT INTO storage_configs (name, storage_type, config_data)
       VALUES (@name, @storage_type, @config_data)`,
    )
    .run({
      name: config.name,
      storage_type: config.storage_type,
      config_data: JSON.stringify(config.config_data),
    });

  const inserted = getStorageConfigById(Number(result.lastInsertRowid));
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted storage config: ${config.name}`);
  }
  return inserted;
}

export function getStorageConfigById(id: number): StorageConfigRecord | null {
  const row = getDatabase()
    .prepare<[number], RawStorageConfigRow>("SELECT * FROM storage_configs WHERE id = ?")
    .get(id);
  return row ? parseStorageConfigRow(row) : null;
}

export function getAllStorageConfigs(): StorageConfigRecord[] {
  return getDatabase()
    .prepare<[], RawStorageConfigRow>("SELECT * FROM storage_configs ORDER BY id")
    .all()
    .map(parseStorageConfigRow);
}

export function updateStorageCheck(id: number, update: StorageCheckUpdate): void {
  getDatabase()
    .prepare<StorageCheckUpdate & { id: number }>(
      `UPDATE storage_configs SET
         last_check = @last_check,
         free_space_gb = @free_space_gb,
         total_space_gb = @total_space_gb,
         used_space_gb = @used_space_gb,
         connection_error = @connection_error
       WHERE id = @id`,
    )
    .run({ ...update, id });
}

export function insertLegacyObjectConfig(config: LegacyObjectConfigInsert): LegacyObjectConfigRecord {
  const database = getDatabase();

  const result = database
    .prepare<Omit<RawLegacyObjectConfigRow, "id">>(
      `INSERT INTO legacy_object_configs (name, endpoint, access_key, secret_key, bucket_name, region, use_ssl)
       VALUES (@name, @endpoint, @access_key, @secret_key, @bucket_name, @region, @use_ssl)`,
    )
    .run({ ...config, use_ssl: toFlag(config.use_ssl) });

  const inserted = getLegacyObjectConfigById(Number(result.lastInsertRowid));
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted legacy config: ${config.name}`);
  }
  return inserted;
}

export function getLegacyObjectConfigById(id: number): LegacyObjectConfigRecord | null {
  const row = getDatabase()
    .prepare<[number], RawLegacyObjectConfigRow>("SELECT * FROM legacy_object_configs WHERE id = ?")
    .get(id);
  return row ? parseLegacyObjectConfigRow(row) : null;
}
