import { insertDatabaseTask, insertStorageConfig } from "../../src/db";
import type { DatabaseTaskInsert } from "../../src/db";
import type { DatabaseTaskRecord, StorageConfigRecord } from "../../src/types";
import { CredentialCipher } from "../../src/utils/crypto";

export const TEST_KEY = Buffer.alloc(32, 7).toString("base64");

export const testCipher = new CredentialCipher(TEST_KEY);

export function localStorageConfig(basePath: string, name = "local"): StorageConfigRecord {
  return insertStorageConfig({ name, storage_type: "local", config_data: { basePath } });
}

export function ordersTask(overrides: Partial<DatabaseTaskInsert> = {}): DatabaseTaskRecord {
  return insertDatabaseTask({
    name: "Orders nightly",
    host: "db.internal",
    port: 5432,
    username: "backup",
    password_encrypted: testCipher.encrypt("test-secret"),
    database_name: "orders",
    schedule_cron: "0 2 * * *",
    ...overrides,
  });
}
