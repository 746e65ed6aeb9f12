/**
 * Deletion log repository
 */

import type { DeletionLogRecord } from "../types";
import { getDatabase } from "./connection";
import { parseDeletionLogRow, type RawDeletionLogRow, toFlag } from "./mappers";

export type DeletionLogInsert = Omit<DeletionLogRecord, "id" | "deleted_at" | "error_message"> & {
  error_message?: string | null;
};

export function logDeletion(log: DeletionLogInsert): void {
  getDatabase()
    .prepare<[number, number | null, string, string, number, string | null]>(
      `INSERT INTO deletion_log (
        task_id, storage_config_id, storage_path, reason, success, error_message
      ) VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(
      log.task_id,
      log.storage_config_id,
      log.storage_path,
      log.reason,
      toFlag(log.success),
      log.error_message ?? null,
    );
}

export function getDeletionLogs(limit = 100): DeletionLogRecord[] {
  return getDatabase()
    .prepare<[number], RawDeletionLogRow>("SELECT * FROM deletion_log ORDER BY deleted_at DESC, id DESC LIMIT ?")
    .all(limit)
    .map(parseDeletionLogRow);
}
