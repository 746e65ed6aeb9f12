/**
 * Cleanup orchestration
 */

import { getUploadedArtifacts, logDeletion } from "../../db";
import type { DatabaseTaskRecord, RetentionResult, StorageBackend } from "../../types";
import { errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { artifactPrefix } from "../../utils/naming";
import { isKeyWithinPrefix } from "../../utils/path";
import { selectExpired } from "./retention";

const log = createLogger("retention");

export interface RetentionOptions {
  backupNamespace: string;
  /** Storage config the task writes to; null for legacy object storage */
  storageConfigId: number | null;
  now?: Date;
}

export type RetentionTask = Pick<DatabaseTaskRecord, "id" | "database_name" | "cleanup_days">;

/**
 * Upload times of a task's artifacts, keyed by path relative to the backend.
 * Rows written to another backend or outside `prefix` are left out.
 */
function uploadTimes(taskId: number, backend: StorageBackend, prefix: string): Map<string, Date> {
  const times = new Map<string, Date>();
  for (const row of getUploadedArtifacts(taskId)) {
    if (!row.storage_path || !row.finished_at) continue;
    const finished = new Date(row.finished_at);
    if (Number.isNaN(finished.getTime())) continue;

    let relative: string;
    try {
      relative = backend.relativePath(row.storage_path);
    } catch (err) {
      log.debug(`Ignoring history row ${row.id}: ${errorMessage(err)}`);
      continue;
    }
    if (!isKeyWithinPrefix(relative, prefix)) continue;
    times.set(relative, finished);
  }
  return times;
}

/**
 * Delete a task's artifacts older than its cleanup window
 */
export async function runRetention(
  task: RetentionTask,
  backend: StorageBackend,
  options: RetentionOptions,
): Promise<RetentionResult> {
  const now = options.now ?? new Date();
  const prefix = artifactPrefix(options.backupNamespace, task.database_name);
  const objects = await backend.listDetailed(prefix);
  const { expired, kept } = selectExpired(objects, uploadTimes(task.id, backend, prefix), task.cleanup_days, now);

  const result: RetentionResult = {
    checked: objects.length,
    kept: kept.length,
    deleted: [],
    failed: [],
  };

  for (const { object } of expired) {
    try {
      await backend.delete(object.path);
      result.deleted.push(object.path);
      logDeletion({
        task_id: task.id,
        storage_config_id: options.storageConfigId,
        storage_path: object.path,
        reason: "retention_days",
        success: true,
      });
    } catch (err) {
      const message = errorMessage(err);
      log.error(`Failed to delete ${object.path}: ${message}`);
      result.failed.push({ path: object.path, error: message });
      logDeletion({
        task_id: task.id,
        storage_config_id: options.storageConfigId,
        storage_path: object.path,
        reason: "retention_days",
        success: false,
        error_message: message,
      });
    }
  }

  if (result.deleted.length > 0 || result.failed.length > 0) {
    log.info(
      `Task ${task.id}: ${result.deleted.length} artifact(s) deleted, ${result.failed.length} failed, ${result.kept} kept`,
    );
  }

  return result;
}
