/**
 * Database backup history repository
 *
 * A history row is inserted as `running` when an execution starts and
 * completed exactly once with its terminal state. Task run state is written
 * in the same transaction as the history row.
 */

import type { DatabaseHistoryRecord, DumpResult } from "../types";
import { getDatabase, withTransaction } from "./connection";
import { updateTaskRunState } from "./database-task-repository";

export type HistoryCompletion =
  | { status: "success"; finishedAt: string; result: DumpResult }
  | { status: "error"; finishedAt: string; error: string };

export interface HistoryCounts {
  success: number;
  error: number;
  running: number;
}

export function getHistoryById(id: number): DatabaseHistoryRecord | null {
  const row = getDatabase()
    .prepare<[number], DatabaseHistoryRecord>("SELECT * FROM database_backup_history WHERE id = ?")
    .get(id);
  return row ?? null;
}

export function getHistoryForTask(taskId: number, limit = 50): DatabaseHistoryRecord[] {
  return getDatabase()
    .prepare<[number, number], DatabaseHistoryRecord>(
      `SELECT * FROM database_backup_history
       WHERE task_id = ?
       ORDER BY started_at DESC, id DESC
       LIMIT ?`,
    )
    .all(taskId, limit);
}

export function getRecentHistory(limit = 50): DatabaseHistoryRecord[] {
  return getDatabase()
    .prepare<[number], DatabaseHistoryRecord>(
      "SELECT * FROM database_backup_history ORDER BY started_at DESC, id DESC LIMIT ?",
    )
    .all(limit);
}

/**
 * Successful runs that left an artifact in storage
 */
export function getUploadedArtifacts(taskId: number): DatabaseHistoryRecord[] {
  return getDatabase()
    .prepare<[number], DatabaseHistoryRecord>(
      `SELECT * FROM database_backup_history
       WHERE task_id = ? AND status = 'success' AND storage_path IS NOT NULL
       ORDER BY finished_at`,
    )
    .all(taskId);
}

export function countHistorySince(since: string, taskIds?: number[]): HistoryCounts {
  const counts: HistoryCounts = { success: 0, error: 0, running: 0 };
  if (taskIds && taskIds.length === 0) {
    return counts;
  }

  const filter = taskIds ? `AND task_id IN (${taskIds.map(() => "?").join(", ")})` : "";
  const rows = getDatabase()
    .prepare<(string | number)[], { status: keyof HistoryCounts; total: number }>(
      `SELECT status, COUNT(*) AS total FROM database_backup_history
       WHERE started_at >= ? ${filter}
       GROUP BY status`,
    )
    .all(since, ...(taskIds ?? []));

  for (const row of rows) {
    counts[row.status] = row.total;
  }
  return counts;
}

/**
 * Mark the task running and open a history row. Returns the history id.
 */
export function beginTaskRun(taskId: number, startedAt: string): number {
  return withTransaction(() => {
    updateTaskRunState(taskId, { last_status: "running", last_run: startedAt, last_error: null });

    const result = getDatabase()
      .prepare<[number, string]>(
        `INSERT INTO database_backup_history (task_id, status, started_at)
         VALUES (?, 'running', ?)`,
      )
      .run(taskId, startedAt);

    return Number(result.lastInsertRowid);
  });
}

/**
 * Close a history row opened by beginTaskRun and store the task's terminal state
 */
export function finishTaskRun(taskId: number, historyId: number, completion: HistoryCompletion): void {
  withTransaction(() => {
    const database = getDatabase();
    const started = getHistoryById(historyId);
    const durationSeconds = started
      ? Math.max(0, (Date.parse(completion.finishedAt) - Date.parse(started.started_at)) / 1000)
      : null;

    if (completion.status === "success") {
      database
        .prepare<{
          id: number;
          finished_at: string;
          duration_seconds: number | null;
          artifact_size_mb: number;
          storage_path: string;
          artifact_filename: string;
        }>(
          `UPDATE database_backup_history SET
             status = 'success',
             finished_at = @finished_at,
             duration_seconds = @duration_seconds,
             artifact_size_mb = @artifact_size_mb,
             storage_path = @storage_path,
             artifact_filename = @artifact_filename
           WHERE id = @id AND finished_at IS NULL`,
        )
        .run({
          id: historyId,
          finished_at: completion.finishedAt,
          duration_seconds: durationSeconds,
          artifact_size_mb: completion.result.artifactSizeMB,
          storage_path: completion.result.storagePath,
          artifact_filename: completion.result.artifactFilename,
        });
      updateTaskRunState(taskId, { last_status: "success", last_error: null });
      return;
    }

    database
      .prepare<{ id: number; finished_at: string; duration_seconds: number | null; error_message: string }>(
        `UPDATE database_backup_history SET
           status = 'error',
           finished_at = @finished_at,
           duration_seconds = @duration_seconds,
           error_message = @error_message
         WHERE id = @id AND finished_at IS NULL`,
      )
      .run({
        id: historyId,
        finished_at: completion.finishedAt,
        duration_seconds: durationSeconds,
        error_message: completion.error,
      });
    updateTaskRunState(taskId, { last_status: "error", last_error: completion.error });
  });
}
