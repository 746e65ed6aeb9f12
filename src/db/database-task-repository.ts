/**
 * Database backup task repository
 */

import type { DatabaseTaskRecord, RunStatus } from "../types";
import { getDatabase } from "./connection";
import { parseDatabaseTaskRow, type RawDatabaseTaskRow, toFlag } from "./mappers";

export type DatabaseTaskInsert = Pick<
  DatabaseTaskRecord,
  "name" | "host" | "username" | "password_encrypted" | "database_name" | "schedule_cron"
> &
  Partial<
    Pick<
      DatabaseTaskRecord,
      | "storage_config_id"
      | "legacy_config_id"
      | "port"
      | "dump_format"
      | "compression_level"
      | "include_schema"
      | "include_data"
      | "include_roles"
      | "include_tablespaces"
      | "schedule_enabled"
      | "cleanup_enabled"
      | "cleanup_days"
      | "is_active"
    >
  >;

export interface TaskRunState {
  last_status: RunStatus;
  last_run?: string;
  last_error: string | null;
}

export function insertDatabaseTask(task: DatabaseTaskInsert): DatabaseTaskRecord {
  const database = getDatabase();

  const result = database
    .prepare<Omit<RawDatabaseTaskRow, "id" | "last_run" | "next_run" | "last_status" | "last_error" | "created_at">>(
      `INSERT INTO database_backup_tasks (
         name, storage_config_id, legacy_config_id, host, port, username, password_encrypted,
         database_name, dump_format, compression_level, include_schema, include_data,
         include_roles, include_tablespaces, schedule_cron, schedule_enabled,
         cleanup_enabled, cleanup_days, is_active
       ) VALUES (
         @name, @storage_config_id, @legacy_config_id, @host, @port, @username, @password_encrypted,
         @database_name, @dump_format, @compression_level, @include_schema, @include_data,
         @include_roles, @include_tablespaces, @schedule_cron, @schedule_enabled,
         @cleanup_enabled, @cleanup_days, @is_active
       )`,
    )
    .run({
      name: task.name,
      storage_config_id: task.storage_config_id ?? null,
      legacy_config_id: task.legacy_config_id ?? null,
      host: task.host,
      port: task.port ?? 5432,
      username: task.username,
      password_encrypted: task.password_encrypted,
      database_name: task.database_name,
      dump_format: task.dump_format ?? "custom",
      compression_level: task.compression_level ?? 6,
      include_schema: toFlag(task.include_schema ?? true),
      include_data: toFlag(task.include_data ?? true),
      include_roles: toFlag(task.include_roles ?? false),
      include_tablespaces: toFlag(task.include_tablespaces ?? false),
      schedule_cron: task.schedule_cron,
      schedule_enabled: toFlag(task.schedule_enabled ?? true),
      cleanup_enabled: toFlag(task.cleanup_enabled ?? true),
      cleanup_days: task.cleanup_days ?? 30,
      is_active: toFlag(task.is_active ?? true),
    });

  const inserted = getDatabaseTaskById(Number(result.lastInsertRowid));
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted task: ${task.name}`);
  }
  return inserted;
}

export function getDatabaseTaskById(id: number): DatabaseTaskRecord | null {
  const row = getDatabase()
    .prepare<[number], RawDatabaseTaskRow>("SELECT * FROM database_backup_tasks WHERE id = ?")
    .get(id);
  return row ? parseDatabaseTaskRow(row) : null;
}

export function getDatabaseTasksByIds(ids: number[]): DatabaseTaskRecord[] {
  if (ids.length === 0) return [];
  const placeholders = ids.map(() => "?").join(", ");
  return getDatabase()
    .prepare<number[], RawDatabaseTaskRow>(
      `SELECT * FROM database_backup_tasks WHERE id IN (${placeholders}) ORDER BY id`,
    )
    .all(...ids)
    .map(parseDatabaseTaskRow);
}

/**
 * Tasks that should have a live scheduler job
 */
export function getSchedulableDatabaseTasks(): DatabaseTaskRecord[] {
  return getDatabase()
    .prepare<[], RawDatabaseTaskRow>(
      `SELECT * FROM database_backup_tasks
       WHERE is_active = 1 AND schedule_enabled = 1
       ORDER BY id`,
    )
    .all()
    .map(parseDatabaseTaskRow);
}

export function updateTaskRunState(id: number, state: TaskRunState): void {
  getDatabase()
    .prepare<{ id: number; last_status: string; last_run: string | null; last_error: string | null }>(
      `UPDATE database_backup_tasks SET
         last_status = @last_status,
         last_run = COALESCE(@last_run, last_run),
         last_error = @last_error
       WHERE id = @id`,
    )
    .run({
      id,
      last_status: state.last_status,
      last_run: state.last_run ?? null,
      last_error: state.last_error,
    });
}

export function updateTaskNextRun(id: number, nextRun: string | null): void {
  getDatabase()
    .prepare<[string | null, number]>("UPDATE database_backup_tasks SET next_run = ? WHERE id = ?")
    .run(nextRun, id);
}
