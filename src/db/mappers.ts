/**
 * Database row mapping utilities
 */

import { isPlainObject } from "../config/defaults";
import type {
  AgentRecord,
  AgentStatusRecord,
  DatabaseTaskRecord,
  DeletionLogRecord,
  FolderTaskRecord,
  LegacyObjectConfigRecord,
  ReportDefinitionRecord,
  StorageConfigRecord,
} from "../types";

/** SQLite stores booleans as 0/1 */
type IntFlags<T, K extends keyof T> = Omit<T, K> & { [P in K]: number };

export type RawStorageConfigRow = Omit<StorageConfigRecord, "config_data"> & {
  config_data: string;
};

export type RawLegacyObjectConfigRow = IntFlags<LegacyObjectConfigRecord, "use_ssl">;

export type RawDatabaseTaskRow = IntFlags<
  DatabaseTaskRecord,
  | "include_schema"
  | "include_data"
  | "include_roles"
  | "include_tablespaces"
  | "schedule_enabled"
  | "cleanup_enabled"
  | "is_active"
>;

export type RawAgentRow = IntFlags<AgentRecord, "is_active">;

export type RawAgentStatusRow = IntFlags<AgentStatusRecord, "is_online">;

export type RawFolderTaskRow = IntFlags<
  FolderTaskRecord,
  "schedule_enabled" | "create_archive" | "is_docker_compose" | "cleanup_enabled" | "is_active"
>;

export type RawReportRow = Omit<
  IntFlags<ReportDefinitionRecord, "enabled" | "send_enabled">,
  "selected_agent_ids" | "selected_database_task_ids"
> & {
  selected_agent_ids: string;
  selected_database_task_ids: string;
};

export type RawDeletionLogRow = IntFlags<DeletionLogRecord, "success">;

export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

function parseJsonObject(text: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function parseIdList(text: string): number[] {
  try {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) return [];
    return parsed.filter((v): v is number => typeof v === "number" && Number.isInteger(v));
  } catch {
    return [];
  }
}

export function serializeIdList(ids: number[]): string {
  return JSON.stringify(ids);
}

export function parseStorageConfigRow(row: RawStorageConfigRow): StorageConfigRecord {
  return { ...row, config_data: parseJsonObject(row.config_data) };
}

export function parseLegacyObjectConfigRow(row: RawLegacyObjectConfigRow): LegacyObjectConfigRecord {
  return { ...row, use_ssl: Boolean(row.use_ssl) };
}

export function parseDatabaseTaskRow(row: RawDatabaseTaskRow): DatabaseTaskRecord {
  return {
    ...row,
    include_schema: Boolean(row.include_schema),
    include_data: Boolean(row.include_data),
    include_roles: Boolean(row.include_roles),
    include_tablespaces: Boolean(row.include_tablespaces),
    schedule_enabled: Boolean(row.schedule_enabled),
    cleanup_enabled: Boolean(row.cleanup_enabled),
    is_active: Boolean(row.is_active),
  };
}

export function parseAgentRow(row: RawAgentRow): AgentRecord {
  return { ...row, is_active: Boolean(row.is_active) };
}

export function parseAgentStatusRow(row: RawAgentStatusRow): AgentStatusRecord {
  return { ...row, is_online: Boolean(row.is_online) };
}

export function parseFolderTaskRow(row: RawFolderTaskRow): FolderTaskRecord {
  return {
    ...row,
    schedule_enabled: Boolean(row.schedule_enabled),
    create_archive: Boolean(row.create_archive),
    is_docker_compose: Boolean(row.is_docker_compose),
    cleanup_enabled: Boolean(row.cleanup_enabled),
    is_active: Boolean(row.is_active),
  };
}

export function parseReportRow(row: RawReportRow): ReportDefinitionRecord {
  return {
    ...row,
    selected_agent_ids: parseIdList(row.selected_agent_ids),
    selected_database_task_ids: parseIdList(row.selected_database_task_ids),
    enabled: Boolean(row.enabled),
    send_enabled: Boolean(row.send_enabled),
  };
}

export function parseDeletionLogRow(row: RawDeletionLogRow): DeletionLogRecord {
  return { ...row, success: Boolean(row.success) };
}
