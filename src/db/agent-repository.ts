/**
 * Agent, agent telemetry, folder task and agent backup snapshot repository
 */

import type {
  AgentBackupRecord,
  AgentRecord,
  AgentStatusRecord,
  FolderTaskRecord,
  RunStatus,
} from "../types";
import { getDatabase } from "./connection";
import {
  parseAgentRow,
  parseAgentStatusRow,
  parseFolderTaskRow,
  type RawAgentRow,
  type RawAgentStatusRow,
  type RawFolderTaskRow,
  toFlag,
} from "./mappers";

export const DEFAULT_AGENT_PORT = 11540;

export type AgentInsert = Pick<AgentRecord, "name" | "ip_address"> &
  Partial<Pick<AgentRecord, "port" | "hostname" | "is_active" | "storage_config_id">>;

export type FolderTaskInsert = Pick<FolderTaskRecord, "name" | "agent_id" | "source_path" | "schedule_cron"> &
  Partial<
    Pick<
      FolderTaskRecord,
      | "storage_config_id"
      | "schedule_enabled"
      | "create_archive"
      | "archive_format"
      | "is_docker_compose"
      | "docker_compose_path"
      | "cleanup_enabled"
      | "cleanup_days"
      | "is_active"
    >
  >;

export type AgentTelemetry = Omit<AgentStatusRecord, "agent_id" | "is_online" | "last_update">;

export type AgentBackupInsert = Omit<AgentBackupRecord, "id">;

// --- agents ---

export function insertAgent(agent: AgentInsert): AgentRecord {
  const result = getDatabase()
    .prepare<{
      name: string;
      ip_address: string;
      port: number;
      hostname: string | null;
      is_active: number;
      storage_config_id: number | null;
    }>(
      `INSERT INTO agents (name, ip_address, port, hostname, is_active, storage_config_id)
       VALUES (@name, @ip_address, @port, @hostname, @is_active, @storage_config_id)`,
    )
    .run({
      name: agent.name,
      ip_address: agent.ip_address,
      port: agent.port ?? DEFAULT_AGENT_PORT,
      hostname: agent.hostname ?? null,
      is_active: toFlag(agent.is_active ?? true),
      storage_config_id: agent.storage_config_id ?? null,
    });

  const inserted = getAgentById(Number(result.lastInsertRowid));
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted agent: ${agent.name}`);
  }
  return inserted;
}

export function getAgentById(id: number): AgentRecord | null {
  const row = getDatabase().prepare<[number], RawAgentRow>("SELECT * FROM agents WHERE id = ?").get(id);
  return row ? parseAgentRow(row) : null;
}

export function getActiveAgents(): AgentRecord[] {
  return getDatabase()
    .prepare<[], RawAgentRow>("SELECT * FROM agents WHERE is_active = 1 ORDER BY id")
    .all()
    .map(parseAgentRow);
}

export function getAgentsByIds(ids: number[]): AgentRecord[] {
  if (ids.length === 0) return [];
  const placeholders = ids.map(() => "?").join(", ");
  return getDatabase()
    .prepare<number[], RawAgentRow>(`SELECT * FROM agents WHERE id IN (${placeholders}) ORDER BY id`)
    .all(...ids)
    .map(parseAgentRow);
}

export function updateAgentLastSeen(agentId: number, seenAt: string): void {
  getDatabase().prepare<[string, number]>("UPDATE agents SET last_seen = ? WHERE id = ?").run(seenAt, agentId);
}

// --- telemetry ---

export function getAgentStatus(agentId: number): AgentStatusRecord | null {
  const row = getDatabase()
    .prepare<[number], RawAgentStatusRow>("SELECT * FROM agent_status WHERE agent_id = ?")
    .get(agentId);
  return row ? parseAgentStatusRow(row) : null;
}

/**
 * Overwrite every telemetry field and mark the agent online
 */
export function saveAgentTelemetry(agentId: number, telemetry: AgentTelemetry, updatedAt: string): void {
  getDatabase()
    .prepare<AgentTelemetry & { agent_id: number; last_update: string }>(
      `INSERT INTO agent_status (
         agent_id, disk_free_gb, disk_total_gb, memory_free_mb, memory_total_mb,
         cpu_load_percent, network_rx_mb, network_tx_mb, is_online, last_update
       ) VALUES (
         @agent_id, @disk_free_gb, @disk_total_gb, @memory_free_mb, @memory_total_mb,
         @cpu_load_percent, @network_rx_mb, @network_tx_mb, 1, @last_update
       )
       ON CONFLICT(agent_id) DO UPDATE SET
         disk_free_gb = excluded.disk_free_gb,
         disk_total_gb = excluded.disk_total_gb,
         memory_free_mb = excluded.memory_free_mb,
         memory_total_mb = excluded.memory_total_mb,
         cpu_load_percent = excluded.cpu_load_percent,
         network_rx_mb = excluded.network_rx_mb,
         network_tx_mb = excluded.network_tx_mb,
         is_online = 1,
         last_update = excluded.last_update`,
    )
    .run({ ...telemetry, agent_id: agentId, last_update: updatedAt });
}

/**
 * Set the online flag without touching the last reported telemetry
 */
export function setAgentOnline(agentId: number, isOnline: boolean, updatedAt: string): void {
  getDatabase()
    .prepare<[number, number, string]>(
      `INSERT INTO agent_status (agent_id, is_online, last_update) VALUES (?, ?, ?)
       ON CONFLICT(agent_id) DO UPDATE SET is_online = excluded.is_online, last_update = excluded.last_update`,
    )
    .run(agentId, toFlag(isOnline), updatedAt);
}

// --- folder tasks ---

export function insertFolderTask(task: FolderTaskInsert): FolderTaskRecord {
  const result = getDatabase()
    .prepare<{
      name: string;
      agent_id: number;
      storage_config_id: number | null;
      source_path: string;
      schedule_cron: string;
      schedule_enabled: number;
      create_archive: number;
      archive_format: string;
      is_docker_compose: number;
      docker_compose_path: string | null;
      cleanup_enabled: number;
      cleanup_days: number;
      is_active: number;
    }>(
      `INSERT INTO folder_backup_tasks (
         name, agent_id, storage_config_id, source_path, schedule_cron, schedule_enabled,
         create_archive, archive_format, is_docker_compose, docker_compose_path,
         cleanup_enabled, cleanup_days, is_active
       ) VALUES (
         @name, @agent_id, @storage_config_id, @source_path, @schedule_cron, @schedule_enabled,
         @create_archive, @archive_format, @is_docker_compose, @docker_compose_path,
         @cleanup_enabled, @cleanup_days, @is_active
       )`,
    )
    .run({
      name: task.name,
      agent_id: task.agent_id,
      storage_config_id: task.storage_config_id ?? null,
      source_path: task.source_path,
      schedule_cron: task.schedule_cron,
      schedule_enabled: toFlag(task.schedule_enabled ?? true),
      create_archive: toFlag(task.create_archive ?? true),
      archive_format: task.archive_format ?? "tar.gz",
      is_docker_compose: toFlag(task.is_docker_compose ?? false),
      docker_compose_path: task.docker_compose_path ?? null,
      cleanup_enabled: toFlag(task.cleanup_enabled ?? true),
      cleanup_days: task.cleanup_days ?? 30,
      is_active: toFlag(task.is_active ?? true),
    });

  const inserted = getFolderTaskById(Number(result.lastInsertRowid));
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted folder task: ${task.name}`);
  }
  return inserted;
}

export function getFolderTaskById(id: number): FolderTaskRecord | null {
  const row = getDatabase()
    .prepare<[number], RawFolderTaskRow>("SELECT * FROM folder_backup_tasks WHERE id = ?")
    .get(id);
  return row ? parseFolderTaskRow(row) : null;
}

export function getFolderTasksForAgent(agentId: number): FolderTaskRecord[] {
  return getDatabase()
    .prepare<[number], RawFolderTaskRow>("SELECT * FROM folder_backup_tasks WHERE agent_id = ? ORDER BY id")
    .all(agentId)
    .map(parseFolderTaskRow);
}

export function updateFolderTaskRunState(
  id: number,
  state: { last_status: RunStatus; last_run: string; last_error: string | null },
): void {
  getDatabase()
    .prepare<[string, string, string | null, number]>(
      "UPDATE folder_backup_tasks SET last_status = ?, last_run = ?, last_error = ? WHERE id = ?",
    )
    .run(state.last_status, state.last_run, state.last_error, id);
}

// --- backup snapshots ---

export function getAgentBackupRecords(agentId: number): AgentBackupRecord[] {
  return getDatabase()
    .prepare<[number], AgentBackupRecord>("SELECT * FROM agent_backup_records WHERE agent_id = ? ORDER BY task_id")
    .all(agentId);
}

/**
 * Previous status per task, captured before a snapshot is replaced
 */
export function getAgentBackupStatuses(agentId: number): Map<number, AgentBackupRecord["status"]> {
  const statuses = new Map<number, AgentBackupRecord["status"]>();
  for (const record of getAgentBackupRecords(agentId)) {
    statuses.set(record.task_id, record.status);
  }
  return statuses;
}

/**
 * Delete the agent's snapshot rows and insert the new ones.
 * Callers wrap this in the per-agent transaction.
 */
export function replaceAgentBackupRecords(agentId: number, records: AgentBackupInsert[]): void {
  const database = getDatabase();
  database.prepare<[number]>("DELETE FROM agent_backup_records WHERE agent_id = ?").run(agentId);

  const insert = database.prepare<AgentBackupInsert>(
    `INSERT INTO agent_backup_records (
       agent_id, task_id, source_path, archive_name, backup_date, upload_date,
       artifact_size_mb, storage_path, status, error_message
     ) VALUES (
       @agent_id, @task_id, @source_path, @archive_name, @backup_date, @upload_date,
       @artifact_size_mb, @storage_path, @status, @error_message
     )`,
  );
  for (const record of records) {
    insert.run(record);
  }
}
