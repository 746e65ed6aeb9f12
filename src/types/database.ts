/**
 * Database record type definitions
 */

import type { StorageType } from "./storage";

export type DumpFormat = "custom" | "plain" | "tar";
export type RunStatus = "running" | "success" | "error";
export type AgentBackupStatus = "success" | "error" | "uploading";
export type ReportCadence = "daily" | "weekly" | "hourly" | "customHours";
export type ReportSendStatus = "success" | "error";
export type DeletionReason = "retention_days" | "manual";

export interface StorageConfigRecord {
  id: number;
  name: string;
  storage_type: StorageType;
  config_data: Record<string, unknown>;
  last_check: string | null;
  free_space_gb: number | null;
  total_space_gb: number | null;
  used_space_gb: number | null;
  connection_error: string | null;
  created_at: string;
}

/**
 * Flat object-storage record kept for tasks created before generic storage configs
 */
export interface LegacyObjectConfigRecord {
  id: number;
  name: string;
  endpoint: string;
  access_key: string;
  secret_key: string;
  bucket_name: string;
  region: string;
  use_ssl: boolean;
}

export interface DatabaseTaskRecord {
  id: number;
  name: string;
  storage_config_id: number | null;
  legacy_config_id: number | null;
  host: string;
  port: number;
  username: string;
  password_encrypted: string;
  database_name: string;
  dump_format: DumpFormat;
  compression_level: number;
  include_schema: boolean;
  include_data: boolean;
  include_roles: boolean;
  include_tablespaces: boolean;
  schedule_cron: string;
  schedule_enabled: boolean;
  cleanup_enabled: boolean;
  cleanup_days: number;
  is_active: boolean;
  last_run: string | null;
  next_run: string | null;
  last_status: RunStatus | null;
  last_error: string | null;
  created_at: string;
}

export interface DatabaseHistoryRecord {
  id: number;
  task_id: number;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
  duration_seconds: number | null;
  artifact_size_mb: number | null;
  storage_path: string | null;
  artifact_filename: string | null;
  error_message: string | null;
}

export interface AgentRecord {
  id: number;
  name: string;
  ip_address: string;
  port: number;
  hostname: string | null;
  is_active: boolean;
  last_seen: string | null;
  storage_config_id: number | null;
}

export interface AgentStatusRecord {
  agent_id: number;
  disk_free_gb: number | null;
  disk_total_gb: number | null;
  memory_free_mb: number | null;
  memory_total_mb: number | null;
  cpu_load_percent: number | null;
  network_rx_mb: number | null;
  network_tx_mb: number | null;
  is_online: boolean;
  last_update: string | null;
}

export interface FolderTaskRecord {
  id: number;
  name: string;
  agent_id: number;
  storage_config_id: number | null;
  source_path: string;
  schedule_cron: string;
  schedule_enabled: boolean;
  create_archive: boolean;
  archive_format: string;
  is_docker_compose: boolean;
  docker_compose_path: string | null;
  cleanup_enabled: boolean;
  cleanup_days: number;
  is_active: boolean;
  last_run: string | null;
  last_status: RunStatus | null;
  last_error: string | null;
}

export interface AgentBackupRecord {
  id: number;
  agent_id: number;
  task_id: number;
  source_path: string;
  archive_name: string | null;
  backup_date: string | null;
  upload_date: string | null;
  artifact_size_mb: number | null;
  storage_path: string | null;
  status: AgentBackupStatus;
  error_message: string | null;
}

export interface ReportDefinitionRecord {
  id: number;
  name: string;
  selected_agent_ids: number[];
  selected_database_task_ids: number[];
  cadence: ReportCadence;
  cadence_hour: number;
  cadence_minute: number;
  /** 0 = Sunday ... 6 = Saturday */
  cadence_day_of_week: number;
  cadence_hours_interval: number;
  enabled: boolean;
  send_enabled: boolean;
  last_sent: string | null;
  next_send: string | null;
}

export interface ReportHistoryRecord {
  id: number;
  report_id: number;
  sent_at: string;
  status: ReportSendStatus;
  error_message: string | null;
}

export interface DeletionLogRecord {
  id: number;
  task_id: number;
  storage_config_id: number | null;
  storage_path: string;
  reason: DeletionReason;
  deleted_at: string;
  success: boolean;
  error_message: string | null;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}
