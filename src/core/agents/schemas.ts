/**
 * Agent HTTP payloads
 */

import { z } from "zod";

const optionalNumber = z.number().nullish();

export const systemInfoSchema = z.object({
  disk_free_gb: optionalNumber,
  disk_total_gb: optionalNumber,
  memory_free_mb: optionalNumber,
  memory_total_mb: optionalNumber,
  cpu_load_percent: optionalNumber,
  network_rx_mb: optionalNumber,
  network_tx_mb: optionalNumber,
});

export type AgentSystemInfo = z.infer<typeof systemInfoSchema>;

export const filesystemInfoSchema = z.object({
  filesystem: z.string(),
  mount_point: z.string(),
  available_gb: z.number(),
  total_gb: z.number(),
});

export type AgentFilesystemInfo = z.infer<typeof filesystemInfoSchema>;

export const backupReportSchema = z.object({
  source_path: z.string().min(1),
  archive_name: z.string().nullish(),
  backup_date: z.string().nullish(),
  s3_upload_date: z.string().nullish(),
  archive_size_mb: z.number().nullish(),
  s3_path: z.string().nullish(),
  status: z.enum(["success", "error", "uploading"]),
  error_message: z.string().nullish(),
});

export type AgentBackupReport = z.infer<typeof backupReportSchema>;

export const backupListSchema = z.object({
  backups: z.array(z.unknown()).nullish(),
});

export const executeResultSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  archive_size: z.number().nullish(),
  files_count: z.number().nullish(),
  s3_path: z.string().nullish(),
});

export type AgentExecuteResult = z.infer<typeof executeResultSchema>;

/**
 * Folder task execution request; `AgentTaskConfig` adds the schedule
 */
export interface AgentTaskExecute {
  task_id: number;
  source_path: string;
  create_archive: boolean;
  archive_format: string;
  s3_endpoint: string;
  s3_access_key: string;
  s3_secret_key: string;
  s3_bucket: string;
  s3_region: string;
  cleanup_enabled: boolean;
  cleanup_days: number;
  is_docker_compose: boolean;
  docker_compose_path: string | null;
}

export interface AgentTaskConfig extends AgentTaskExecute {
  schedule_cron: string;
}
