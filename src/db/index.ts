/**
 * Database module exports
 */

// Agents, telemetry, folder tasks and backup snapshots
export type { AgentBackupInsert, AgentInsert, AgentTelemetry, FolderTaskInsert } from "./agent-repository";
export {
  DEFAULT_AGENT_PORT,
  getActiveAgents,
  getAgentBackupRecords,
  getAgentBackupStatuses,
  getAgentById,
  getAgentStatus,
  getAgentsByIds,
  getFolderTaskById,
  getFolderTasksForAgent,
  insertAgent,
  insertFolderTask,
  replaceAgentBackupRecords,
  saveAgentTelemetry,
  setAgentOnline,
  updateAgentLastSeen,
  updateFolderTaskRunState,
} from "./agent-repository";
// Connection
export { closeDatabase, getDatabase, initDatabase, withTransaction } from "./connection";
// Database tasks
export type { DatabaseTaskInsert, TaskRunState } from "./database-task-repository";
export {
  getDatabaseTaskById,
  getDatabaseTasksByIds,
  getSchedulableDatabaseTasks,
  insertDatabaseTask,
  updateTaskNextRun,
  updateTaskRunState,
} from "./database-task-repository";
// Deletion log
export type { DeletionLogInsert } from "./deletion-log-repository";
export { getDeletionLogs, logDeletion } from "./deletion-log-repository";
// History
export type { HistoryCompletion, HistoryCounts } from "./history-repository";
export {
  beginTaskRun,
  countHistorySince,
  finishTaskRun,
  getHistoryById,
  getHistoryForTask,
  getRecentHistory,
  getUploadedArtifacts,
} from "./history-repository";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
// Reports
export type { ReportInsert } from "./report-repository";
export {
  getDeliverableReports,
  getReportById,
  getReportHistory,
  insertReport,
  recordReportSend,
  updateReportNextSend,
} from "./report-repository";
// Storage configs
export type {
  LegacyObjectConfigInsert,
  StorageCheckUpdate,
  StorageConfigInsert,
} from "./storage-config-repository";
export {
  getAllStorageConfigs,
  getLegacyObjectConfigById,
  getStorageConfigById,
  insertLegacyObjectConfig,
  insertStorageConfig,
  updateStorageCheck,
} from "./storage-config-repository";
