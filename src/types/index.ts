/**
 * Centralized type exports for backhaul
 */

// Backup types
export type { DumpResult, RestoreOptions, RetentionResult, TaskRunOutcome } from "./backup";
// Config types
export type {
  AgentsConfig,
  BackhaulConfig,
  DatabaseConfig,
  LoggingConfig,
  NotificationsConfig,
  ReportsConfig,
  SchedulerConfig,
  SecurityConfig,
  StorageCheckConfig,
  ToolsConfig,
} from "./config";
// Database types
export type {
  AgentBackupRecord,
  AgentBackupStatus,
  AgentRecord,
  AgentStatusRecord,
  DatabaseHistoryRecord,
  DatabaseTaskRecord,
  DeletionLogRecord,
  DeletionReason,
  DumpFormat,
  FolderTaskRecord,
  LegacyObjectConfigRecord,
  Migration,
  ReportCadence,
  ReportDefinitionRecord,
  ReportHistoryRecord,
  ReportSendStatus,
  RunStatus,
  StorageConfigRecord,
} from "./database";
// Storage types
export type {
  BackendSettings,
  ConnectionCheck,
  LocalStorageSettings,
  NfsStorageSettings,
  ObjectStorageSettings,
  SftpStorageSettings,
  SpaceInfo,
  StorageBackend,
  StoredObject,
  StorageType,
} from "./storage";
