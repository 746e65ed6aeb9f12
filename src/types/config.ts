/**
 * Configuration type definitions for backhaul
 */

import type { LogLevel } from "../utils/logger";

export interface DatabaseConfig {
  path: string;
}

export interface SecurityConfig {
  /** Base64 encoded 32 byte key used for credential encryption */
  encryptionKey?: string;
}

export interface SchedulerConfig {
  /** Seconds between job set resync passes (default: 300) */
  resyncIntervalSeconds: number;
  /** Top-level folder for database dump artifacts (default: "backups") */
  backupNamespace: string;
  /** Directory where dumps are written before upload */
  tempDir: string;
}

export interface AgentsConfig {
  pollIntervalSeconds: number;
  requestTimeoutSeconds: number;
}

export interface ReportsConfig {
  checkIntervalSeconds: number;
}

export interface StorageCheckConfig {
  intervalSeconds: number;
}

export interface NotificationsConfig {
  enabled: boolean;
  webhookUrl?: string;
  username?: string;
  iconUrl?: string;
  timeoutSeconds?: number;
}

/**
 * External command names, overridable for non-standard installs
 */
export interface ToolsConfig {
  dump: string;
  restore: string;
  sql: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface BackhaulConfig {
  version: string;
  database: DatabaseConfig;
  security: SecurityConfig;
  scheduler: SchedulerConfig;
  agents: AgentsConfig;
  reports: ReportsConfig;
  storageCheck: StorageCheckConfig;
  notifications: NotificationsConfig;
  tools: ToolsConfig;
  logging: LoggingConfig;
}
