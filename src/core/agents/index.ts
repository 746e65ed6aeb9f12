/**
 * Agent module exports
 */

export { AgentClient, type AgentClientOptions, DEFAULT_AGENT_TIMEOUT_MS } from "./client";
export {
  type AgentApi,
  type AgentPollResult,
  AgentReconciler,
  type AgentReconcilerOptions,
  type BackupAlert,
  buildSnapshot,
  parseIsoDate,
} from "./reconciler";
export { buildConfigPayload, buildExecutePayload, FolderTaskRelay, type RelayApi } from "./relay";
export type {
  AgentBackupReport,
  AgentExecuteResult,
  AgentFilesystemInfo,
  AgentSystemInfo,
  AgentTaskConfig,
  AgentTaskExecute,
} from "./schemas";
