/**
 * Backup operation type definitions
 */

export interface DumpResult {
  artifactFilename: string;
  artifactSizeMB: number;
  /** URI returned by the storage backend */
  storagePath: string;
  durationSeconds: number;
}

export interface RestoreOptions {
  /** Database to restore into; defaults to the task's database */
  targetDatabase?: string;
}

export interface RetentionResult {
  checked: number;
  kept: number;
  deleted: string[];
  failed: { path: string; error: string }[];
}

export interface TaskRunOutcome {
  taskId: number;
  historyId: number;
  status: "success" | "error";
  error: string | null;
  result: DumpResult | null;
  retention: RetentionResult | null;
}
