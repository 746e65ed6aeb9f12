/**
 * Agent polling and backup snapshot reconciliation
 *
 * Each poll overwrites an agent's telemetry and replaces its backup snapshot
 * in one transaction. Failure alerts fire on the transition into `error`
 * and are sent after the transaction commits.
 */

import {
  getActiveAgents,
  getAgentBackupStatuses,
  getFolderTasksForAgent,
  replaceAgentBackupRecords,
  saveAgentTelemetry,
  setAgentOnline,
  updateAgentLastSeen,
  withTransaction,
} from "../../db";
import type { AgentBackupInsert, AgentTelemetry } from "../../db/agent-repository";
import type { AgentRecord, FolderTaskRecord } from "../../types";
import { errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import type { Notifier } from "../notifications/webhook";
import { IntervalLoop } from "../loop";
import { AgentClient } from "./client";
import type { AgentBackupReport, AgentSystemInfo } from "./schemas";

const log = createLogger("agents");

export type AgentApi = Pick<AgentClient, "ping" | "getSystemInfo" | "getBackups">;

export interface AgentReconcilerOptions {
  pollIntervalSeconds: number;
  requestTimeoutSeconds?: number;
  notifier: Notifier | null;
  createClient?: (agent: AgentRecord) => AgentApi;
  now?: () => Date;
}

export interface BackupAlert {
  taskId: number;
  taskName: string;
  error: string;
}

export interface AgentPollResult {
  agentId: number;
  online: boolean;
  /** Rows in the new snapshot; null when the backup list was not fetched */
  records: number | null;
  alerts: BackupAlert[];
}

/**
 * ISO-8601 string normalized to `toISOString()`, or null when it does not parse
 */
export function parseIsoDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

function toTelemetry(info: AgentSystemInfo): AgentTelemetry {
  return {
    disk_free_gb: info.disk_free_gb ?? null,
    disk_total_gb: info.disk_total_gb ?? null,
    memory_free_mb: info.memory_free_mb ?? null,
    memory_total_mb: info.memory_total_mb ?? null,
    cpu_load_percent: info.cpu_load_percent ?? null,
    network_rx_mb: info.network_rx_mb ?? null,
    network_tx_mb: info.network_tx_mb ?? null,
  };
}

function isNewer(candidate: AgentBackupInsert, current: AgentBackupInsert): boolean {
  if (!candidate.backup_date) return false;
  if (!current.backup_date) return true;
  return candidate.backup_date >= current.backup_date;
}

/**
 * Match reported backups to the agent's folder tasks by source path. Reports
 * without a matching task are dropped; when a task is reported more than once
 * the newest backup date wins.
 */
export function buildSnapshot(
  agentId: number,
  reports: AgentBackupReport[],
  tasks: FolderTaskRecord[],
): AgentBackupInsert[] {
  const tasksBySource = new Map(tasks.map((task) => [task.source_path, task]));
  const byTask = new Map<number, AgentBackupInsert>();

  for (const report of reports) {
    const task = tasksBySource.get(report.source_path);
    if (!task) {
      log.debug(`Agent ${agentId} reported unknown source ${report.source_path}`);
      continue;
    }

    const record: AgentBackupInsert = {
      agent_id: agentId,
      task_id: task.id,
      source_path: report.source_path,
      archive_name: report.archive_name ?? null,
      backup_date: parseIsoDate(report.backup_date),
      upload_date: parseIsoDate(report.s3_upload_date),
      artifact_size_mb: report.archive_size_mb ?? null,
      storage_path: report.s3_path ?? null,
      status: report.status,
      error_message: report.error_message ?? null,
    };

    const current = byTask.get(task.id);
    if (!current || isNewer(record, current)) {
      byTask.set(task.id, record);
    }
  }

  return [...byTask.values()];
}

export class AgentReconciler {
  private readonly loop: IntervalLoop;
  private readonly createClient: (agent: AgentRecord) => AgentApi;
  private readonly now: () => Date;

  constructor(private readonly options: AgentReconcilerOptions) {
    const timeoutMs =
      options.requestTimeoutSeconds !== undefined ? options.requestTimeoutSeconds * 1000 : undefined;
    this.createClient =
      options.createClient ?? ((agent) => new AgentClient(agent.ip_address, agent.port, { timeoutMs }));
    this.now = options.now ?? (() => new Date());
    this.loop = new IntervalLoop("agent poll", options.pollIntervalSeconds * 1000, async () => {
      await this.pollAll();
    });
  }

  start(): void {
    this.loop.start();
    log.info(`Agent poller started (every ${this.options.pollIntervalSeconds}s)`);
  }

  stop(): void {
    this.loop.stop();
    log.info("Agent poller stopped");
  }

  /**
   * Poll every active agent in turn. One agent's failure does not stop the rest.
   */
  async pollAll(): Promise<AgentPollResult[]> {
    const results: AgentPollResult[] = [];
    for (const agent of getActiveAgents()) {
      try {
        results.push(await this.pollAgent(agent));
      } catch (err) {
        log.error(`Error polling agent ${agent.id} (${agent.ip_address}): ${errorMessage(err)}`);
      }
    }
    return results;
  }

  async pollAgent(agent: AgentRecord): Promise<AgentPollResult> {
    const client = this.createClient(agent);

    if (!(await client.ping())) {
      setAgentOnline(agent.id, false, this.now().toISOString());
      log.debug(`Agent ${agent.name} is offline`);
      return { agentId: agent.id, online: false, records: null, alerts: [] };
    }

    const systemInfo = await client.getSystemInfo();
    const reports = await client.getBackups();
    const polledAt = this.now().toISOString();

    const { records, alerts } = withTransaction<Pick<AgentPollResult, "records" | "alerts">>(() => {
      if (systemInfo) {
        saveAgentTelemetry(agent.id, toTelemetry(systemInfo), polledAt);
        updateAgentLastSeen(agent.id, polledAt);
      } else {
        setAgentOnline(agent.id, true, polledAt);
      }

      if (!reports) {
        return { records: null, alerts: [] };
      }

      const tasks = getFolderTasksForAgent(agent.id);
      const previous = getAgentBackupStatuses(agent.id);
      const snapshot = buildSnapshot(agent.id, reports, tasks);
      replaceAgentBackupRecords(agent.id, snapshot);

      const taskNames = new Map(tasks.map((task) => [task.id, task.name]));
      const transitions: BackupAlert[] = snapshot
        .filter((record) => record.status === "error" && previous.get(record.task_id) !== "error")
        .map((record) => ({
          taskId: record.task_id,
          taskName: taskNames.get(record.task_id) ?? record.source_path,
          error: record.error_message ?? "Unknown error",
        }));

      return { records: snapshot.length, alerts: transitions };
    });

    for (const alert of alerts) {
      log.warn(`Backup task ${alert.taskName} on agent ${agent.name} failed: ${alert.error}`);
      if (this.options.notifier) {
        await this.options.notifier.sendBackupAlert(alert.taskName, alert.error);
      }
    }

    return { agentId: agent.id, online: true, records, alerts };
  }
}
