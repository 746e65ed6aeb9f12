/**
 * Backup status report text
 */

import {
  countHistorySince,
  getAgentBackupRecords,
  getAgentStatus,
  getAgentsByIds,
  getDatabaseTasksByIds,
  getFolderTasksForAgent,
} from "../../db";
import type { AgentStatusRecord, ReportDefinitionRecord, RunStatus } from "../../types";
import { formatAlertTime } from "../notifications/webhook";

const STATS_WINDOW_MS = 24 * 60 * 60 * 1000;

export type ReportSelection = Pick<ReportDefinitionRecord, "selected_agent_ids" | "selected_database_task_ids">;

function statusIcon(status: RunStatus): string {
  if (status === "success") return "✅";
  if (status === "error") return "❌";
  return "⏳";
}

function formatTimestamp(value: string): string {
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : formatAlertTime(parsed);
}

function describeAgentStatus(status: AgentStatusRecord): string[] {
  const lines = [`- Status: ${status.is_online ? "🟢 Online" : "🔴 Offline"}`];

  if (status.disk_total_gb && status.disk_free_gb !== null) {
    const used = status.disk_total_gb - status.disk_free_gb;
    const percent = (used / status.disk_total_gb) * 100;
    lines.push(`- Disk: ${used.toFixed(2)} / ${status.disk_total_gb.toFixed(2)} GB (${percent.toFixed(1)}%)`);
  }
  if (status.memory_total_mb && status.memory_free_mb !== null) {
    const used = status.memory_total_mb - status.memory_free_mb;
    const percent = (used / status.memory_total_mb) * 100;
    lines.push(`- Memory: ${used.toFixed(2)} / ${status.memory_total_mb.toFixed(2)} MB (${percent.toFixed(1)}%)`);
  }
  if (status.cpu_load_percent !== null) {
    lines.push(`- CPU: ${status.cpu_load_percent.toFixed(1)}%`);
  }
  return lines;
}

function agentSection(agentIds: number[]): string[] {
  const lines = ["### 🤖 Agents", ""];
  for (const agent of getAgentsByIds(agentIds)) {
    lines.push(`**${agent.name}** (${agent.ip_address})`);
    const status = getAgentStatus(agent.id);
    if (status) {
      lines.push(...describeAgentStatus(status));
    } else {
      lines.push("- Status: ⚠️ Unknown");
    }
    lines.push("");
  }
  return lines;
}

function folderTaskSection(agentIds: number[]): string[] {
  const lines = ["### 📁 Folder backup tasks", ""];
  const tasks = agentIds.flatMap((id) => getFolderTasksForAgent(id));

  if (tasks.length === 0) {
    lines.push("No tasks for the selected agents", "");
    return lines;
  }

  for (const task of tasks) {
    lines.push(`**${task.name}**`);
    lines.push(`- Path: \`${task.source_path}\``);
    lines.push(`- State: ${task.is_active ? "✅ Active" : "❌ Inactive"}`);
    if (task.last_status) {
      lines.push(`- Last status: ${statusIcon(task.last_status)} ${task.last_status}`);
    }
    if (task.last_run) {
      lines.push(`- Last run: ${formatTimestamp(task.last_run)}`);
    }
    lines.push("");
  }
  return lines;
}

function databaseTaskSection(taskIds: number[]): string[] {
  const lines = ["### 🗄️ Database backup tasks", ""];
  const tasks = getDatabaseTasksByIds(taskIds);

  if (tasks.length === 0) {
    lines.push("No tasks for the selected databases", "");
    return lines;
  }

  for (const task of tasks) {
    lines.push(`**${task.name}**`);
    lines.push(`- Database: \`${task.database_name}\``);
    lines.push(`- Host: ${task.host}:${task.port}`);
    lines.push(`- State: ${task.is_active ? "✅ Active" : "❌ Inactive"}`);
    if (task.last_status) {
      lines.push(`- Last status: ${statusIcon(task.last_status)} ${task.last_status}`);
    }
    if (task.last_run) {
      lines.push(`- Last run: ${formatTimestamp(task.last_run)}`);
    }
    lines.push("");
  }
  return lines;
}

/**
 * Folder backups reported by the selected agents within the window
 */
function countAgentBackupsSince(agentIds: number[], since: Date): { success: number; error: number } {
  const counts = { success: 0, error: 0 };
  for (const agentId of agentIds) {
    for (const record of getAgentBackupRecords(agentId)) {
      if (!record.backup_date || new Date(record.backup_date).getTime() < since.getTime()) continue;
      if (record.status === "success") counts.success += 1;
      if (record.status === "error") counts.error += 1;
    }
  }
  return counts;
}

export function generateReport(selection: ReportSelection, now: Date = new Date()): string {
  const agentIds = selection.selected_agent_ids;
  const taskIds = selection.selected_database_task_ids;
  const since = new Date(now.getTime() - STATS_WINDOW_MS);

  const lines = ["## 📊 Backup report", "", `**Generated:** ${formatAlertTime(now)} UTC`, ""];

  if (agentIds.length > 0) {
    lines.push(...agentSection(agentIds), ...folderTaskSection(agentIds));
  }
  if (taskIds.length > 0) {
    lines.push(...databaseTaskSection(taskIds));
  }

  lines.push("### 📈 Last 24 hours", "");
  if (agentIds.length > 0) {
    const folder = countAgentBackupsSince(agentIds, since);
    lines.push(`- Folder backups: ✅ ${folder.success} succeeded, ❌ ${folder.error} failed`);
  }
  if (taskIds.length > 0) {
    const database = countHistorySince(since.toISOString(), taskIds);
    lines.push(`- Database backups: ✅ ${database.success} succeeded, ❌ ${database.error} failed`);
  }

  lines.push("", "---", "*Generated by backhaul*");
  return lines.join("\n");
}
