/**
 * Report definition and send history repository
 */

import type { ReportDefinitionRecord, ReportHistoryRecord, ReportSendStatus } from "../types";
import { getDatabase, withTransaction } from "./connection";
import { parseReportRow, type RawReportRow, serializeIdList, toFlag } from "./mappers";

export type ReportInsert = Pick<ReportDefinitionRecord, "name" | "cadence"> &
  Partial<
    Pick<
      ReportDefinitionRecord,
      | "selected_agent_ids"
      | "selected_database_task_ids"
      | "cadence_hour"
      | "cadence_minute"
      | "cadence_day_of_week"
      | "cadence_hours_interval"
      | "enabled"
      | "send_enabled"
      | "last_sent"
    >
  >;

export function insertReport(report: ReportInsert): ReportDefinitionRecord {
  const result = getDatabase()
    .prepare<{
      name: string;
      selected_agent_ids: string;
      selected_database_task_ids: string;
      cadence: string;
      cadence_hour: number;
      cadence_minute: number;
      cadence_day_of_week: number;
      cadence_hours_interval: number;
      enabled: number;
      send_enabled: number;
      last_sent: string | null;
    }>(
      `INSERT INTO reports (
         name, selected_agent_ids, selected_database_task_ids, cadence, cadence_hour,
         cadence_minute, cadence_day_of_week, cadence_hours_interval, enabled, send_enabled, last_sent
       ) VALUES (
         @name, @selected_agent_ids, @selected_database_task_ids, @cadence, @cadence_hour,
         @cadence_minute, @cadence_day_of_week, @cadence_hours_interval, @enabled, @send_enabled, @last_sent
       )`,
    )
    .run({
      name: report.name,
      selected_agent_ids: serializeIdList(report.selected_agent_ids ?? []),
      selected_database_task_ids: serializeIdList(report.selected_database_task_ids ?? []),
      cadence: report.cadence,
      cadence_hour: report.cadence_hour ?? 9,
      cadence_minute: report.cadence_minute ?? 0,
      cadence_day_of_week: report.cadence_day_of_week ?? 1,
      cadence_hours_interval: report.cadence_hours_interval ?? 24,
      enabled: toFlag(report.enabled ?? true),
      send_enabled: toFlag(report.send_enabled ?? true),
      last_sent: report.last_sent ?? null,
    });

  const inserted = getReportById(Number(result.lastInsertRowid));
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted report: ${report.name}`);
  }
  return inserted;
}

export function getReportById(id: number): ReportDefinitionRecord | null {
  const row = getDatabase().prepare<[number], RawReportRow>("SELECT * FROM reports WHERE id = ?").get(id);
  return row ? parseReportRow(row) : null;
}

/**
 * Reports that are both enabled and allowed to send
 */
export function getDeliverableReports(): ReportDefinitionRecord[] {
  return getDatabase()
    .prepare<[], RawReportRow>("SELECT * FROM reports WHERE enabled = 1 AND send_enabled = 1 ORDER BY id")
    .all()
    .map(parseReportRow);
}

export function updateReportNextSend(id: number, nextSend: string | null): void {
  getDatabase().prepare<[string | null, number]>("UPDATE reports SET next_send = ? WHERE id = ?").run(nextSend, id);
}

/**
 * Record a send attempt. A successful attempt also advances last_sent and next_send.
 */
export function recordReportSend(
  reportId: number,
  attempt: { sentAt: string; status: ReportSendStatus; error: string | null; nextSend: string | null },
): void {
  withTransaction(() => {
    const database = getDatabase();
    database
      .prepare<[number, string, string, string | null]>(
        "INSERT INTO report_history (report_id, sent_at, status, error_message) VALUES (?, ?, ?, ?)",
      )
      .run(reportId, attempt.sentAt, attempt.status, attempt.error);

    if (attempt.status === "success") {
      database
        .prepare<[string, string | null, number]>("UPDATE reports SET last_sent = ?, next_send = ? WHERE id = ?")
        .run(attempt.sentAt, attempt.nextSend, reportId);
    }
  });
}

export function getReportHistory(reportId: number, limit = 50): ReportHistoryRecord[] {
  return getDatabase()
    .prepare<[number, number], ReportHistoryRecord>(
      "SELECT * FROM report_history WHERE report_id = ? ORDER BY sent_at DESC, id DESC LIMIT ?",
    )
    .all(reportId, limit);
}
