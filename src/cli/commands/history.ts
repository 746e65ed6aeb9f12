import { parseArgs } from "node:util";
import { closeDatabase, getHistoryForTask, getRecentHistory } from "../../db";
import type { DatabaseHistoryRecord } from "../../types";
import { errorMessage } from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import { COMMON_OPTIONS, loadRuntime, parseId } from "../runtime";
import { color, colorStatus, formatTableRow, formatTableSeparator, HISTORY_WIDTHS, ui } from "../ui";

export async function historyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      task: { type: "string", short: "t" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const limit = values.limit ? parseId(values.limit, "Limit") : 50;
    const taskId = values.task ? parseId(values.task, "Task id") : null;
    await loadRuntime(values);

    const rows = taskId !== null ? getHistoryForTask(taskId, limit) : getRecentHistory(limit);

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(rows, null, 2));
        return 0;
      case "csv":
        printCsv(rows);
        return 0;
      default:
        ui.intro("backhaul history");
        if (rows.length === 0) {
          ui.info("No backup history found");
          ui.outro("Done");
          return 0;
        }
        printTable(rows);
        ui.outro(`${rows.length} entr${rows.length === 1 ? "y" : "ies"}`);
        return 0;
    }
  } catch (error) {
    ui.error(`History failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  } finally {
    closeDatabase();
  }
}

function printTable(rows: DatabaseHistoryRecord[]): void {
  const widths = Object.values(HISTORY_WIDTHS);
  console.log(formatTableRow(["ID", "Task", "Status", "Started", "Duration", "Size", "Artifact"], widths));
  console.log(formatTableSeparator(widths));

  for (const row of rows) {
    // Pad before coloring so ANSI codes do not skew the column
    const status = colorStatus(row.status) + " ".repeat(Math.max(0, HISTORY_WIDTHS.status - row.status.length));
    console.log(
      formatTableRow(
        [
          String(row.id),
          String(row.task_id),
          status,
          row.started_at.slice(0, 19).replace("T", " "),
          row.duration_seconds !== null ? formatDuration(row.duration_seconds * 1000) : "-",
          row.artifact_size_mb !== null ? `${row.artifact_size_mb} MB` : "-",
          row.artifact_filename ?? color.dim(row.error_message ?? "-"),
        ],
        widths,
      ),
    );
  }
}

function printCsv(rows: DatabaseHistoryRecord[]): void {
  console.log("id,task_id,status,started_at,finished_at,duration_seconds,artifact_size_mb,storage_path");
  for (const row of rows) {
    console.log(
      [
        row.id,
        row.task_id,
        row.status,
        row.started_at,
        row.finished_at ?? "",
        row.duration_seconds ?? "",
        row.artifact_size_mb ?? "",
        row.storage_path ?? "",
      ].join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backhaul history")} - List database backup history

${color.dim("USAGE:")}
  backhaul history [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -t, --task <id>         Only entries for this task
  -n, --limit <n>         Maximum entries (default: 50)
      --format <fmt>      Output format: table, json, csv (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
