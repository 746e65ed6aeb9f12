import { parseArgs } from "node:util";
import { TaskScheduler } from "../../core/scheduler/task-scheduler";
import { closeDatabase } from "../../db";
import { errorMessage } from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import { COMMON_OPTIONS, createExecutor, loadRuntime, parseId } from "../runtime";
import { color, formatSummary, ui } from "../ui";

export async function runCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: { ...COMMON_OPTIONS },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const taskId = parseId(positionals[0], "Task id");
    const config = await loadRuntime(values);

    ui.intro(`backhaul run ${taskId}`);

    const scheduler = new TaskScheduler({
      executor: createExecutor(config),
      backupNamespace: config.scheduler.backupNamespace,
      resyncIntervalSeconds: config.scheduler.resyncIntervalSeconds,
    });

    const s = ui.spinner();
    s.start(`Running task ${taskId}...`);
    const outcome = await scheduler.runTaskNow(taskId);
    s.stop("Finished");

    if (!outcome) {
      ui.warn(`Task ${taskId} is already running`);
      return 1;
    }

    if (outcome.status === "error") {
      ui.error(`Backup failed: ${outcome.error ?? "unknown error"}`);
      return 1;
    }

    ui.note(
      formatSummary([
        { label: "History", value: outcome.historyId },
        { label: "Artifact", value: outcome.result?.artifactFilename },
        { label: "Size", value: outcome.result ? `${outcome.result.artifactSizeMB} MB` : null },
        { label: "Duration", value: outcome.result ? formatDuration(outcome.result.durationSeconds * 1000) : null },
        { label: "Stored at", value: outcome.result?.storagePath },
        { label: "Expired removed", value: outcome.retention?.deleted.length },
      ]),
      "Backup",
    );
    ui.outro("Backup complete");
    return 0;
  } catch (error) {
    ui.error(`Run failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  } finally {
    closeDatabase();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backhaul run")} - Run a database backup task now

${color.dim("USAGE:")}
  backhaul run <taskId> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Dumps the task's database, uploads the artifact, records a history row and
  applies the task's retention policy when cleanup is enabled.
`);
}
