import { parseArgs } from "node:util";
import { closeDatabase, getDatabaseTaskById, getHistoryById } from "../../db";
import { createStorageBackend, resolveTaskStorage } from "../../storage";
import { errorMessage } from "../../utils/errors";
import { COMMON_OPTIONS, createExecutor, loadRuntime, parseId } from "../runtime";
import { color, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "target-db": { type: "string", short: "t" },
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const historyId = parseId(positionals[0], "History id");
    const config = await loadRuntime(values);

    ui.intro("backhaul restore");

    const history = getHistoryById(historyId);
    if (!history) {
      ui.error(`History entry ${historyId} not found`);
      return 1;
    }
    if (history.status !== "success" || !history.storage_path) {
      ui.error(`History entry ${historyId} has no uploaded artifact (status: ${history.status})`);
      return 1;
    }

    const task = getDatabaseTaskById(history.task_id);
    if (!task) {
      ui.error(`Task ${history.task_id} for history entry ${historyId} no longer exists`);
      return 1;
    }

    const targetDatabase = values["target-db"] ?? task.database_name;
    ui.note(
      formatSummary([
        { label: "Artifact", value: history.artifact_filename },
        { label: "Source", value: history.storage_path },
        { label: "Server", value: `${task.host}:${task.port}` },
        { label: "Database", value: targetDatabase },
      ]),
      "Restore",
    );

    if (!values.yes) {
      const confirmed = await ui.confirm({
        message: `Existing objects in ${targetDatabase} will be replaced. Continue?`,
        initialValue: false,
      });
      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Restore cancelled");
        return 0;
      }
    }

    const backend = createStorageBackend(resolveTaskStorage(task));
    const s = ui.spinner();
    s.start("Restoring...");
    try {
      await createExecutor(config).restore(task, backend, history.storage_path, {
        targetDatabase: values["target-db"],
      });
    } catch (error) {
      s.stop("Restore failed");
      throw error;
    }
    s.stop("Restored");

    ui.outro(`Database ${targetDatabase} restored from ${history.artifact_filename ?? history.storage_path}`);
    return 0;
  } catch (error) {
    ui.error(`Restore failed: ${errorMessage(error)}`);
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
${color.bold("backhaul restore")} - Restore a database from a recorded backup

${color.dim("USAGE:")}
  backhaul restore <historyId> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -t, --target-db <name>  Database to restore into (default: the task's database)
  -y, --yes               Skip confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  backhaul history --task 3                # Find the history id
  backhaul restore 42 --target-db scratch  # Restore into another database
`);
}
