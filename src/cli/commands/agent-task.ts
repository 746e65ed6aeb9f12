import { parseArgs } from "node:util";
import { FolderTaskRelay } from "../../core/agents/relay";
import { closeDatabase } from "../../db";
import { errorMessage } from "../../utils/errors";
import { COMMON_OPTIONS, loadRuntime, parseId } from "../runtime";
import { color, formatSummary, ui } from "../ui";

export async function agentTaskCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: { ...COMMON_OPTIONS },
    allowPositionals: true,
  });

  const [action, rawId] = positionals;

  if (values.help || (action !== "push" && action !== "run")) {
    printHelp();
    return values.help ? 0 : 1;
  }

  try {
    const taskId = parseId(rawId, "Folder task id");
    const config = await loadRuntime(values);
    const relay = new FolderTaskRelay({ requestTimeoutSeconds: config.agents.requestTimeoutSeconds });

    ui.intro(`backhaul agent-task ${action}`);

    if (action === "push") {
      const accepted = await relay.push(taskId);
      if (!accepted) {
        ui.error(`Agent did not accept folder task ${taskId}`);
        return 1;
      }
      ui.outro(`Folder task ${taskId} pushed`);
      return 0;
    }

    const s = ui.spinner();
    s.start(`Running folder task ${taskId} on its agent...`);
    const result = await relay.trigger(taskId);
    s.stop(result.success ? "Finished" : "Failed");

    if (!result.success) {
      ui.error(`Agent reported failure: ${result.error ?? "unknown error"}`);
      return 1;
    }

    ui.note(
      formatSummary([
        { label: "Files", value: result.files_count },
        { label: "Size", value: result.archive_size },
        { label: "Stored at", value: result.s3_path },
      ]),
      "Result",
    );
    ui.outro("Folder backup complete");
    return 0;
  } catch (error) {
    ui.error(`Agent task failed: ${errorMessage(error)}`);
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
${color.bold("backhaul agent-task")} - Send folder backup tasks to their agents

${color.dim("USAGE:")}
  backhaul agent-task push <id>    Send the task definition and schedule
  backhaul agent-task run <id>     Run the task on its agent now

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
