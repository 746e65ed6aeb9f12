import { parseArgs } from "node:util";
import { StorageMonitor } from "../../core/storage-monitor";
import { closeDatabase, getAllStorageConfigs, getStorageConfigById } from "../../db";
import { errorMessage } from "../../utils/errors";
import { COMMON_OPTIONS, loadRuntime, parseId } from "../runtime";
import { color, ui } from "../ui";

export async function storageCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      id: { type: "string" },
    },
    allowPositionals: true,
  });

  if (values.help || positionals[0] !== "check") {
    printHelp();
    return values.help ? 0 : 1;
  }

  try {
    const configId = values.id ? parseId(values.id, "Storage id") : null;
    const config = await loadRuntime(values);

    ui.intro("backhaul storage check");

    const targets = configId !== null ? [getStorageConfigById(configId)] : getAllStorageConfigs();
    const monitor = new StorageMonitor({ intervalSeconds: config.storageCheck.intervalSeconds });

    let failures = 0;
    for (const target of targets) {
      if (!target) {
        ui.error(`Storage config ${configId ?? "?"} not found`);
        return 1;
      }

      const result = await monitor.check(target);
      const checked = getStorageConfigById(target.id);
      const label = `${target.name} ${color.dim(`(${target.storage_type})`)}`;

      if (result.ok) {
        const free = checked?.free_space_gb;
        const total = checked?.total_space_gb;
        const space =
          free !== null && free !== undefined && total !== null && total !== undefined
            ? `${free} GB free of ${total} GB`
            : `${checked?.used_space_gb ?? 0} GB used`;
        ui.success(`${label}: ${space}`);
      } else {
        failures += 1;
        ui.error(`${label}: ${result.error ?? "unreachable"}`);
      }
    }

    if (targets.length === 0) {
      ui.info("No storage configured");
    }

    ui.outro(failures === 0 ? "All storage reachable" : `${failures} storage config(s) failed`);
    return failures === 0 ? 0 : 1;
  } catch (error) {
    ui.error(`Storage check failed: ${errorMessage(error)}`);
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
${color.bold("backhaul storage check")} - Test storage connections and record free space

${color.dim("USAGE:")}
  backhaul storage check [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
      --id <id>           Check one storage config only
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
