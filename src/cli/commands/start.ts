import { parseArgs } from "node:util";
import { Daemon } from "../../core/scheduler/daemon";
import { closeDatabase } from "../../db";
import { errorMessage } from "../../utils/errors";
import { COMMON_OPTIONS, loadRuntime } from "../runtime";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: { ...COMMON_OPTIONS },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadRuntime(values);

    ui.intro("backhaul daemon");

    const daemon = new Daemon(config);
    const stopped = new Promise<void>((resolve) => {
      const shutdown = () => {
        ui.cancel("Shutting down...");
        daemon.stop();
        closeDatabase();
        resolve();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    daemon.start();

    const jobs = daemon.scheduler.getStatus();
    if (jobs.length === 0) {
      ui.warn("No active database backup tasks");
    } else {
      ui.step("Scheduled tasks:");
      for (const job of jobs) {
        ui.message(
          `  ${color.cyan(job.jobId.padEnd(14))} ${color.dim(job.cron.padEnd(15))} ${color.dim("next:")} ${job.nextRun.toISOString()}`,
        );
      }
    }

    ui.success("Daemon is running");
    ui.info("Press Ctrl+C to stop");

    await stopped;
    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backhaul start")} - Start the backup daemon

${color.dim("USAGE:")}
  backhaul start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./backhaul.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Runs the database backup scheduler, the agent poller, the report scheduler
  and the periodic storage check until SIGINT or SIGTERM. Active tasks are
  re-read from the database on every resync pass.

${color.dim("SCHEDULE FORMAT:")}
  Tasks use standard cron format: minute hour day-of-month month day-of-week.
  A leading seconds field is accepted and ignored.

${color.dim("EXAMPLES:")}
  backhaul start                           # Start with default config
  backhaul start -c /etc/backhaul.yaml     # Start with specific config
  backhaul start -v                        # Start with verbose logging
`);
}
