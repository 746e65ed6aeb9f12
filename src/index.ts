#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../package.json";
import { agentTaskCommand } from "./cli/commands/agent-task";
import { cronCommand } from "./cli/commands/cron";
import { encryptPasswordCommand } from "./cli/commands/encrypt-password";
import { historyCommand } from "./cli/commands/history";
import { restoreCommand } from "./cli/commands/restore";
import { runCommand } from "./cli/commands/run";
import { startCommand } from "./cli/commands/start";
import { storageCommand } from "./cli/commands/storage";

const VERSION = pkg.version;

function printHelp(): void {
  p.intro(`${color.cyan("backhaul")} ${color.dim(`v${VERSION}`)} - Backup orchestration for databases and agents`);

  p.note(
    `${color.cyan("start")}              Start the backup daemon
${color.cyan("run")}                Run a database backup task now
${color.cyan("restore")}            Restore a database from a recorded backup
${color.cyan("history")}            List database backup history
${color.cyan("storage check")}      Test storage connections and free space
${color.cyan("cron")}               Convert between schedules and cron expressions
${color.cyan("agent-task")}         Push or run folder backup tasks on agents
${color.cyan("encrypt-password")}   Encrypt a database password for storage`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `backhaul start                      ${color.dim("# Start the daemon")}
backhaul run 3                      ${color.dim("# Back up task 3 now")}
backhaul history --task 3           ${color.dim("# Recent runs of task 3")}
backhaul restore 42 -t scratch      ${color.dim("# Restore into another database")}
backhaul cron to daily --hour 2     ${color.dim("# Print 0 2 * * *")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("backhaul <command> --help")} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "run":
      return runCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "history":
      return historyCommand(commandArgs);

    case "storage":
      return storageCommand(commandArgs);

    case "cron":
      return cronCommand(commandArgs);

    case "agent-task":
      return agentTaskCommand(commandArgs);

    case "encrypt-password":
      return encryptPasswordCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("backhaul --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
