import { parseArgs } from "node:util";
import { getNextRun, parseCron } from "../../core/scheduler/cron-parser";
import {
  dayOfWeekOptions,
  describeSchedule,
  fromCron,
  isScheduleKind,
  SCHEDULE_KINDS,
  type ScheduleIntent,
  type ScheduleKind,
  toCron,
} from "../../core/scheduler/cron-translator";
import { errorMessage } from "../../utils/errors";
import { color, ui } from "../ui";

function parseField(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new Error(`${label} must be a non-negative integer, got: ${value}`);
  }
  return Number.parseInt(value, 10);
}

async function askNumber(message: string, max: number): Promise<number | null> {
  const answer = await ui.text({
    message,
    placeholder: "0",
    defaultValue: "0",
    validate: (value) => {
      if (value === "") return undefined;
      const n = Number(value);
      return /^\d+$/.test(value) && n <= max ? undefined : `Enter a number between 0 and ${max}`;
    },
  });
  if (ui.isCancel(answer)) return null;
  return answer === "" ? 0 : Number.parseInt(answer, 10);
}

/**
 * Fill a schedule interactively when no kind was given on the command line
 */
async function promptIntent(): Promise<ScheduleIntent | null> {
  const kind = await ui.select<{ value: ScheduleKind; label: string }[], ScheduleKind>({
    message: "How often should the task run?",
    options: SCHEDULE_KINDS.map((value) => ({ value, label: value })),
  });
  if (ui.isCancel(kind)) return null;
  if (kind === "minutely") return { kind };

  const minute = await askNumber("Minute (0-59)", 59);
  if (minute === null) return null;
  if (kind === "hourly") return { kind, minute };

  const hour = await askNumber("Hour (0-23, server time)", 23);
  if (hour === null) return null;
  if (kind === "daily") return { kind, hour, minute };

  const dayOfWeek = await ui.select<{ value: number; label: string }[], number>({
    message: "Day of week",
    options: dayOfWeekOptions(),
  });
  if (ui.isCancel(dayOfWeek)) return null;
  return { kind, hour, minute, dayOfWeek };
}

export async function cronCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      hour: { type: "string" },
      minute: { type: "string", short: "m" },
      day: { type: "string", short: "d" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  const [action, argument] = positionals;

  if (values.help || (action !== "to" && action !== "from")) {
    printHelp();
    return values.help ? 0 : 1;
  }

  try {
    if (action === "from") {
      if (!argument) {
        ui.error("Missing cron expression");
        return 1;
      }
      const intent = fromCron(argument);
      const next = getNextRun(parseCron(argument));
      console.log(
        JSON.stringify({ expression: argument, intent, description: describeSchedule(argument), nextRun: next.toISOString() }, null, 2),
      );
      return intent ? 0 : 1;
    }

    let intent: ScheduleIntent | null;
    if (argument === undefined) {
      if (!process.stdin.isTTY) {
        ui.error("Missing schedule kind");
        return 1;
      }
      intent = await promptIntent();
      if (!intent) {
        ui.cancel("Cancelled");
        return 0;
      }
    } else if (isScheduleKind(argument)) {
      intent = {
        kind: argument,
        hour: parseField(values.hour, "Hour"),
        minute: parseField(values.minute, "Minute"),
        dayOfWeek: parseField(values.day, "Day of week"),
      };
    } else {
      ui.error(`Unknown schedule kind: ${argument} (expected ${SCHEDULE_KINDS.join(", ")})`);
      return 1;
    }

    console.log(toCron(intent.kind, intent.hour, intent.minute, intent.dayOfWeek));
    return 0;
  } catch (error) {
    ui.error(errorMessage(error));
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backhaul cron")} - Convert between schedules and cron expressions

${color.dim("USAGE:")}
  backhaul cron to [kind] [--hour H] [--minute M] [--day D]
  backhaul cron from "<expression>"

${color.dim("KINDS:")}
  minutely, hourly, daily, weekly   (day: 0 = Sunday ... 6 = Saturday)

${color.dim("EXAMPLES:")}
  backhaul cron to daily --hour 2 --minute 30    # 30 2 * * *
  backhaul cron to weekly --hour 3 --day 0       # 0 3 * * 0
  backhaul cron from "15 * * * *"                # hourly at minute 15
  backhaul cron to                               # Interactive
`);
}
