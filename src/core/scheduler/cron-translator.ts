/**
 * Conversion between simple schedule intents and 5-field cron strings
 */

import { ConfigurationError } from "../../utils/errors";

export type ScheduleKind = "minutely" | "hourly" | "daily" | "weekly";

export const SCHEDULE_KINDS: readonly ScheduleKind[] = ["minutely", "hourly", "daily", "weekly"];

export interface ScheduleIntent {
  kind: ScheduleKind;
  hour?: number;
  minute?: number;
  /** 0 = Sunday ... 6 = Saturday */
  dayOfWeek?: number;
}

const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

export function isScheduleKind(value: unknown): value is ScheduleKind {
  return typeof value === "string" && (SCHEDULE_KINDS as readonly string[]).includes(value);
}

function checkRange(name: string, value: number, max: number): number {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ConfigurationError(`${name} must be an integer between 0 and ${max}, got ${value}`);
  }
  return value;
}

/**
 * Only the fields a kind uses are range-checked
 */
export function toCron(kind: ScheduleKind, hour?: number, minute?: number, dayOfWeek?: number): string {
  switch (kind) {
    case "minutely":
      return "* * * * *";
    case "hourly":
      return `${checkRange("minute", minute ?? 0, 59)} * * * *`;
    case "daily":
      return `${checkRange("minute", minute ?? 0, 59)} ${checkRange("hour", hour ?? 0, 23)} * * *`;
    case "weekly": {
      const m = checkRange("minute", minute ?? 0, 59);
      const h = checkRange("hour", hour ?? 0, 23);
      return `${m} ${h} * * ${checkRange("dayOfWeek", dayOfWeek ?? 0, 6)}`;
    }
  }
}

function plainInt(field: string, max: number): number | null {
  if (!/^\d{1,2}$/.test(field)) return null;
  const value = Number(field);
  return value <= max ? value : null;
}

/**
 * Classify an expression as one of the four intents, in order: minutely,
 * hourly, daily, weekly. Anything else (day-of-month or month fixed, ranges,
 * steps, six fields) returns null.
 */
export function fromCron(expression: string): ScheduleIntent | null {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) return null;

  const [minute = "", hour = "", day = "", month = "", dayOfWeek = ""] = fields;
  if (day !== "*" || month !== "*") return null;

  if (minute === "*" && hour === "*" && dayOfWeek === "*") {
    return { kind: "minutely" };
  }

  const m = plainInt(minute, 59);
  if (m === null) return null;

  if (hour === "*") {
    return dayOfWeek === "*" ? { kind: "hourly", minute: m } : null;
  }

  const h = plainInt(hour, 23);
  if (h === null) return null;

  if (dayOfWeek === "*") {
    return { kind: "daily", hour: h, minute: m };
  }

  const d = plainInt(dayOfWeek, 6);
  if (d === null) return null;
  return { kind: "weekly", hour: h, minute: m, dayOfWeek: d };
}

function clock(hour: number, minute: number): string {
  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

/**
 * Human label for a cron expression, or the expression itself when it is not
 * one of the supported shapes
 */
export function describeSchedule(expression: string): string {
  const intent = fromCron(expression);
  if (!intent) return `cron: ${expression}`;

  switch (intent.kind) {
    case "minutely":
      return "Every minute";
    case "hourly":
      return `Every hour at minute ${intent.minute ?? 0}`;
    case "daily":
      return `Every day at ${clock(intent.hour ?? 0, intent.minute ?? 0)}`;
    case "weekly":
      return `Every ${DAY_NAMES[intent.dayOfWeek ?? 0]} at ${clock(intent.hour ?? 0, intent.minute ?? 0)}`;
  }
}

export function dayOfWeekOptions(): { value: number; label: string }[] {
  return DAY_NAMES.map((label, value) => ({ value, label }));
}
