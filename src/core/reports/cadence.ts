/**
 * Report cadence rules
 *
 * Whether a report fires is decided from `last_sent` and the current instant
 * on every check; `next_send` is only for display. All fields are UTC.
 */

import type { ReportDefinitionRecord } from "../../types";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export type CadenceFields = Pick<
  ReportDefinitionRecord,
  | "cadence"
  | "cadence_hour"
  | "cadence_minute"
  | "cadence_day_of_week"
  | "cadence_hours_interval"
  | "last_sent"
>;

function parseLastSent(value: string | null): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function utcMidnight(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function calendarDaysBetween(from: Date, to: Date): number {
  return Math.round((utcMidnight(to) - utcMidnight(from)) / DAY_MS);
}

function atUtcTime(day: Date, hour: number, minute: number): Date {
  return new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate(), hour, minute));
}

export function shouldFire(report: CadenceFields, now: Date): boolean {
  const lastSent = parseLastSent(report.last_sent);
  const minuteMatches = now.getUTCMinutes() === report.cadence_minute;
  const hourMatches = now.getUTCHours() === report.cadence_hour;

  switch (report.cadence) {
    case "daily":
      return minuteMatches && hourMatches && (!lastSent || utcMidnight(lastSent) < utcMidnight(now));
    case "weekly":
      return (
        minuteMatches &&
        hourMatches &&
        now.getUTCDay() === report.cadence_day_of_week &&
        (!lastSent || calendarDaysBetween(lastSent, now) >= 7)
      );
    case "hourly":
      return minuteMatches && (!lastSent || now.getTime() - lastSent.getTime() >= HOUR_MS);
    case "customHours":
      return (
        minuteMatches &&
        (!lastSent || now.getTime() - lastSent.getTime() >= report.cadence_hours_interval * HOUR_MS)
      );
  }
}

/**
 * First instant at minute `minute` of an hour that is strictly after `after`
 */
function nextMinuteMark(after: Date, minute: number): Date {
  const candidate = new Date(after.getTime());
  candidate.setUTCMinutes(minute, 0, 0);
  if (candidate.getTime() <= after.getTime()) {
    candidate.setTime(candidate.getTime() + HOUR_MS);
  }
  return candidate;
}

/**
 * Next instant the report is expected to fire, for display
 */
export function computeNextSend(report: CadenceFields, now: Date): Date {
  const lastSent = parseLastSent(report.last_sent);

  switch (report.cadence) {
    case "daily": {
      const today = atUtcTime(now, report.cadence_hour, report.cadence_minute);
      const alreadySentToday = lastSent !== null && utcMidnight(lastSent) === utcMidnight(now);
      return today.getTime() > now.getTime() && !alreadySentToday ? today : new Date(today.getTime() + DAY_MS);
    }
    case "weekly": {
      const daysAhead = (report.cadence_day_of_week - now.getUTCDay() + 7) % 7;
      let candidate = new Date(atUtcTime(now, report.cadence_hour, report.cadence_minute).getTime() + daysAhead * DAY_MS);
      while (candidate.getTime() <= now.getTime() || (lastSent && calendarDaysBetween(lastSent, candidate) < 7)) {
        candidate = new Date(candidate.getTime() + 7 * DAY_MS);
      }
      return candidate;
    }
    case "hourly": {
      const earliest = lastSent ? new Date(Math.max(now.getTime(), lastSent.getTime() + HOUR_MS - 1)) : now;
      return nextMinuteMark(earliest, report.cadence_minute);
    }
    case "customHours": {
      const interval = report.cadence_hours_interval * HOUR_MS;
      const earliest = lastSent ? new Date(Math.max(now.getTime(), lastSent.getTime() + interval - 1)) : now;
      return nextMinuteMark(earliest, report.cadence_minute);
    }
  }
}
