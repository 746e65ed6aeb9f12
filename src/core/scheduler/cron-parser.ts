/**
 * Cron expression parser using cron-parser library
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 * * * *"      - Every hour at minute 0
 *   "0 2 * * *"      - Every day at 2:00 AM
 *   "0 3 * * 0"      - Every Sunday at 3:00 AM
 *   "0,15,30,45 * * * *" - Every 15 minutes
 *
 * Six-field expressions are accepted and lose their seconds field.
 */

import { CronExpressionParser } from "cron-parser";
import { ConfigurationError, errorMessage } from "../../utils/errors";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export interface ParseCronOptions {
  timezone?: string;
}

/**
 * Reduce an expression to five fields, dropping a leading seconds field
 */
export function normalizeCron(expression: string): string {
  const fields = expression.trim().split(/\s+/);
  if (fields.length === 6) {
    return fields.slice(1).join(" ");
  }
  if (fields.length !== 5) {
    throw new ConfigurationError(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }
  return fields.join(" ");
}

export function parseCron(expression: string, options?: ParseCronOptions): ParsedCron {
  const normalized = normalizeCron(expression);

  try {
    const parserOptions = options?.timezone ? { tz: options.timezone } : undefined;
    CronExpressionParser.parse(normalized, parserOptions);
  } catch (error) {
    throw new ConfigurationError(`Invalid cron expression: "${expression}". ${errorMessage(error)}`);
  }

  return { expression: normalized, timezone: options?.timezone };
}

export function getNextRun(cron: ParsedCron, fromDate?: Date): Date {
  const parserOptions: { currentDate?: Date; tz?: string } = {};
  if (fromDate) {
    parserOptions.currentDate = fromDate;
  }
  if (cron.timezone) {
    parserOptions.tz = cron.timezone;
  }
  const interval = CronExpressionParser.parse(
    cron.expression,
    Object.keys(parserOptions).length > 0 ? parserOptions : undefined,
  );
  return interval.next().toDate();
}
