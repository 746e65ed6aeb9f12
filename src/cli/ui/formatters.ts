/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { RunStatus } from "../../types";

export const HISTORY_WIDTHS = {
  id: 6,
  task: 6,
  status: 8,
  started: 20,
  duration: 9,
  size: 10,
  artifact: 44,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

export function colorStatus(status: RunStatus | null): string {
  switch (status) {
    case "success":
      return color.green(status);
    case "error":
      return color.red(status);
    case "running":
      return color.yellow(status);
    default:
      return color.dim("never");
  }
}
