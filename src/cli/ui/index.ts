/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { colorStatus, formatSummary, formatTableRow, formatTableSeparator, HISTORY_WIDTHS } from "./formatters";
// Output
export {
  cancel,
  color,
  error,
  info,
  intro,
  message,
  note,
  outro,
  spinner,
  step,
  success,
  warn,
} from "./output";
// Prompts
export { confirm, isCancel, password, select, text } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
  message: output.message,
  spinner: output.spinner,
  confirm: prompts.confirm,
  select: prompts.select,
  text: prompts.text,
  password: prompts.password,
  isCancel: prompts.isCancel,
};
