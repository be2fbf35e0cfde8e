/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export {
  formatStatusTable,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  STATUS_TABLE_WIDTHS,
} from "./formatters";
// Output
export {
  banner,
  CLI_NAME,
  color,
  error,
  info,
  note,
  outro,
  spinner,
  step,
  success,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const ui = {
  banner: output.banner,
  outro: output.outro,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
  spinner: output.spinner,
};
