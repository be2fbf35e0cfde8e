/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { ServiceStatus } from "../../types";

export const STATUS_TABLE_WIDTHS = {
  service: 16,
  state: 10,
  health: 10,
  status: 30,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const visible = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...visible.map((i) => i.label.length));
  return visible.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

function colorState(service: ServiceStatus, text: string): string {
  if (!service.running) return color.red(text);
  return service.healthy ? color.green(text) : color.yellow(text);
}

export function formatStatusTable(services: ServiceStatus[]): string {
  const widths = [
    STATUS_TABLE_WIDTHS.service,
    STATUS_TABLE_WIDTHS.state,
    STATUS_TABLE_WIDTHS.health,
    STATUS_TABLE_WIDTHS.status,
  ];

  const rows = services.map((s) => {
    const cells = [s.service, s.state, s.health === "none" ? "-" : s.health, s.status];
    const padded = cells.map((cell, i) => cell.padEnd(widths[i] ?? 0));
    return padded
      .map((cell, i) => (i === 1 ? colorState(s, cell) : cell))
      .join(color.dim(" │ "));
  });

  return [
    formatTableRow(["SERVICE", "STATE", "HEALTH", "STATUS"], widths),
    formatTableSeparator(widths),
    ...rows,
  ].join("\n");
}
