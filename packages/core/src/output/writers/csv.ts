/**
 * CSV writer: tables only.
 *
 * Each table becomes a header row plus data rows; consecutive tables are
 * separated by a blank line. Alerts are rendered as human text on stderr,
 * and any other element is reported there as unsupported.
 */

import type { RenderedOutput, Status, TableCell, TableElement } from "@corral/sdk";
import { formatCell, humanWriter, tableColumns } from "./human.js";

function quote(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function renderTable(element: TableElement): string {
  const columns = tableColumns(element);
  const row = (cells: TableCell[]): string => `${cells.map((c) => quote(formatCell(c))).join(",")}\r\n`;
  return row(columns) + element.rows.map((r) => row(columns.map((c) => r[c] ?? null))).join("");
}

export function csvWriter(status: Status): RenderedOutput {
  const tables: string[] = [];
  let stderr = "";
  for (const element of status) {
    if (element.type === "table") {
      tables.push(renderTable(element));
    } else if (element.type === "alert") {
      stderr += humanWriter([element]).stderr;
    } else {
      stderr += `csv output cannot show ${element.type} elements\n`;
    }
  }
  return { stdout: tables.join("\r\n"), stderr };
}
