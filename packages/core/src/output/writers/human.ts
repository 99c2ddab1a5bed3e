/**
 * Human writer: plain text for terminals.
 *
 * Alerts (and everything nested in them) go to stderr; everything else to
 * stdout. Tables are column-aligned under a dashed rule.
 */

import type { ListElement, RenderedOutput, Status, StatusElement, TableCell, TableElement } from "@corral/sdk";

const COLUMN_GAP = "  ";

export function formatCell(cell: TableCell): string {
  return cell === null ? "" : String(cell);
}

/** Column names in first-seen order across all rows. */
export function tableColumns(element: TableElement): string[] {
  const columns: string[] = [];
  for (const row of element.rows) {
    for (const column of Object.keys(row)) {
      if (!columns.includes(column)) columns.push(column);
    }
  }
  return columns;
}

function renderTable(element: TableElement): string {
  if (element.rows.length === 0) return "";
  const columns = tableColumns(element);
  const cells = element.rows.map((row) => columns.map((c) => formatCell(row[c] ?? null)));
  const widths = columns.map((c, i) => Math.max(c.length, ...cells.map((r) => r[i].length)));
  const line = (values: string[]): string =>
    values.map((v, i) => v.padEnd(widths[i])).join(COLUMN_GAP).trimEnd();
  const rule = "-".repeat(widths.reduce((sum, w) => sum + w, 0) + COLUMN_GAP.length * (widths.length - 1));
  return [line(columns), rule, ...cells.map(line)].map((l) => `${l}\n`).join("");
}

function renderList(element: ListElement): string {
  if (element.title === undefined) {
    return element.values.map((v) => `${v}\n`).join("");
  }
  return `${element.title}:\n${element.values.map((v) => `  ${v}\n`).join("")}`;
}

function renderElement(element: StatusElement): string {
  switch (element.type) {
    case "text":
      return element.text.endsWith("\n") ? element.text : `${element.text}\n`;
    case "list":
      return renderList(element);
    case "table":
      return renderTable(element);
    case "alert":
      return element.elements.map(renderElement).join("");
  }
}

export function humanWriter(status: Status): RenderedOutput {
  let stdout = "";
  let stderr = "";
  for (const element of status) {
    if (element.type === "alert") {
      stderr += renderElement(element);
    } else {
      stdout += renderElement(element);
    }
  }
  return { stdout, stderr };
}
