/**
 * Status types: what handlers return and writers render.
 *
 * The core treats a status payload as opaque; only writers look inside.
 */

export interface TextElement {
  type: "text";
  text: string;
}

export interface ListElement {
  type: "list";
  title?: string;
  values: string[];
}

export type TableCell = string | number | boolean | null;

export interface TableElement {
  type: "table";
  /** Each row maps column name to cell; column order follows the first row. */
  rows: Array<Record<string, TableCell>>;
}

/** An alert groups elements that must reach the error stream. */
export interface AlertElement {
  type: "alert";
  elements: StatusElement[];
}

export type StatusElement = TextElement | ListElement | TableElement | AlertElement;

/** Bare status payload: rendered with the "human" writer, exit code 0. */
export type Status = readonly StatusElement[];

/** Payload paired with an explicit exit code and writer name. */
export interface ExitStatus {
  kind: "exit";
  status: Status;
  exitCode: number;
  format: string;
}

/** Failure result. Always rendered "human" with exit code 1. */
export interface ErrorStatus {
  kind: "error";
  error: Error;
}

export type HandlerResult = Status | ExitStatus | ErrorStatus;

/** Anything the print entry point accepts. */
export type Printable = HandlerResult | "usage";

export function text(value: string): TextElement {
  return { type: "text", text: value };
}

export function list(values: string[], title?: string): ListElement {
  return title === undefined ? { type: "list", values } : { type: "list", title, values };
}

export function table(rows: Array<Record<string, TableCell>>): TableElement {
  return { type: "table", rows };
}

export function alert(elements: StatusElement[]): AlertElement {
  return { type: "alert", elements };
}

export function exitStatus(exitCode: number, status: Status, format = "human"): ExitStatus {
  return { kind: "exit", status, exitCode, format };
}

export function errorStatus(error: Error): ErrorStatus {
  return { kind: "error", error };
}

export function isExitStatus(result: Printable): result is ExitStatus {
  return typeof result === "object" && !Array.isArray(result) && "kind" in result && result.kind === "exit";
}

export function isErrorStatus(result: Printable): result is ErrorStatus {
  return typeof result === "object" && !Array.isArray(result) && "kind" in result && result.kind === "error";
}
