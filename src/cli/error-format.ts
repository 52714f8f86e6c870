/*
Purpose: render errors for the terminal, task partition first when a release task failed.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug: isDebugEnabled }));
*/

import { TaskFailureError } from "../app/release/task-failure.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

import { formatTaskReport, type TaskPartition } from "./report.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
  env?: NodeJS.ProcessEnv;
};

type LabeledKind = Exclude<ErrorFormatLineKind, "title" | "message" | "stack">;

const LABELS: Record<LabeledKind, { label: string; styles: AnsiStyle[]; dimText: boolean }> = {
  hint: { label: "Hint:", styles: ["yellow"], dimText: false },
  next: { label: "Next:", styles: ["cyan"], dimText: false },
  code: { label: "Code:", styles: ["dim"], dimText: true },
  name: { label: "Name:", styles: ["dim"], dimText: true },
  cause: { label: "Cause:", styles: ["dim"], dimText: true },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream, useColor: options.useColor, env: options.env }),
  );

  const blocks: string[] = [];
  const partition = findTaskPartition(error);
  if (partition) {
    blocks.push(formatTaskReport(partition, format), "");
  }

  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  blocks.push(...lines.map((line) => renderLine(line, format)));
  return blocks.join("\n");
}

/** The completed/incomplete split of the first task failure in the cause chain. */
export function findTaskPartition(error: unknown): TaskPartition | null {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof TaskFailureError) {
      return { completed: current.completed, incomplete: current.incomplete };
    }
    seen.add(current);
    current = current.cause;
  }
  return null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const kind = line.kind;
  switch (kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text), ["dim"])}`;
    default: {
      const { label, styles, dimText } = LABELS[kind];
      return `${format(label, styles)} ${dimText ? format(line.text, ["dim"]) : line.text}`;
    }
  }
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}
