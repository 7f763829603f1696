/*
Purpose: render thrown errors and run outcomes for the terminal.
Assumptions: errors go to stderr; color only on a TTY without NO_COLOR.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import type { PipelineResult } from "../core/pipeline.js";

export type CliFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = { label?: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

function resolveFormatter(options: CliFormatOptions, fallback: { isTTY?: boolean }): AnsiFormatter {
  const stream = options.stream ?? fallback;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

// =============================================================================
// ERRORS
// =============================================================================

export function renderCliError(error: unknown, options: CliFormatOptions = {}): string {
  const format = resolveFormatter(options, process.stderr);
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style.label) {
    return line.text;
  }

  const label = format(style.label, style.labelStyles);
  if (line.kind === "stack") {
    return `${label}\n${format(indentMultiline(line.text, 2), style.textStyles)}`;
  }
  return `${label} ${format(line.text, style.textStyles)}`;
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}

// =============================================================================
// RUN OUTCOME
// =============================================================================

export function renderRunOutcome(
  result: PipelineResult,
  label: string,
  options: CliFormatOptions = {},
): string {
  const format = resolveFormatter(options, process.stdout);

  switch (result.status) {
    case "succeeded":
      return format(`${label} completed successfully.`, ["green", "bold"]);
    case "interrupted":
      return format(`${label} interrupted.`, ["yellow", "bold"]);
    case "failed":
      return format(`${label} failed at step: ${result.failedStep ?? "unknown"}`, ["red", "bold"]);
    case "errored":
      return format(
        `${label} stopped by an unexpected error in ${result.failedStep ?? "unknown"}: ${result.error ?? ""}`,
        ["red", "bold"],
      );
  }
}
