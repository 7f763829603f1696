/*
Purpose: console side of the build log (echo sink) plus the shared ANSI formatter for CLI output.
Assumptions: stdout carries progress; warnings and errors go to stderr.
Usage: createRunLogger({ ..., sink: createConsoleSink({ verbose }) }).
*/

import { createAnsiFormatter, resolveColorEnabled, type AnsiFormatter } from "./error-format.js";
import type { LogLevel, LogSink } from "./logger.js";

export type ConsoleWriter = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type ConsoleSinkOptions = {
  verbose?: boolean;
  useColor?: boolean;
  writer?: ConsoleWriter;
};

const defaultWriter: ConsoleWriter = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createConsoleFormatter(useColor?: boolean): AnsiFormatter {
  return createAnsiFormatter(resolveColorEnabled({ stream: process.stdout, useColor }));
}

export function createConsoleSink(options: ConsoleSinkOptions = {}): LogSink {
  const writer = options.writer ?? defaultWriter;
  const format = createConsoleFormatter(options.useColor);
  const verbose = options.verbose ?? false;

  return (level, message) => {
    if (level === "debug" && !verbose) return;

    const line = renderLogLine(level, message, format);
    if (level === "warn" || level === "error") {
      writer.err(line);
    } else {
      writer.out(line);
    }
  };
}

export function renderLogLine(level: LogLevel, message: string, format: AnsiFormatter): string {
  switch (level) {
    case "debug":
      return format(`DEBUG ${message}`, ["dim"]);
    case "info":
      return message;
    case "warn":
      return `${format("WARN", ["yellow", "bold"])} ${message}`;
    case "error":
      return `${format("ERROR", ["red", "bold"])} ${message}`;
  }
}
