import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { formatLogTimestamp, isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = JsonObject & {
  ts: string;
  level: LogLevel;
  type: string;
  run_id: string;
  message: string;
};

export type LogFields = JsonObject & { type?: string };

/** Receives every event for console echo; filtering by level is the sink's call. */
export type LogSink = (level: LogLevel, message: string) => void;

type LogFailureAction = "write" | "close";

const DEFAULT_EVENT_TYPE = "log";

// =============================================================================
// LOGGER
// =============================================================================

export class BuildLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    public readonly runId: string,
    private readonly sink: LogSink | null = null,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  debug(message: string, fields: LogFields = {}): void {
    this.log("debug", message, fields);
  }

  info(message: string, fields: LogFields = {}): void {
    this.log("info", message, fields);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.log("warn", message, fields);
  }

  error(message: string, fields: LogFields = {}): void {
    this.log("error", message, fields);
  }

  log(level: LogLevel, message: string, fields: LogFields = {}): void {
    const { type, ...rest } = fields;
    const event: LogEvent = {
      ...rest,
      ts: isoNow(),
      level,
      type: type ?? DEFAULT_EVENT_TYPE,
      run_id: this.runId,
      message,
    };

    this.append(event);
    this.sink?.(level, message);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// RUN LOG FILES
// =============================================================================

export type CreateRunLoggerOptions = {
  logsDir: string;
  prefix: string;
  runId: string;
  sink?: LogSink | null;
  now?: Date;
};

export function createRunLogger(options: CreateRunLoggerOptions): BuildLogger {
  const filePath = reserveRunLogPath(options.logsDir, options.prefix, options.now ?? new Date());
  return new BuildLogger(filePath, options.runId, options.sink ?? null);
}

// One file per run: <prefix>_<YYYYMMDD_HHMMSS>.log, suffixed _1, _2, ... when a
// run in the same second already claimed the name.
export function reserveRunLogPath(logsDir: string, prefix: string, now: Date): string {
  fse.ensureDirSync(logsDir);
  const stem = `${prefix}_${formatLogTimestamp(now)}`;

  for (let attempt = 0; ; attempt += 1) {
    const name = attempt === 0 ? `${stem}.log` : `${stem}_${attempt}.log`;
    const candidate = path.join(logsDir, name);
    try {
      const fd = fs.openSync(candidate, "wx");
      fs.closeSync(fd);
      return candidate;
    } catch (err) {
      if (!isAlreadyExistsError(err)) {
        throw err;
      }
    }
  }
}

function isAlreadyExistsError(err: unknown): boolean {
  return Boolean(err && typeof err === "object" && "code" in err && err.code === "EEXIST");
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  return resolveDebugFlagFromArgv(process.argv) ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
