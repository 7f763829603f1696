/*
Purpose: run one external program as an argument vector with a bounded timeout.
Assumptions: callers decide what a failure means; this module never throws on exit status.
Usage: const res = await runCommand({ args: ["cmake", "--version"], timeoutMs: 5000, capture: true }, logger);
*/

import { execa } from "execa";

import type { BuildLogger } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandSpec = {
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly timeoutMs: number;
  readonly capture: boolean;
  readonly env?: Readonly<Record<string, string>>;
};

export type CommandResult = {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
};

/** Executes one command spec. The real runner shells out; tests substitute an in-memory fake. */
export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

type ExecaFailureDetails = {
  message: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
};

// =============================================================================
// EXECUTOR
// =============================================================================

export async function runCommand(spec: CommandSpec, logger?: BuildLogger): Promise<CommandResult> {
  const [file, ...args] = spec.args;
  const cmdStr = spec.args.join(" ");
  const startedAt = Date.now();

  logger?.info(`Running command: ${cmdStr}`, {
    type: "command.start",
    args: [...spec.args],
    timeout_ms: spec.timeoutMs,
  });
  if (spec.cwd) {
    logger?.info(`Working directory: ${spec.cwd}`, { type: "command.cwd", cwd: spec.cwd });
  }

  if (!file) {
    const result = failedResult("No command given.", startedAt);
    logger?.error("Command execution failed: empty argument list", { type: "command.error" });
    return result;
  }

  try {
    const res = await execa(file, args, {
      cwd: spec.cwd,
      env: spec.env ? { ...spec.env } : undefined,
      timeout: spec.timeoutMs,
      stdin: spec.capture ? "ignore" : "inherit",
      stdout: spec.capture ? "pipe" : "inherit",
      stderr: spec.capture ? "pipe" : "inherit",
      encoding: "utf8",
      windowsHide: true,
    });

    const result: CommandResult = {
      ok: true,
      stdout: normalizeOutput(res.stdout),
      stderr: normalizeOutput(res.stderr),
      exitCode: res.exitCode,
      timedOut: false,
      durationMs: Date.now() - startedAt,
    };
    logResult(logger, cmdStr, spec, result);
    return result;
  } catch (err) {
    const details = resolveExecaFailureDetails(err);
    const durationMs = Date.now() - startedAt;

    if (details.timedOut) {
      const seconds = formatTimeoutSeconds(spec.timeoutMs);
      const result: CommandResult = {
        ok: false,
        stdout: details.stdout,
        stderr: `Command timed out after ${seconds} seconds`,
        exitCode: null,
        timedOut: true,
        durationMs,
      };
      logger?.error(`Command timed out after ${seconds}s: ${cmdStr}`, {
        type: "command.timeout",
        duration_ms: durationMs,
        stdout: result.stdout,
      });
      return result;
    }

    if (details.exitCode === null) {
      // Never ran: missing binary, permission denied, bad cwd.
      const result: CommandResult = {
        ok: false,
        stdout: "",
        stderr: details.message,
        exitCode: null,
        timedOut: false,
        durationMs,
      };
      logger?.error(`Command execution failed: ${cmdStr} - ${details.message}`, {
        type: "command.error",
        duration_ms: durationMs,
      });
      return result;
    }

    const result: CommandResult = {
      ok: false,
      stdout: details.stdout,
      stderr: details.stderr,
      exitCode: details.exitCode,
      timedOut: false,
      durationMs,
    };
    logResult(logger, cmdStr, spec, result);
    return result;
  }
}

export function createCommandRunner(logger?: BuildLogger): CommandRunner {
  return (spec) => runCommand(spec, logger);
}

// =============================================================================
// INTERNALS
// =============================================================================

function logResult(
  logger: BuildLogger | undefined,
  cmdStr: string,
  spec: CommandSpec,
  result: CommandResult,
): void {
  if (!logger) return;

  const fields = {
    exit_code: result.exitCode,
    duration_ms: result.durationMs,
    captured: spec.capture,
  };

  if (result.ok) {
    logger.info(`Command succeeded: ${cmdStr}`, { type: "command.success", ...fields });
    if (result.stdout) {
      logger.debug(`STDOUT: ${result.stdout}`, { type: "command.stdout" });
    }
    return;
  }

  logger.error(`Command failed with code ${result.exitCode ?? "unknown"}: ${cmdStr}`, {
    type: "command.failure",
    ...fields,
  });
  if (result.stderr) {
    logger.error(`STDERR: ${result.stderr}`, { type: "command.stderr" });
  }
  if (result.stdout) {
    logger.debug(`STDOUT: ${result.stdout}`, { type: "command.stdout" });
  }
}

function failedResult(message: string, startedAt: number): CommandResult {
  return {
    ok: false,
    stdout: "",
    stderr: message,
    exitCode: null,
    timedOut: false,
    durationMs: Date.now() - startedAt,
  };
}

function resolveExecaFailureDetails(err: unknown): ExecaFailureDetails {
  if (!err || typeof err !== "object") {
    return { message: String(err), stdout: "", stderr: "", exitCode: null, timedOut: false };
  }

  const exitCodeRaw = readField(err, "exitCode");
  const shortMessage = readField(err, "shortMessage");
  const rawMessage = readField(err, "message");
  const message =
    typeof shortMessage === "string"
      ? shortMessage
      : typeof rawMessage === "string"
        ? rawMessage
        : String(err);

  return {
    message,
    stdout: normalizeOutput(readField(err, "stdout")),
    stderr: normalizeOutput(readField(err, "stderr")),
    exitCode: typeof exitCodeRaw === "number" && Number.isFinite(exitCodeRaw) ? exitCodeRaw : null,
    timedOut: readField(err, "timedOut") === true,
  };
}

function readField(record: object, key: string): unknown {
  return key in record ? Reflect.get(record, key) : undefined;
}

function normalizeOutput(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (value === undefined || value === null) return "";
  return String(value).trim();
}

function formatTimeoutSeconds(timeoutMs: number): string {
  const seconds = timeoutMs / 1000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1);
}
