import path from "node:path";

import { Command } from "commander";

import type { BuildConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import {
  findLatestRunLog,
  formatLogEvent,
  listRunLogs,
  readLogEvents,
  type LogEventFilter,
} from "../core/log-files.js";
import { formatBytes } from "../core/utils.js";

import { loadConfigForCli } from "./config.js";

export function registerLogsCommand(program: Command): void {
  const logs = program.command("logs").description("Inspect build run logs");

  logs
    .command("list")
    .description("List run log files, newest first")
    .option("--limit <n>", "Show at most n files", (v: string) => parseInt(v, 10))
    .action(async (opts: { limit?: number }) => {
      const config = loadLogsConfig(program);
      await logsList(config, { limit: opts.limit });
    });

  logs
    .command("show")
    .description("Print events from a run log (default: latest)")
    .argument("[file]", "Log file name or path")
    .option("--level <level>", "Only events at this level")
    .option("--type <glob>", "Filter by event type (supports *)")
    .action(async (file: string | undefined, opts: { level?: string; type?: string }) => {
      const config = loadLogsConfig(program);
      await logsShow(config, { file, level: opts.level, typeGlob: opts.type });
    });
}

function loadLogsConfig(program: Command): BuildConfig {
  const globals = program.opts<{ config?: string }>();
  return loadConfigForCli({ explicitConfigPath: globals.config }).config;
}

export async function logsList(config: BuildConfig, opts: { limit?: number } = {}): Promise<void> {
  const files = await listRunLogs(config.logs_dir, config.log_prefix);
  if (files.length === 0) {
    console.log(`No run logs in ${config.logs_dir}.`);
    return;
  }

  const shown = opts.limit && opts.limit > 0 ? files.slice(0, opts.limit) : files;
  for (const file of shown) {
    console.log(`${file.name}  ${file.modifiedAt.toISOString()}  ${formatBytes(file.sizeBytes)}`);
  }
}

export async function logsShow(
  config: BuildConfig,
  opts: { file?: string } & LogEventFilter,
): Promise<void> {
  const filePath = await resolveLogFile(config, opts.file);
  const events = readLogEvents(filePath, { level: opts.level, typeGlob: opts.typeGlob });
  for (const event of events) {
    console.log(formatLogEvent(event));
  }
}

async function resolveLogFile(config: BuildConfig, file: string | undefined): Promise<string> {
  if (file) {
    return path.isAbsolute(file) || file.includes(path.sep)
      ? path.resolve(file)
      : path.join(config.logs_dir, file);
  }

  const latest = await findLatestRunLog(config.logs_dir, config.log_prefix);
  if (!latest) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.logs,
      title: "No run logs found.",
      message: `No run logs in ${config.logs_dir}.`,
      hint: "Run `qtforge build` first.",
    });
  }
  return latest.path;
}
