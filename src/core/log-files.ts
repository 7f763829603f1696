import fs from "node:fs";
import path from "node:path";

import fg from "fast-glob";

export type RunLogFile = {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
};

export type LogEventFilter = {
  level?: string;
  typeGlob?: string;
};

// =============================================================================
// LISTING
// =============================================================================

/** Run log files (`<prefix>_<YYYYMMDD_HHMMSS>[_n].log`), newest first. */
export async function listRunLogs(logsDir: string, prefix?: string): Promise<RunLogFile[]> {
  if (!fs.existsSync(logsDir)) return [];

  const stem = prefix ? fg.escapePath(prefix) : "*";
  const matches = await fg([`${stem}_[0-9]*_[0-9]*.log`], {
    cwd: logsDir,
    absolute: true,
    onlyFiles: true,
    stats: true,
  });

  return matches
    .map((entry) => ({
      name: path.basename(entry.path),
      path: entry.path,
      sizeBytes: entry.stats?.size ?? 0,
      modifiedAt: entry.stats?.mtime ?? new Date(0),
    }))
    .sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || compareNames(b.name, a.name));
}

// Code-point order, so build_X_1.log sorts after build_X.log.
function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export async function findLatestRunLog(
  logsDir: string,
  prefix?: string,
): Promise<RunLogFile | null> {
  const logs = await listRunLogs(logsDir, prefix);
  return logs[0] ?? null;
}

// =============================================================================
// READING
// =============================================================================

export function readLogEvents(
  filePath: string,
  filter: LogEventFilter = {},
): Record<string, unknown>[] {
  if (!fs.existsSync(filePath)) return [];

  const typeMatcher = filter.typeGlob ? globToRegExp(filter.typeGlob) : null;
  const events: Record<string, unknown>[] = [];

  for (const line of fs.readFileSync(filePath, "utf8").split(/\r?\n/)) {
    if (!line) continue;
    const event = safeParseJson(line);
    if (!event) continue;

    if (filter.level && event.level !== filter.level) continue;
    if (typeMatcher && !(typeof event.type === "string" && typeMatcher.test(event.type))) continue;

    events.push(event);
  }

  return events;
}

export function formatLogEvent(event: Record<string, unknown>): string {
  const ts = typeof event.ts === "string" ? event.ts : "-";
  const level = typeof event.level === "string" ? event.level.toUpperCase() : "INFO";
  const message = typeof event.message === "string" ? event.message : JSON.stringify(event);
  return `${ts} ${level.padEnd(5)} ${message}`;
}

function safeParseJson(line: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(line);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function globToRegExp(glob: string): RegExp {
  const escaped = glob.replace(/[-/\\^$+?.()|[\]{}]/g, "\\$&");
  return new RegExp(`^${escaped.replace(/\*/g, ".*")}$`);
}
