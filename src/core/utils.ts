import os from "node:os";
import path from "node:path";

export function isoNow(): string {
  return new Date().toISOString();
}

// YYYYMMDD_HHMMSS in local time, matching the log file names users see in their tree.
export function formatLogTimestamp(date: Date = new Date()): string {
  const yyyy = date.getFullYear();
  const mm = pad2(date.getMonth() + 1);
  const dd = pad2(date.getDate());
  const hh = pad2(date.getHours());
  const mi = pad2(date.getMinutes());
  const ss = pad2(date.getSeconds());
  return `${yyyy}${mm}${dd}_${hh}${mi}${ss}`;
}

export function defaultRunId(date: Date = new Date()): string {
  return formatLogTimestamp(date).replace("_", "-");
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer (got ${size}).`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/") || p.startsWith("~\\")) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

export function formatBytes(size: number): string {
  return `${size.toLocaleString("en-US")} bytes`;
}

export function formatDuration(durationMs: number): string {
  const seconds = Math.max(0, durationMs) / 1000;
  return `${seconds.toFixed(1)} seconds`;
}
