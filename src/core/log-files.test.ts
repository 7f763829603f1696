import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { writeFile } from "../__tests__/fakes.js";

import { findLatestRunLog, formatLogEvent, listRunLogs, readLogEvents } from "./log-files.js";

function writeLog(dir: string, name: string, mtimeSeconds: number): void {
  const file = path.join(dir, name);
  writeFile(file, "{}\n");
  fs.utimesSync(file, mtimeSeconds, mtimeSeconds);
}

describe("run log listing", () => {
  let logsDir: string;

  beforeEach(() => {
    logsDir = fs.mkdtempSync(path.join(os.tmpdir(), "log-files-"));
  });

  afterEach(async () => {
    await fse.remove(logsDir);
  });

  it("lists run logs newest first and ignores other files", async () => {
    writeLog(logsDir, "build_20260101_000000.log", 1_000);
    writeLog(logsDir, "build_20260102_000000.log", 2_000);
    writeLog(logsDir, "setup_20260103_000000.log", 3_000);
    writeLog(logsDir, "notes.txt", 4_000);
    writeLog(logsDir, "build.log", 5_000);

    const logs = await listRunLogs(logsDir);

    expect(logs.map((l) => l.name)).toEqual([
      "setup_20260103_000000.log",
      "build_20260102_000000.log",
      "build_20260101_000000.log",
    ]);
    expect(logs[0]?.sizeBytes).toBe(3);
    expect(logs[0]?.path).toBe(path.join(logsDir, "setup_20260103_000000.log"));
  });

  it("filters by prefix and breaks mtime ties by name", async () => {
    writeLog(logsDir, "build_20260101_000000.log", 1_000);
    writeLog(logsDir, "build_20260101_000000_1.log", 1_000);
    writeLog(logsDir, "setup_20260103_000000.log", 3_000);

    const logs = await listRunLogs(logsDir, "build");

    expect(logs.map((l) => l.name)).toEqual([
      "build_20260101_000000_1.log",
      "build_20260101_000000.log",
    ]);
    await expect(findLatestRunLog(logsDir, "build")).resolves.toMatchObject({
      name: "build_20260101_000000_1.log",
    });
  });

  it("returns nothing for a missing directory", async () => {
    await expect(listRunLogs(path.join(logsDir, "absent"))).resolves.toEqual([]);
    await expect(findLatestRunLog(path.join(logsDir, "absent"))).resolves.toBeNull();
  });
});

describe("log events", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "log-events-"));
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  it("filters by level and type glob and skips unparseable lines", () => {
    const file = path.join(tmpDir, "build_20260101_000000.log");
    fs.writeFileSync(
      file,
      [
        JSON.stringify({ level: "info", type: "command.start", message: "Running command: cmake" }),
        "not json",
        JSON.stringify({ level: "error", type: "command.failure", message: "Command failed" }),
        JSON.stringify({ level: "error", type: "step.failed", message: "Step failed" }),
        "",
      ].join("\n"),
    );

    expect(readLogEvents(file).map((e) => e.type)).toEqual([
      "command.start",
      "command.failure",
      "step.failed",
    ]);
    expect(readLogEvents(file, { level: "error", typeGlob: "command.*" })).toEqual([
      { level: "error", type: "command.failure", message: "Command failed" },
    ]);
  });

  it("formats an event as a single line", () => {
    expect(
      formatLogEvent({ ts: "2026-01-01T00:00:00.000Z", level: "warn", message: "Retrying" }),
    ).toBe("2026-01-01T00:00:00.000Z WARN  Retrying");
    expect(formatLogEvent({ type: "x" })).toBe('- INFO  {"type":"x"}');
  });
});
