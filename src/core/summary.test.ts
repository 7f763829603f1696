import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTestConfig, writeFile } from "../__tests__/fakes.js";

import { createBuildStatistics } from "./stats.js";
import { listDeploymentContents, renderSummaryLines } from "./summary.js";

const STARTED = new Date("2026-01-01T00:00:00Z");
const FINISHED = new Date("2026-01-01T00:00:12.300Z");
const LOG_FILE = "/work/editor/logs/build_20260101_000000.log";

describe("renderSummaryLines", () => {
  const config = createTestConfig("/work/editor");

  it("renders a successful build with next steps and deployment contents", () => {
    const stats = createBuildStatistics(STARTED);
    Object.assign(stats, {
      packagesInstalled: 2,
      pluginsBuilt: 3,
      mainAppBuilt: true,
      deploymentSuccessful: true,
      qtVersion: "6.4.2",
      warnings: 1,
    });

    const lines = renderSummaryLines({
      kind: "build",
      result: { status: "succeeded", completed: ["configure"] },
      stats,
      config,
      platform: "linux",
      logFile: LOG_FILE,
      now: FINISHED,
      contents: [
        { name: "ItemEditor", sizeBytes: 1024 },
        { name: "plugins", children: [{ name: "libPluginOne.so", sizeBytes: 10 }] },
      ],
    });

    expect(lines).toEqual([
      "Build Summary",
      "  Status:          SUCCESS",
      "  Duration:        12.3 seconds",
      "  Packages:        2 installed",
      "  Plugins built:   3/3",
      "  Main app:        Success",
      "  Deployment:      Success",
      "  Qt6 version:     6.4.2",
      "  Warnings:        1",
      "  Errors:          0",
      `  Log file:        ${LOG_FILE}`,
      "",
      "Next steps:",
      `  1. cd ${path.resolve("/work/editor", "deploy")}`,
      "  2. Run the launcher: ./run_itemeditor.sh",
      "  3. Or run directly: ./ItemEditor",
      "",
      "Deployment contents:",
      "  deploy/",
      "    ItemEditor (1,024 bytes)",
      "    plugins/",
      "      libPluginOne.so (10 bytes)",
    ]);
  });

  it("names the failed step and prints troubleshooting hints", () => {
    const stats = createBuildStatistics(STARTED);
    stats.pluginsBuilt = 1;
    stats.pluginsFailed = 1;
    stats.errors = 2;

    const lines = renderSummaryLines({
      kind: "build",
      result: {
        status: "errored",
        completed: ["configure"],
        failedStep: "build-plugins",
        error: "disk full",
      },
      stats,
      config,
      platform: "linux",
      logFile: LOG_FILE,
      now: FINISHED,
    });

    expect(lines.slice(0, 6)).toEqual([
      "Build Summary",
      "  Status:          ERROR",
      "  Failed step:     build-plugins",
      "  Duration:        12.3 seconds",
      "  Packages:        0 installed",
      "  Plugins built:   1/3 (1 failed)",
    ]);
    expect(lines.slice(-4)).toEqual([
      "Troubleshooting:",
      `  1. Check the log file: ${LOG_FILE}`,
      "  2. Error: disk full",
      "  Common causes: missing Qt6 development packages, no CMake in PATH, low disk space.",
    ]);
  });

  it("keeps setup summaries free of build rows", () => {
    const lines = renderSummaryLines({
      kind: "setup",
      result: { status: "interrupted", completed: [] },
      stats: createBuildStatistics(STARTED),
      config,
      platform: "linux",
      logFile: LOG_FILE,
      now: STARTED,
    });

    expect(lines).toEqual([
      "Setup Summary",
      "  Status:          INTERRUPTED",
      "  Duration:        0.0 seconds",
      "  Packages:        0 installed",
      "  Qt6 version:     Unknown",
      "  Warnings:        0",
      "  Errors:          0",
      `  Log file:        ${LOG_FILE}`,
      "",
      "Build interrupted. Rerun the same command to start again.",
    ]);
  });

  it("points a successful setup at the build command", () => {
    const lines = renderSummaryLines({
      kind: "setup",
      result: { status: "succeeded", completed: ["detect-toolchain"] },
      stats: createBuildStatistics(STARTED),
      config,
      platform: "linux",
      logFile: LOG_FILE,
      now: FINISHED,
    });

    expect(lines.at(-1)).toBe("Environment ready. Next: qtforge build");
  });
});

describe("listDeploymentContents", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "contents-"));
  });

  afterEach(async () => {
    await fse.remove(root);
  });

  it("lists files and one level of subdirectories by name", async () => {
    writeFile(path.join(root, "run_itemeditor.sh"), "#!/bin/bash\n");
    writeFile(path.join(root, "ItemEditor"), "exe");
    writeFile(path.join(root, "plugins", "libPluginOne.so"), "p1");
    writeFile(path.join(root, "test_data", "nested", "deep.txt"), "x");

    await expect(listDeploymentContents(root)).resolves.toEqual([
      { name: "ItemEditor", sizeBytes: 3 },
      { name: "plugins", children: [{ name: "libPluginOne.so", sizeBytes: 2 }] },
      { name: "run_itemeditor.sh", sizeBytes: 12 },
      { name: "test_data", children: [{ name: "nested", children: [] }] },
    ]);
  });
});
