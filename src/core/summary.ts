import path from "node:path";

import fse from "fs-extra";

import type { BuildConfig } from "./config.js";
import type { PipelineResult, PipelineStatus } from "./pipeline.js";
import { launcherFileName, executableFileName, type TargetPlatform } from "./platform.js";
import { elapsedMs, type BuildStatistics } from "./stats.js";
import { formatBytes, formatDuration } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type SummaryKind = "build" | "setup";

export type DeploymentEntry = {
  name: string;
  sizeBytes?: number;
  children?: DeploymentEntry[];
};

export type SummaryInput = {
  kind: SummaryKind;
  result: PipelineResult;
  stats: BuildStatistics;
  config: BuildConfig;
  platform: TargetPlatform;
  logFile: string;
  now?: Date;
  contents?: DeploymentEntry[];
};

const STATUS_LABELS: Record<PipelineStatus, string> = {
  succeeded: "SUCCESS",
  failed: "FAILED",
  interrupted: "INTERRUPTED",
  errored: "ERROR",
};

// =============================================================================
// RENDERING
// =============================================================================

function row(label: string, value: string): string {
  return `  ${`${label}:`.padEnd(16)} ${value}`;
}

function outcome(ok: boolean): string {
  return ok ? "Success" : "Failed";
}

export function renderSummaryLines(input: SummaryInput): string[] {
  const { result, stats, config } = input;
  const lines: string[] = [input.kind === "build" ? "Build Summary" : "Setup Summary"];

  lines.push(row("Status", STATUS_LABELS[result.status]));
  if (result.failedStep) {
    lines.push(row("Failed step", result.failedStep));
  }
  lines.push(row("Duration", formatDuration(elapsedMs(stats, input.now))));
  lines.push(row("Packages", `${stats.packagesInstalled} installed`));

  if (input.kind === "build") {
    const failed = stats.pluginsFailed > 0 ? ` (${stats.pluginsFailed} failed)` : "";
    lines.push(row("Plugins built", `${stats.pluginsBuilt}/${config.plugins.length}${failed}`));
    lines.push(row("Main app", outcome(stats.mainAppBuilt)));
    lines.push(row("Deployment", outcome(stats.deploymentSuccessful)));
  }

  lines.push(row("Qt6 version", stats.qtVersion));
  lines.push(row("Warnings", String(stats.warnings)));
  lines.push(row("Errors", String(stats.errors)));
  lines.push(row("Log file", input.logFile));
  lines.push("");

  if (result.status !== "succeeded") {
    lines.push(...troubleshootingLines(input));
    return lines;
  }

  if (input.kind === "setup") {
    lines.push("Environment ready. Next: qtforge build");
    return lines;
  }

  const exe = executableFileName(config.app_name, input.platform);
  lines.push("Next steps:");
  lines.push(`  1. cd ${config.deploy_dir}`);
  if (config.deploy.launcher) {
    lines.push(`  2. Run the launcher: ./${launcherFileName(config.app_name, input.platform)}`);
    lines.push(`  3. Or run directly: ./${exe}`);
  } else {
    lines.push(`  2. Run: ./${exe}`);
  }

  if (input.contents) {
    lines.push("");
    lines.push("Deployment contents:");
    lines.push(...renderDeploymentContents(path.basename(config.deploy_dir), input.contents));
  }

  return lines;
}

function troubleshootingLines(input: SummaryInput): string[] {
  if (input.result.status === "interrupted") {
    return ["Build interrupted. Rerun the same command to start again."];
  }

  const lines = ["Troubleshooting:", `  1. Check the log file: ${input.logFile}`];
  if (input.result.error) {
    lines.push(`  2. Error: ${input.result.error}`);
  }
  lines.push("  Common causes: missing Qt6 development packages, no CMake in PATH, low disk space.");
  return lines;
}

export function renderDeploymentContents(rootName: string, entries: DeploymentEntry[]): string[] {
  const lines = [`  ${rootName}/`];

  const walk = (items: DeploymentEntry[], depth: number): void => {
    const indent = "  ".repeat(depth + 2);
    for (const item of items) {
      if (item.children) {
        lines.push(`${indent}${item.name}/`);
        walk(item.children, depth + 1);
      } else {
        lines.push(`${indent}${item.name} (${formatBytes(item.sizeBytes ?? 0)})`);
      }
    }
  };

  walk(entries, 0);
  return lines;
}

// =============================================================================
// DEPLOYMENT LISTING
// =============================================================================

/** Lists the directory and one level of subdirectories, sorted by name. */
export async function listDeploymentContents(dir: string, depth = 1): Promise<DeploymentEntry[]> {
  const names = (await fse.readdir(dir)).sort();
  const entries: DeploymentEntry[] = [];

  for (const name of names) {
    const full = path.join(dir, name);
    const stat = await fse.stat(full);
    if (stat.isDirectory()) {
      entries.push({ name, children: depth > 0 ? await listDeploymentContents(full, depth - 1) : [] });
    } else if (stat.isFile()) {
      entries.push({ name, sizeBytes: stat.size });
    }
  }

  return entries;
}
