/*
Purpose: verify build outputs and lay out the deployment directory (binary, plugins, resources, launcher).
Assumptions: the build step already ran; artifact locations come from the configured patterns.
*/

import path from "node:path";

import fse from "fs-extra";

import {
  buildArtifactExpectations,
  deploymentExpectations,
  verifyArtifacts,
  type ArtifactReport,
} from "./artifacts.js";
import { assertRemovable } from "./cleanup.js";
import type { BuildContext } from "./context.js";
import { formatErrorMessage } from "./error-format.js";
import { launcherFileName, type TargetPlatform } from "./platform.js";
import { formatBytes } from "./utils.js";

const DEFAULT_QT_ROOTS = ["/usr/lib/qt6", "/usr/lib/x86_64-linux-gnu/qt6"];

export const TEST_DATA_README = "Place your test files in this folder.\n";

// =============================================================================
// REPORTING
// =============================================================================

function logReport(ctx: BuildContext, report: ArtifactReport, scope: string): void {
  for (const entry of report.found) {
    ctx.logger.info(`Found ${entry.label}: ${entry.path} (${formatBytes(entry.sizeBytes ?? 0)})`, {
      type: `${scope}.found`,
      path: entry.path,
      size_bytes: entry.sizeBytes ?? 0,
    });
  }

  for (const entry of report.missing) {
    const line = `Missing ${entry.label}: ${entry.path}`;
    if (entry.required) {
      ctx.logger.error(line, { type: `${scope}.missing`, path: entry.path });
    } else {
      ctx.logger.warn(line, { type: `${scope}.missing`, path: entry.path });
    }
  }
}

export async function verifyBuildArtifacts(ctx: BuildContext): Promise<boolean> {
  const report = await verifyArtifacts(buildArtifactExpectations(ctx.config, ctx.platform));
  logReport(ctx, report, "artifact");
  return report.ok;
}

export async function verifyDeployment(ctx: BuildContext): Promise<boolean> {
  const report = await verifyArtifacts(deploymentExpectations(ctx.config, ctx.platform));
  logReport(ctx, report, "deploy");

  if (!report.ok) {
    ctx.logger.error("Deployment verification failed: missing files.", { type: "deploy.failed" });
    return false;
  }

  ctx.stats.deploymentSuccessful = true;
  ctx.logger.info("Deployment verification successful.", { type: "deploy.verified" });
  return true;
}

// =============================================================================
// PACKAGING
// =============================================================================

export async function packageDeployment(ctx: BuildContext): Promise<boolean> {
  const { config, platform } = ctx;
  const deployDir = config.deploy_dir;

  try {
    assertRemovable("deploy", deployDir, config.project_dir);
    await fse.remove(deployDir);
    await fse.ensureDir(path.join(deployDir, "plugins"));

    const report = await verifyArtifacts(buildArtifactExpectations(config, platform));
    const [executable, ...plugins] = report.entries;
    if (!executable?.found) {
      ctx.logger.error(`Cannot package: executable not found (${executable?.path ?? "no candidates"}).`, {
        type: "deploy.executable.missing",
      });
      return false;
    }

    const exeTarget = path.join(deployDir, executable.label);
    await fse.copy(executable.path, exeTarget, { preserveTimestamps: true });
    if (platform !== "windows") {
      await fse.chmod(exeTarget, 0o755);
    }
    ctx.logger.info(`Copied main executable: ${executable.path} -> ${exeTarget}`);

    for (const plugin of plugins) {
      if (!plugin.found) {
        if (plugin.required) {
          ctx.logger.error(`Cannot package: plugin not found (${plugin.path}).`, {
            type: "deploy.plugin.missing",
          });
          return false;
        }
        ctx.logger.warn(`Skipping missing plugin: ${plugin.label}`);
        continue;
      }
      const target = path.join(deployDir, "plugins", plugin.label);
      await fse.copy(plugin.path, target, { preserveTimestamps: true });
      ctx.logger.info(`Copied plugin: ${plugin.path} -> ${target}`);
    }

    await copyResources(ctx);

    if (config.deploy.launcher) {
      await writeLauncher(ctx);
    }
    if (config.deploy.test_data) {
      await fse.outputFile(path.join(deployDir, "test_data", "README.txt"), TEST_DATA_README);
    }
  } catch (err) {
    ctx.logger.error(`Failed to create deployment package: ${formatErrorMessage(err)}`, {
      type: "deploy.error",
    });
    return false;
  }

  ctx.logger.info(`Deployment package created at ${deployDir}.`, { type: "deploy.packaged" });
  return true;
}

async function copyResources(ctx: BuildContext): Promise<void> {
  for (const name of ctx.config.deploy.resources) {
    const src = path.join(ctx.config.project_dir, name);
    if (!(await fse.pathExists(src))) continue;

    const dst = path.join(ctx.config.deploy_dir, name);
    try {
      await fse.copy(src, dst);
      ctx.logger.info(`Copied resource directory: ${src} -> ${dst}`);
    } catch (err) {
      ctx.logger.warn(`Failed to copy ${name}: ${formatErrorMessage(err)}`, {
        type: "deploy.resource.failed",
      });
    }
  }
}

// =============================================================================
// LAUNCHER
// =============================================================================

export function renderLauncher(appName: string, platform: TargetPlatform, qtRoot?: string): string {
  if (platform === "windows") {
    return [
      "@echo off",
      `echo Starting ${appName}...`,
      'cd /d "%~dp0"',
      "set QT_PLUGIN_PATH=%~dp0plugins",
      `start "" "${appName}.exe" %*`,
      "",
    ].join("\r\n");
  }

  const roots = qtRoot ? [qtRoot] : DEFAULT_QT_ROOTS;
  const libPath = roots.map((r) => `${r}/lib`).join(":");
  const pluginPath = roots.map((r) => `${r}/plugins`).join(":");

  return [
    "#!/bin/bash",
    `# ${appName} launcher`,
    "",
    'SCRIPT_DIR="$(cd "$(dirname "${BASH_SOURCE[0]}")" && pwd)"',
    "",
    `export LD_LIBRARY_PATH="${libPath}:$LD_LIBRARY_PATH"`,
    `export QT_PLUGIN_PATH="$SCRIPT_DIR/plugins:${pluginPath}"`,
    "",
    'cd "$SCRIPT_DIR"',
    `./${appName} "$@"`,
    "",
  ].join("\n");
}

async function writeLauncher(ctx: BuildContext): Promise<void> {
  const { app_name: appName, deploy_dir: deployDir } = ctx.config;
  const target = path.join(deployDir, launcherFileName(appName, ctx.platform));

  await fse.writeFile(target, renderLauncher(appName, ctx.platform, ctx.env.Qt6_DIR), "utf8");
  if (ctx.platform !== "windows") {
    await fse.chmod(target, 0o755);
  }
  ctx.logger.info(`Created launcher: ${target}`);
}
