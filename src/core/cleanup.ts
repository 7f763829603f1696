import path from "node:path";

import fse from "fs-extra";

import type { BuildConfig } from "./config.js";
import type { BuildContext } from "./context.js";
import { formatErrorMessage } from "./error-format.js";

export type CleanupTarget = { kind: "build" | "deploy" | "logs"; path: string };

export type CleanupPlan = {
  projectDir: string;
  targets: CleanupTarget[];
};

export type BuildCleanupPlanOptions = {
  includeLogs?: boolean;
};

export type ExecuteCleanupOptions = {
  dryRun?: boolean;
  log?: (message: string) => void;
};

export async function buildCleanupPlan(
  config: BuildConfig,
  opts: BuildCleanupPlanOptions = {},
): Promise<CleanupPlan> {
  const candidates: CleanupTarget[] = [
    { kind: "build", path: config.build_dir },
    { kind: "deploy", path: config.deploy_dir },
  ];
  if (opts.includeLogs) {
    candidates.push({ kind: "logs", path: config.logs_dir });
  }

  const targets: CleanupTarget[] = [];
  for (const target of candidates) {
    if (await fse.pathExists(target.path)) {
      assertRemovable(target.kind, target.path, config.project_dir);
      targets.push(target);
    }
  }

  return { projectDir: config.project_dir, targets };
}

export async function executeCleanupPlan(
  plan: CleanupPlan,
  opts: ExecuteCleanupOptions = {},
): Promise<void> {
  const log = opts.log ?? (() => undefined);

  for (const target of plan.targets) {
    assertRemovable(target.kind, target.path, plan.projectDir);

    if (opts.dryRun) {
      log(`[dry-run] Would remove ${target.kind}: ${target.path}`);
      continue;
    }

    await fse.remove(target.path);
    log(`Removed ${target.kind}: ${target.path}`);
  }
}

// The project itself (or anything containing it) is never removed.
export function assertRemovable(kind: string, targetPath: string, projectDir: string): void {
  const normalizedProject = path.resolve(projectDir);
  const normalizedTarget = path.resolve(targetPath);
  const relative = path.relative(normalizedTarget, normalizedProject);

  if (relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative))) {
    throw new Error(
      `Refusing to remove ${kind} directory ${normalizedTarget}: it contains the project at ${normalizedProject}`,
    );
  }
}

// =============================================================================
// PIPELINE STEP
// =============================================================================

export async function cleanBuildTree(ctx: BuildContext): Promise<boolean> {
  try {
    const plan = await buildCleanupPlan(ctx.config);
    if (plan.targets.length === 0) {
      ctx.logger.info("Nothing to clean.");
    }
    await executeCleanupPlan(plan, { log: (msg) => ctx.logger.info(msg, { type: "clean.removed" }) });

    await fse.ensureDir(ctx.config.build_dir);
    ctx.logger.info(`Created build directory: ${ctx.config.build_dir}`);
    return true;
  } catch (err) {
    ctx.logger.error(`Failed to clean build directories: ${formatErrorMessage(err)}`, {
      type: "clean.failed",
    });
    return false;
  }
}
