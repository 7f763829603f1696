import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import { assertRemovable } from "./cleanup.js";
import { run, secondsToMs, type BuildContext } from "./context.js";
import type { BuildConfig } from "./config.js";

// =============================================================================
// ARGUMENTS
// =============================================================================

export function configureArgs(
  config: BuildConfig,
  generator: string,
  prefixPath: string | undefined,
): string[] {
  const args = ["cmake", "-G", generator, `-DCMAKE_BUILD_TYPE=${config.build_type}`];
  if (config.export_compile_commands) {
    args.push("-DCMAKE_EXPORT_COMPILE_COMMANDS=ON");
  }
  if (prefixPath) {
    args.push(`-DCMAKE_PREFIX_PATH=${prefixPath}`);
  }
  args.push(config.project_dir);
  return args;
}

export function resolveParallelJobs(config: BuildConfig): number {
  return config.parallel_jobs ?? os.availableParallelism();
}

export function buildTargetArgs(config: BuildConfig, target: string): string[] {
  return [
    "cmake",
    "--build",
    ".",
    "--target",
    target,
    "--config",
    config.build_type,
    "--parallel",
    String(resolveParallelJobs(config)),
  ];
}

// =============================================================================
// CONFIGURE
// =============================================================================

export async function configureProject(ctx: BuildContext): Promise<boolean> {
  const { config } = ctx;
  await fse.ensureDir(config.build_dir);

  const prefixPath = config.prefix_path ?? ctx.env.CMAKE_PREFIX_PATH;
  const attempt = (generator: string) =>
    run(ctx, {
      args: configureArgs(config, generator, prefixPath),
      cwd: config.build_dir,
      timeoutMs: secondsToMs(config.timeouts.configure),
    });

  const first = await attempt(config.generator);
  if (first.ok) {
    ctx.logger.info(`CMake configuration successful (${config.generator}).`, {
      type: "cmake.configure",
      generator: config.generator,
    });
    return true;
  }

  const fallback = config.fallback_generator;
  if (!fallback || fallback === config.generator) {
    ctx.logger.error("CMake configuration failed.", { type: "cmake.configure.failed" });
    return false;
  }

  ctx.logger.warn(`CMake configuration failed with ${config.generator}; retrying with ${fallback}.`, {
    type: "cmake.configure.fallback",
    generator: fallback,
  });
  // A cache from the first generator makes CMake refuse the second one.
  for (const stale of ["CMakeCache.txt", "CMakeFiles"]) {
    const stalePath = path.join(config.build_dir, stale);
    assertRemovable("cmake cache", stalePath, config.project_dir);
    await fse.remove(stalePath);
  }

  const second = await attempt(fallback);
  if (second.ok) {
    ctx.logger.info(`CMake configuration successful with ${fallback}.`, {
      type: "cmake.configure",
      generator: fallback,
    });
    return true;
  }

  ctx.logger.error("CMake configuration failed with both generators.", {
    type: "cmake.configure.failed",
  });
  return false;
}

// =============================================================================
// BUILD
// =============================================================================

async function buildTarget(ctx: BuildContext, target: string): Promise<boolean> {
  const res = await run(ctx, {
    args: buildTargetArgs(ctx.config, target),
    cwd: ctx.config.build_dir,
    timeoutMs: secondsToMs(ctx.config.timeouts.build),
  });
  return res.ok;
}

export async function buildPlugins(ctx: BuildContext): Promise<boolean> {
  const total = ctx.config.plugins.length;

  for (const [index, plugin] of ctx.config.plugins.entries()) {
    ctx.logger.info(`Building plugin ${index + 1}/${total}: ${plugin}`, {
      type: "cmake.plugin.start",
      plugin,
    });

    if (!(await buildTarget(ctx, plugin))) {
      ctx.stats.pluginsFailed += 1;
      ctx.logger.error(`Plugin build failed: ${plugin}`, { type: "cmake.plugin.failed", plugin });
      return false;
    }

    ctx.stats.pluginsBuilt += 1;
    ctx.logger.info(`${plugin} built successfully.`, { type: "cmake.plugin.built", plugin });
  }

  return true;
}

export async function buildApp(ctx: BuildContext): Promise<boolean> {
  const app = ctx.config.app_name;
  if (!(await buildTarget(ctx, app))) {
    ctx.logger.error(`${app} build failed.`, { type: "cmake.app.failed" });
    return false;
  }

  ctx.stats.mainAppBuilt = true;
  ctx.logger.info(`${app} built successfully.`, { type: "cmake.app.built" });
  return true;
}
