import type { CommandResult, CommandRunner, CommandSpec } from "./command-executor.js";
import type { BuildConfig } from "./config.js";
import type { BuildLogger } from "./logger.js";
import type { TargetPlatform } from "./platform.js";
import type { BuildStatistics } from "./stats.js";

/**
 * Everything a build step needs. `env` accumulates overlay variables (Qt6_DIR, PATH)
 * discovered by earlier steps and is applied to every later command.
 */
export type BuildContext = {
  config: BuildConfig;
  platform: TargetPlatform;
  runner: CommandRunner;
  logger: BuildLogger;
  stats: BuildStatistics;
  env: Record<string, string>;
};

export type RunSpec = Omit<CommandSpec, "timeoutMs" | "capture"> & {
  timeoutMs?: number;
  capture?: boolean;
};

export function run(ctx: BuildContext, spec: RunSpec): Promise<CommandResult> {
  const env = { ...ctx.env, ...spec.env };
  return ctx.runner({
    ...spec,
    timeoutMs: spec.timeoutMs ?? ctx.config.timeouts.default * 1000,
    capture: spec.capture ?? true,
    env: Object.keys(env).length > 0 ? env : undefined,
  });
}

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}
