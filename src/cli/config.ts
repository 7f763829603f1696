import fs from "node:fs";

import { applyConfigOverrides, type BuildConfig, type BuildConfigOverrides } from "../core/config.js";
import { initBuildConfig, loadBuildConfig, resolveConfigPath } from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  initIfMissing?: boolean;
  overrides?: BuildConfigOverrides;
  cwd?: string;
};

export type LoadedCliConfig = {
  config: BuildConfig;
  configPath: string;
  created: boolean;
};

export function loadConfigForCli(args: LoadConfigForCliArgs): LoadedCliConfig {
  const configPath = resolveConfigPath({ explicitPath: args.explicitConfigPath, cwd: args.cwd });

  let created = false;
  if (args.initIfMissing && !fs.existsSync(configPath)) {
    created = initBuildConfig({ configPath }).status === "created";
  }

  const config = applyConfigOverrides(loadBuildConfig(configPath), args.overrides ?? {});
  return { config, configPath, created };
}
