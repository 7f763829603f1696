import { initBuildConfig, resolveConfigPath } from "../core/config-loader.js";

export async function initCommand(opts: {
  configPath?: string;
  force?: boolean;
}): Promise<{ created: boolean; configPath: string }> {
  const configPath = resolveConfigPath({ explicitPath: opts.configPath });
  const result = initBuildConfig({ configPath, force: opts.force ?? false });

  if (result.status === "created") {
    console.log(`Created build config at ${result.configPath}`);
  } else if (result.status === "overwritten") {
    console.log(`Overwrote build config at ${result.configPath}`);
  } else {
    console.log(`Build config already exists at ${result.configPath} (use --force to overwrite)`);
  }

  return { created: result.status !== "exists", configPath: result.configPath };
}
