export type TargetPlatform = "linux" | "windows";

export type PlatformSetting = TargetPlatform | "auto";

export function resolvePlatform(
  setting: PlatformSetting,
  hostPlatform: NodeJS.Platform = process.platform,
): TargetPlatform {
  if (setting !== "auto") return setting;
  return hostPlatform === "win32" ? "windows" : "linux";
}

export function executableFileName(name: string, platform: TargetPlatform): string {
  return platform === "windows" ? `${name}.exe` : name;
}

export function libraryFileName(name: string, platform: TargetPlatform): string {
  return platform === "windows" ? `${name}.dll` : `lib${name}.so`;
}

export function launcherFileName(appName: string, platform: TargetPlatform): string {
  const base = `run_${appName.toLowerCase()}`;
  return platform === "windows" ? `${base}.bat` : `${base}.sh`;
}

// =============================================================================
// ARTIFACT PATTERNS
// =============================================================================

export type PatternValues = {
  app: string;
  config: string;
  platform: TargetPlatform;
  plugin?: string;
};

/**
 * Expands `{app}`, `{exe}`, `{config}`, `{plugin}` and `{lib}` in an artifact path pattern.
 * Unknown placeholders are left untouched.
 */
export function expandArtifactPattern(pattern: string, values: PatternValues): string {
  const replacements: Record<string, string | undefined> = {
    app: values.app,
    exe: values.platform === "windows" ? ".exe" : "",
    config: values.config,
    plugin: values.plugin,
    lib: values.plugin ? libraryFileName(values.plugin, values.platform) : undefined,
  };

  return pattern.replace(/\{([a-z]+)\}/g, (match, key: string) => replacements[key] ?? match);
}
