/*
Purpose: check the filesystem for expected build outputs and report which exist.
Assumptions: read-only; nothing is rebuilt or repaired here.
Usage: const report = await verifyArtifacts(buildArtifactExpectations(config, platform));
*/

import path from "node:path";

import fse from "fs-extra";

import type { BuildConfig } from "./config.js";
import {
  executableFileName,
  expandArtifactPattern,
  launcherFileName,
  libraryFileName,
  type TargetPlatform,
} from "./platform.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArtifactKind = "executable" | "plugin" | "launcher";

export type ArtifactExpectation = {
  label: string;
  kind: ArtifactKind;
  /** Absolute candidate paths; the first existing file wins. */
  candidates: string[];
  required: boolean;
};

export type ArtifactEntry = {
  label: string;
  kind: ArtifactKind;
  path: string;
  found: boolean;
  required: boolean;
  sizeBytes?: number;
};

export type ArtifactReport = {
  entries: ArtifactEntry[];
  found: ArtifactEntry[];
  missing: ArtifactEntry[];
  /** True when no required artifact is missing. */
  ok: boolean;
};

// =============================================================================
// EXPECTATIONS
// =============================================================================

export function buildArtifactExpectations(
  config: BuildConfig,
  platform: TargetPlatform,
): ArtifactExpectation[] {
  const base = { app: config.app_name, config: config.build_type, platform };
  const fromBuild = (pattern: string, plugin?: string): string =>
    path.resolve(config.build_dir, expandArtifactPattern(pattern, { ...base, plugin }));

  const executable: ArtifactExpectation = {
    label: executableFileName(config.app_name, platform),
    kind: "executable",
    candidates: config.artifacts.executable.map((pattern) => fromBuild(pattern)),
    required: true,
  };

  const plugins = config.plugins.map(
    (plugin): ArtifactExpectation => ({
      label: libraryFileName(plugin, platform),
      kind: "plugin",
      candidates: config.artifacts.plugins.map((pattern) => fromBuild(pattern, plugin)),
      required: config.artifacts.require_all_plugins,
    }),
  );

  return [executable, ...plugins];
}

export function deploymentExpectations(
  config: BuildConfig,
  platform: TargetPlatform,
): ArtifactExpectation[] {
  const deployDir = config.deploy_dir;
  const exeName = executableFileName(config.app_name, platform);

  const expectations: ArtifactExpectation[] = [
    {
      label: exeName,
      kind: "executable",
      candidates: [path.join(deployDir, exeName)],
      required: true,
    },
    ...config.plugins.map((plugin): ArtifactExpectation => {
      const lib = libraryFileName(plugin, platform);
      return {
        label: `plugins/${lib}`,
        kind: "plugin",
        candidates: [path.join(deployDir, "plugins", lib)],
        required: config.artifacts.require_all_plugins,
      };
    }),
  ];

  if (config.deploy.launcher) {
    const launcher = launcherFileName(config.app_name, platform);
    expectations.push({
      label: launcher,
      kind: "launcher",
      candidates: [path.join(deployDir, launcher)],
      required: true,
    });
  }

  return expectations;
}

// =============================================================================
// VERIFICATION
// =============================================================================

export async function verifyArtifacts(
  expectations: readonly ArtifactExpectation[],
): Promise<ArtifactReport> {
  const entries: ArtifactEntry[] = [];

  for (const expectation of expectations) {
    entries.push(await resolveExpectation(expectation));
  }

  const found = entries.filter((e) => e.found);
  const missing = entries.filter((e) => !e.found);
  return {
    entries,
    found,
    missing,
    ok: missing.every((e) => !e.required),
  };
}

async function resolveExpectation(expectation: ArtifactExpectation): Promise<ArtifactEntry> {
  const { label, kind, required } = expectation;

  for (const candidate of expectation.candidates) {
    const size = await fileSize(candidate);
    if (size !== null) {
      return { label, kind, required, path: candidate, found: true, sizeBytes: size };
    }
  }

  return { label, kind, required, path: expectation.candidates[0] ?? "", found: false };
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fse.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch (err) {
    if (isMissingPathError(err)) return null;
    throw err;
  }
}

function isMissingPathError(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}
