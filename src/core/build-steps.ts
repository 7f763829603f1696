/*
Purpose: the named steps of the build and setup pipelines, and which of them apply to a run.
Assumptions: package steps are apt-only and so apply on Linux with package management enabled.
*/

import { buildApp, buildPlugins, configureProject } from "./cmake.js";
import { cleanBuildTree } from "./cleanup.js";
import type { BuildConfig } from "./config.js";
import type { BuildContext } from "./context.js";
import { packageDeployment, verifyBuildArtifacts, verifyDeployment } from "./deploy.js";
import { checkPrivileges, installPackages, updatePackageLists } from "./packages.js";
import type { PipelineStep } from "./pipeline.js";
import type { TargetPlatform } from "./platform.js";
import { detectToolchain, verifyPrerequisites, verifyTools } from "./toolchain.js";

export type StepName =
  | "check-privileges"
  | "update-packages"
  | "install-packages"
  | "verify-tools"
  | "verify-prerequisites"
  | "detect-toolchain"
  | "clean"
  | "configure"
  | "build-plugins"
  | "build-app"
  | "verify-artifacts"
  | "package"
  | "verify-deployment";

export type PipelineKind = "build" | "setup";

export type StepPlanOptions = {
  clean?: boolean;
};

const STEP_RUNNERS: Record<StepName, (ctx: BuildContext) => Promise<boolean>> = {
  "check-privileges": checkPrivileges,
  "update-packages": updatePackageLists,
  "install-packages": installPackages,
  "verify-tools": verifyTools,
  "verify-prerequisites": verifyPrerequisites,
  "detect-toolchain": detectToolchain,
  clean: cleanBuildTree,
  configure: configureProject,
  "build-plugins": buildPlugins,
  "build-app": buildApp,
  "verify-artifacts": verifyBuildArtifacts,
  package: packageDeployment,
  "verify-deployment": verifyDeployment,
};

export function planStepNames(
  config: BuildConfig,
  platform: TargetPlatform,
  kind: PipelineKind,
  opts: StepPlanOptions = {},
): StepName[] {
  const names: StepName[] = [];

  if (config.packages.enabled && platform === "linux") {
    names.push("check-privileges");
    if (config.packages.update) names.push("update-packages");
    names.push("install-packages");
  }
  if (kind === "setup") {
    names.push("verify-tools", "detect-toolchain");
    return names;
  }

  names.push("verify-prerequisites", "detect-toolchain");

  if (opts.clean ?? true) names.push("clean");
  names.push(
    "configure",
    "build-plugins",
    "build-app",
    "verify-artifacts",
    "package",
    "verify-deployment",
  );
  return names;
}

export function createPipelineSteps(
  ctx: BuildContext,
  names: readonly StepName[],
): PipelineStep[] {
  return names.map((name) => {
    const runStep = STEP_RUNNERS[name];
    return { name, run: () => runStep(ctx) };
  });
}
