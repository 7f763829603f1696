import { executeRun, type RunOutcome } from "../core/build-runner.js";
import { planStepNames, type PipelineKind } from "../core/build-steps.js";
import type { BuildConfig } from "../core/config.js";
import { createConsoleSink } from "../core/console.js";
import { resolvePlatform } from "../core/platform.js";

import { renderRunOutcome } from "./error-format.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type RunCommandOptions = {
  clean?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
};

const KIND_LABELS: Record<PipelineKind, string> = {
  build: "Build",
  setup: "Setup",
};

export async function buildCommand(config: BuildConfig, opts: RunCommandOptions): Promise<void> {
  await runPipelineCommand("build", config, opts);
}

export async function setupCommand(config: BuildConfig, opts: RunCommandOptions): Promise<void> {
  await runPipelineCommand("setup", config, opts);
}

async function runPipelineCommand(
  kind: PipelineKind,
  config: BuildConfig,
  opts: RunCommandOptions,
): Promise<RunOutcome | null> {
  if (opts.dryRun) {
    printPlan(kind, config, opts);
    return null;
  }

  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal) => {
      console.log(`Received ${signal}. Stopping after the current step.`);
    },
  });

  try {
    const outcome = await executeRun({
      config,
      kind,
      clean: opts.clean,
      signal: stopHandler.signal,
      sink: createConsoleSink({ verbose: opts.verbose }),
    });

    console.log(renderRunOutcome(outcome.result, KIND_LABELS[kind]));
    if (outcome.result.status !== "succeeded") {
      process.exitCode = 1;
    }
    return outcome;
  } finally {
    stopHandler.cleanup();
  }
}

function printPlan(kind: PipelineKind, config: BuildConfig, opts: RunCommandOptions): void {
  const platform = resolvePlatform(config.platform);
  const names = planStepNames(config, platform, kind, { clean: opts.clean });

  console.log(`${KIND_LABELS[kind]} plan for ${config.app_name} (${platform}, ${config.build_type}):`);
  names.forEach((name, index) => {
    console.log(`  ${index + 1}. ${name}`);
  });
  console.log("Dry run only. No commands were executed.");
}
