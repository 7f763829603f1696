import { Command, InvalidArgumentError } from "commander";

import type { BuildConfig, BuildConfigOverrides } from "../core/config.js";

import { buildCommand, setupCommand } from "./build.js";
import { cleanCommand } from "./clean.js";
import { loadConfigForCli } from "./config.js";
import { initCommand } from "./init.js";
import { registerLogsCommand } from "./logs.js";
import { verifyCommand } from "./verify.js";

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  debug?: boolean;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = (overrides: BuildConfigOverrides = {}): BuildConfig => {
    const globals = program.opts<GlobalOptions>();
    const { config, configPath, created } = loadConfigForCli({
      explicitConfigPath: globals.config,
      initIfMissing: true,
      overrides,
    });

    if (created) {
      console.log(`Created build config at ${configPath}`);
      console.log(`Edit ${configPath} to set the app name, plugins and build options.`);
    }

    return config;
  };

  program
    .name("qtforge")
    .description("Build, verify and deploy Qt6/CMake applications")
    .version("0.1.0")
    .option("--config <path>", "Build config path (defaults to ./qtforge.yaml)")
    .option("-v, --verbose", "Echo debug events to the console", false)
    .option("--debug", "Show error stacks and causes", false);

  registerLogsCommand(program);

  program
    .command("init")
    .description("Write a starter qtforge.yaml")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force: boolean }) => {
      await initCommand({ configPath: program.opts<GlobalOptions>().config, force: opts.force });
    });

  program
    .command("build")
    .description("Run the full build pipeline")
    .option("--skip-packages", "Skip system package steps", false)
    .option("--no-clean", "Keep the existing build directory")
    .option("--build-type <type>", "CMake build type (overrides config)")
    .option("--generator <name>", "CMake generator (overrides config)")
    .option("--jobs <n>", "Parallel build jobs", parsePositiveInt)
    .option("--dry-run", "Print the step plan without running it", false)
    .action(
      async (opts: {
        skipPackages: boolean;
        clean: boolean;
        buildType?: string;
        generator?: string;
        jobs?: number;
        dryRun: boolean;
      }) => {
        const config = resolveConfig({
          buildType: opts.buildType,
          generator: opts.generator,
          parallelJobs: opts.jobs,
          skipPackages: opts.skipPackages,
        });
        await buildCommand(config, {
          clean: opts.clean,
          dryRun: opts.dryRun,
          verbose: program.opts<GlobalOptions>().verbose,
        });
      },
    );

  program
    .command("setup")
    .description("Install packages and check the toolchain without building")
    .option("--skip-packages", "Skip system package steps", false)
    .option("--dry-run", "Print the step plan without running it", false)
    .action(async (opts: { skipPackages: boolean; dryRun: boolean }) => {
      const config = resolveConfig({ skipPackages: opts.skipPackages });
      await setupCommand(config, {
        dryRun: opts.dryRun,
        verbose: program.opts<GlobalOptions>().verbose,
      });
    });

  program
    .command("verify")
    .description("Check that the expected build artifacts exist")
    .option("--deployment", "Check the deployment directory instead of the build directory", false)
    .action(async (opts: { deployment: boolean }) => {
      await verifyCommand(resolveConfig(), { deployment: opts.deployment });
    });

  program
    .command("clean")
    .description("Remove build and deployment directories")
    .option("--logs", "Also remove run logs", false)
    .option("--dry-run", "Show what would be removed", false)
    .option("--force", "Skip the confirmation prompt", false)
    .action(async (opts: { logs: boolean; dryRun: boolean; force: boolean }) => {
      await cleanCommand(resolveConfig(), opts);
    });

  return program;
}
