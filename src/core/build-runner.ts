/*
Purpose: one build or setup run end to end: log file, statistics, steps, summary.
Assumptions: the caller owns signal wiring and maps the result to an exit code.
Usage: const { result } = await executeRun({ config, kind: "build", signal, sink });
*/

import { planStepNames, createPipelineSteps, type PipelineKind } from "./build-steps.js";
import { createCommandRunner, type CommandRunner } from "./command-executor.js";
import type { BuildConfig } from "./config.js";
import type { BuildContext } from "./context.js";
import { formatErrorMessage } from "./error-format.js";
import { createRunLogger, type BuildLogger, type LogSink } from "./logger.js";
import { runPipeline, type PipelineResult } from "./pipeline.js";
import { resolvePlatform, type TargetPlatform } from "./platform.js";
import { createBuildStatistics, createStatsSink, type BuildStatistics } from "./stats.js";
import { listDeploymentContents, renderSummaryLines, type DeploymentEntry } from "./summary.js";
import { readOsRelease } from "./toolchain.js";
import { defaultRunId } from "./utils.js";

export type ExecuteRunOptions = {
  config: BuildConfig;
  kind: PipelineKind;
  clean?: boolean;
  signal?: AbortSignal;
  sink?: LogSink | null;
  /** Replaces the process runner; tests pass an in-memory fake. */
  runner?: (logger: BuildLogger) => CommandRunner;
  hostPlatform?: NodeJS.Platform;
  now?: () => Date;
};

export type RunOutcome = {
  result: PipelineResult;
  stats: BuildStatistics;
  logFile: string;
  runId: string;
  platform: TargetPlatform;
};

export async function executeRun(options: ExecuteRunOptions): Promise<RunOutcome> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const runId = defaultRunId(startedAt);
  const { config } = options;

  const stats = createBuildStatistics(startedAt);
  const logger = createRunLogger({
    logsDir: config.logs_dir,
    prefix: config.log_prefix,
    runId,
    sink: createStatsSink(stats, options.sink ?? null),
    now: startedAt,
  });

  try {
    const platform = resolvePlatform(config.platform, options.hostPlatform);
    const ctx: BuildContext = {
      config,
      platform,
      runner: (options.runner ?? createCommandRunner)(logger),
      logger,
      stats,
      env: {},
    };

    await logHeader(ctx, options.kind);

    const names = planStepNames(config, platform, options.kind, { clean: options.clean });
    const result = await runPipeline(createPipelineSteps(ctx, names), {
      logger,
      signal: options.signal,
      onSummary: async (res) => {
        const contents =
          options.kind === "build" && res.status === "succeeded"
            ? await readDeploymentContents(ctx)
            : undefined;
        const lines = renderSummaryLines({
          kind: options.kind,
          result: res,
          stats,
          config,
          platform,
          logFile: logger.filePath,
          now: now(),
          contents,
        });
        for (const line of lines) {
          logger.info(line, { type: "summary" });
        }
      },
    });

    return { result, stats, logFile: logger.filePath, runId, platform };
  } finally {
    logger.close();
  }
}

async function logHeader(ctx: BuildContext, kind: PipelineKind): Promise<void> {
  const title = kind === "build" ? "Build" : "Environment setup";
  ctx.logger.info(`${title} for ${ctx.config.app_name} (${ctx.platform}, ${ctx.config.build_type})`, {
    type: "run.start",
    project_dir: ctx.config.project_dir,
    log_file: ctx.logger.filePath,
  });

  if (ctx.platform === "linux") {
    const os = await readOsRelease();
    ctx.logger.info(`Host: ${os.name} ${os.version}`, {
      type: "run.host",
      codename: os.codename,
    });
  }
}

async function readDeploymentContents(ctx: BuildContext): Promise<DeploymentEntry[] | undefined> {
  try {
    return await listDeploymentContents(ctx.config.deploy_dir);
  } catch (err) {
    ctx.logger.warn(`Could not list deployment contents: ${formatErrorMessage(err)}`);
    return undefined;
  }
}
