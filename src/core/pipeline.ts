/*
Purpose: run an ordered list of named steps, stop at the first failure, always run the summary once.
Assumptions: steps are strictly sequential; interruption is observed when a step returns.
Usage: const res = await runPipeline(steps, { logger, signal, onSummary });
*/

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import type { BuildLogger } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineStep = {
  readonly name: string;
  readonly run: () => Promise<boolean>;
  /** A failed tolerated step logs a warning and the run continues. */
  readonly tolerateFailure?: boolean;
};

export type PipelineStatus = "succeeded" | "failed" | "interrupted" | "errored";

export type PipelineResult = {
  status: PipelineStatus;
  completed: string[];
  failedStep?: string;
  error?: string;
};

export type PipelineOptions = {
  logger: BuildLogger;
  signal?: AbortSignal;
  onSummary: (result: PipelineResult) => void | Promise<void>;
};

// =============================================================================
// CONTROLLER
// =============================================================================

export async function runPipeline(
  steps: readonly PipelineStep[],
  options: PipelineOptions,
): Promise<PipelineResult> {
  const { logger, signal } = options;
  const result: PipelineResult = { status: "succeeded", completed: [] };

  try {
    for (const [index, step] of steps.entries()) {
      if (signal?.aborted) {
        markInterrupted(result, logger, step.name);
        break;
      }

      const position = `${index + 1}/${steps.length}`;
      logger.info(`Step ${position}: ${step.name}`, { type: "step.start", step: step.name });

      let ok: boolean;
      try {
        ok = await step.run();
      } catch (err) {
        result.status = "errored";
        result.failedStep = step.name;
        result.error = formatErrorMessage(err);
        logger.error(`Step ${step.name} raised an error: ${result.error}`, {
          type: "step.error",
          step: step.name,
        });
        const stack = formatErrorLines(err, { mode: "debug" }).find((l) => l.kind === "stack");
        if (stack) {
          logger.debug(stack.text, { type: "step.error.stack", step: step.name });
        }
        break;
      }

      // A child killed by the same Ctrl-C reports failure; the interrupt wins.
      if (!ok && signal?.aborted) {
        result.status = "interrupted";
        logger.warn(`Build interrupted during step: ${step.name}`, {
          type: "pipeline.interrupted",
          step: step.name,
          next_step: null,
        });
        break;
      }

      if (!ok && !step.tolerateFailure) {
        result.status = "failed";
        result.failedStep = step.name;
        logger.error(`Step failed: ${step.name}`, { type: "step.failed", step: step.name });
        break;
      }

      if (!ok) {
        logger.warn(`Step failed but was tolerated: ${step.name}`, {
          type: "step.tolerated",
          step: step.name,
        });
      } else {
        logger.info(`Step completed: ${step.name}`, { type: "step.complete", step: step.name });
      }
      result.completed.push(step.name);

      // The step itself may have been cut short by the interrupt.
      if (signal?.aborted) {
        markInterrupted(result, logger, steps[index + 1]?.name);
        break;
      }
    }
  } finally {
    logger.info(`Pipeline finished: ${result.status}`, {
      type: "pipeline.end",
      status: result.status,
      completed: result.completed,
      failed_step: result.failedStep ?? null,
    });
    await options.onSummary(result);
  }

  return result;
}

function markInterrupted(
  result: PipelineResult,
  logger: BuildLogger,
  nextStep: string | undefined,
): void {
  result.status = "interrupted";
  logger.warn(
    nextStep ? `Build interrupted before step: ${nextStep}` : "Build interrupted after the last step",
    { type: "pipeline.interrupted", next_step: nextStep ?? null },
  );
}
