import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import { buildCleanupPlan, executeCleanupPlan, type CleanupPlan } from "../core/cleanup.js";
import type { BuildConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

type CleanOptions = {
  logs?: boolean;
  force?: boolean;
  dryRun?: boolean;
};

export async function cleanCommand(config: BuildConfig, opts: CleanOptions): Promise<void> {
  try {
    const plan = await buildCleanupPlan(config, { includeLogs: opts.logs ?? false });
    if (plan.targets.length === 0) {
      console.log("Nothing to clean.");
      return;
    }

    printPlan(plan, { keepLogs: !(opts.logs ?? false) });

    if (opts.dryRun) {
      console.log("Dry run only. No files were removed.");
      return;
    }

    const confirmed = await confirmCleanupOrAbort(opts);
    if (!confirmed) return;

    await executeCleanupPlan(plan, { log: (msg) => console.log(msg) });
    console.log("Cleanup complete.");
  } catch (error) {
    throw normalizeCleanCommandError(error);
  }
}

function printPlan(plan: CleanupPlan, opts: { keepLogs: boolean }): void {
  console.log(`Cleaning build outputs for ${plan.projectDir}:`);
  for (const target of plan.targets) {
    console.log(`- ${target.kind}: ${target.path}`);
  }
  if (opts.keepLogs) {
    console.log("- logs retained (pass --logs to remove them)");
  }
}

async function confirmCleanupOrAbort(opts: CleanOptions): Promise<boolean> {
  if (opts.force ?? false) {
    return true;
  }
  const confirmed = await confirmCleanup();
  if (!confirmed) {
    console.log("Cleanup cancelled.");
  }
  return confirmed;
}

async function confirmCleanup(): Promise<boolean> {
  if (!input.isTTY || !output.isTTY) {
    console.log("Non-interactive session detected. Re-run with --force to skip confirmation.");
    return false;
  }

  const rl = createInterface({ input, output });
  const answer = await rl.question("Proceed with deleting these directories? (y/N) ");
  rl.close();

  return /^y(es)?$/i.test(answer.trim());
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const CLEAN_COMMAND_FAILURE_TITLE = "Clean command failed.";
const CLEAN_COMMAND_PERMISSIONS_HINT = "Check file permissions for the build directories and try again.";

function normalizeCleanCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  const code = resolveErrorCode(error);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: CLEAN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: code === "EACCES" || code === "EPERM" ? CLEAN_COMMAND_PERMISSIONS_HINT : undefined,
    cause: error,
  });
}

function resolveErrorCode(error: unknown): string | null {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}
