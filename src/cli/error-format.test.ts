import { describe, expect, it } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError, renderRunOutcome } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Build config missing.",
    message: "Build config not found at /work/editor/qtforge.yaml.",
    hint: "Run `qtforge init` in the project or pass --config <path>.",
    next: "Edit qtforge.yaml",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Build config missing.",
        "Build config not found at /work/editor/qtforge.yaml.",
        "Hint: Run `qtforge init` in the project or pass --config <path>.",
        "Next: Edit qtforge.yaml",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.logs,
      title: "No run logs found.",
      message: "No run logs in /work/editor/logs.",
      cause: new Error("boom"),
    });
    error.stack = "UserFacingError: No run logs in /work/editor/logs.\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: No run logs found.",
        "No run logs in /work/editor/logs.",
        "Code: LOGS_ERROR",
        "Name: UserFacingError",
        "Cause: boom",
        "Stack:",
        "  UserFacingError: No run logs in /work/editor/logs.",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("falls back to the message of a plain error", () => {
    expect(renderCliError(new Error("unexpected"), { stream: nonTtyStream })).toBe(
      "Error: unexpected",
    );
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream, useColor: true });

    expect(output).toContain("Error: Build config missing.");
    expect(output).not.toContain("\x1b[");
  });

  it("colors the label on a TTY", () => {
    delete process.env.NO_COLOR;
    const output = renderCliError(new Error("x"), { stream: { isTTY: true }, useColor: true });

    expect(output).toBe("\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m \x1b[1mx\x1b[22m");
  });
});

describe("renderRunOutcome", () => {
  it("describes each pipeline status", () => {
    const opts = { stream: nonTtyStream };

    expect(renderRunOutcome({ status: "succeeded", completed: [] }, "Build", opts)).toBe(
      "Build completed successfully.",
    );
    expect(renderRunOutcome({ status: "interrupted", completed: [] }, "Setup", opts)).toBe(
      "Setup interrupted.",
    );
    expect(
      renderRunOutcome({ status: "failed", completed: [], failedStep: "configure" }, "Build", opts),
    ).toBe("Build failed at step: configure");
    expect(
      renderRunOutcome(
        { status: "errored", completed: [], failedStep: "package", error: "EACCES" },
        "Build",
        opts,
      ),
    ).toBe("Build stopped by an unexpected error in package: EACCES");
  });
});
