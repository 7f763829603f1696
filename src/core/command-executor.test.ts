import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runCommand } from "./command-executor.js";
import { BuildLogger } from "./logger.js";

function nodeScript(script: string): string[] {
  return [process.execPath, "-e", script];
}

describe("runCommand", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "command-executor-"));
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  it("captures stdout and stderr trimmed of surrounding whitespace", async () => {
    const result = await runCommand({
      args: nodeScript("process.stdout.write('  hello world\\n'); process.stderr.write('careful\\n');"),
      timeoutMs: 10_000,
      capture: true,
    });

    expect(result.ok).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
    expect(result.stdout).toBe("hello world");
    expect(result.stderr).toBe("careful");
  });

  it("reports a non-zero exit as failure without throwing", async () => {
    const result = await runCommand({
      args: nodeScript("process.stderr.write('bad input'); process.exit(3);"),
      timeoutMs: 10_000,
      capture: true,
    });

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.timedOut).toBe(false);
    expect(result.stderr).toBe("bad input");
  });

  it("fails with a timeout message when the command runs too long", async () => {
    const result = await runCommand({
      args: nodeScript("setTimeout(() => undefined, 30000);"),
      timeoutMs: 500,
      capture: true,
    });

    expect(result.ok).toBe(false);
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.stderr).toBe("Command timed out after 0.5 seconds");
  });

  it("reports a missing binary as a launch failure", async () => {
    const result = await runCommand({
      args: ["qtforge-test-no-such-binary"],
      timeoutMs: 10_000,
      capture: true,
    });

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.timedOut).toBe(false);
    expect(result.stderr).toContain("ENOENT");
  });

  it("runs in the requested directory with extra environment", async () => {
    const result = await runCommand({
      args: nodeScript("console.log(process.cwd() + '|' + process.env.QTFORGE_TEST_VALUE);"),
      cwd: tmpDir,
      timeoutMs: 10_000,
      capture: true,
      env: { QTFORGE_TEST_VALUE: "overlay-value" },
    });

    expect(result.ok).toBe(true);
    expect(result.stdout).toBe(`${fs.realpathSync(tmpDir)}|overlay-value`);
  });

  it("fails an empty argument list without spawning", async () => {
    const result = await runCommand({ args: [], timeoutMs: 1000, capture: true });

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.stderr).toBe("No command given.");
  });

  it("logs the command line, the outcome and stderr", async () => {
    const logPath = path.join(tmpDir, "run.log");
    const logger = new BuildLogger(logPath, "run-1");

    await runCommand(
      {
        args: nodeScript("process.stderr.write('boom'); process.exit(2);"),
        cwd: tmpDir,
        timeoutMs: 10_000,
        capture: true,
      },
      logger,
    );
    logger.close();

    const events = fs
      .readFileSync(logPath, "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line) as Record<string, unknown>);

    expect(events.map((e) => e.type)).toEqual([
      "command.start",
      "command.cwd",
      "command.failure",
      "command.stderr",
    ]);
    expect(events[1]?.message).toBe(`Working directory: ${tmpDir}`);
    expect(events[2]?.exit_code).toBe(2);
    expect(events[2]?.level).toBe("error");
    expect(events[3]?.message).toBe("STDERR: boom");
  });
});
