import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { BuildLogger } from "./logger.js";
import { runPipeline, type PipelineResult, type PipelineStep } from "./pipeline.js";

function readEventTypes(logPath: string): string[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => String((JSON.parse(line) as Record<string, unknown>).type));
}

describe("runPipeline", () => {
  let tmpDir: string;
  let logger: BuildLogger;
  let executed: string[];

  const step = (name: string, ok: boolean, extra: Partial<PipelineStep> = {}): PipelineStep => ({
    name,
    run: async () => {
      executed.push(name);
      return ok;
    },
    ...extra,
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pipeline-"));
    logger = new BuildLogger(path.join(tmpDir, "run.log"), "run-1");
    executed = [];
  });

  afterEach(async () => {
    logger.close();
    await fse.remove(tmpDir);
  });

  it("runs every step in order and succeeds", async () => {
    const onSummary = vi.fn();

    const result = await runPipeline([step("a", true), step("b", true), step("c", true)], {
      logger,
      onSummary,
    });

    expect(executed).toEqual(["a", "b", "c"]);
    expect(result).toEqual({ status: "succeeded", completed: ["a", "b", "c"] });
    expect(onSummary).toHaveBeenCalledTimes(1);
    expect(onSummary).toHaveBeenCalledWith(result);
  });

  it("never runs the steps after a failing one", async () => {
    const steps = [step("a", true), step("b", false), step("c", true), step("d", true)];
    const onSummary = vi.fn();

    const result = await runPipeline(steps, { logger, onSummary });

    expect(executed).toEqual(["a", "b"]);
    expect(result.status).toBe("failed");
    expect(result.failedStep).toBe("b");
    expect(result.completed).toEqual(["a"]);
    expect(onSummary).toHaveBeenCalledTimes(1);
  });

  it("continues past a tolerated failure", async () => {
    const steps = [step("a", true), step("b", false, { tolerateFailure: true }), step("c", true)];

    const result = await runPipeline(steps, { logger, onSummary: () => undefined });
    logger.close();

    expect(executed).toEqual(["a", "b", "c"]);
    expect(result.status).toBe("succeeded");
    expect(result.completed).toEqual(["a", "b", "c"]);
    expect(readEventTypes(logger.filePath)).toContain("step.tolerated");
  });

  it("reports a thrown error as errored and still summarizes once", async () => {
    const onSummary = vi.fn();
    const steps: PipelineStep[] = [
      step("a", true),
      {
        name: "explode",
        run: async () => {
          throw new Error("disk vanished");
        },
      },
      step("c", true),
    ];

    const result = await runPipeline(steps, { logger, onSummary });

    expect(executed).toEqual(["a"]);
    expect(result).toEqual({
      status: "errored",
      completed: ["a"],
      failedStep: "explode",
      error: "disk vanished",
    });
    expect(onSummary).toHaveBeenCalledTimes(1);
  });

  it("stops before the next step when interrupted mid-run and summarizes exactly once", async () => {
    const controller = new AbortController();
    const summaries: PipelineResult[] = [];
    const steps: PipelineStep[] = [
      step("a", true),
      {
        name: "long",
        run: async () => {
          executed.push("long");
          controller.abort("SIGINT");
          return true;
        },
      },
      step("c", true),
    ];

    const result = await runPipeline(steps, {
      logger,
      signal: controller.signal,
      onSummary: (res) => {
        summaries.push(res);
      },
    });
    logger.close();

    expect(executed).toEqual(["a", "long"]);
    expect(result.status).toBe("interrupted");
    expect(result.completed).toEqual(["a", "long"]);
    expect(summaries).toHaveLength(1);
    expect(summaries[0]?.status).toBe("interrupted");
    expect(readEventTypes(logger.filePath)).toContain("pipeline.interrupted");
  });

  it("reports a step cut short by the interrupt as interrupted, not failed", async () => {
    const controller = new AbortController();
    const onSummary = vi.fn();
    const steps: PipelineStep[] = [
      step("a", true),
      {
        name: "configure",
        run: async () => {
          executed.push("configure");
          controller.abort("SIGINT");
          return false;
        },
      },
      step("c", true),
    ];

    const result = await runPipeline(steps, { logger, signal: controller.signal, onSummary });
    logger.close();

    expect(executed).toEqual(["a", "configure"]);
    expect(result).toEqual({ status: "interrupted", completed: ["a"] });
    expect(onSummary).toHaveBeenCalledTimes(1);
    const types = readEventTypes(logger.filePath);
    expect(types).toContain("pipeline.interrupted");
    expect(types).not.toContain("step.failed");
  });

  it("runs nothing when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort("SIGTERM");
    const onSummary = vi.fn();

    const result = await runPipeline([step("a", true)], {
      logger,
      signal: controller.signal,
      onSummary,
    });

    expect(executed).toEqual([]);
    expect(result).toEqual({ status: "interrupted", completed: [] });
    expect(onSummary).toHaveBeenCalledTimes(1);
  });

  it("awaits an async summary before returning", async () => {
    let summarized = false;

    await runPipeline([step("a", true)], {
      logger,
      onSummary: async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        summarized = true;
      },
    });

    expect(summarized).toBe(true);
  });
});
