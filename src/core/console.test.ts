import { describe, expect, it } from "vitest";

import { createConsoleSink, renderLogLine } from "./console.js";
import { createAnsiFormatter } from "./error-format.js";

function collect() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, writer: { out: (l: string) => out.push(l), err: (l: string) => err.push(l) } };
}

describe("console sink", () => {
  it("sends progress to stdout and problems to stderr", () => {
    const { out, err, writer } = collect();
    const sink = createConsoleSink({ writer, useColor: false });

    sink("info", "Step 1/3: configure");
    sink("warn", "Retrying with Ninja");
    sink("error", "Step failed: configure");
    sink("debug", "hidden");

    expect(out).toEqual(["Step 1/3: configure"]);
    expect(err).toEqual(["WARN Retrying with Ninja", "ERROR Step failed: configure"]);
  });

  it("echoes debug events when verbose", () => {
    const { out, writer } = collect();
    const sink = createConsoleSink({ writer, useColor: false, verbose: true });

    sink("debug", "STDOUT: ok");

    expect(out).toEqual(["DEBUG STDOUT: ok"]);
  });

  it("styles level tags when color is on", () => {
    const format = createAnsiFormatter(true);

    expect(renderLogLine("warn", "slow", format)).toBe("\u001b[1m\u001b[33mWARN\u001b[39m\u001b[22m slow");
  });
});
