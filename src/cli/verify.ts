import {
  buildArtifactExpectations,
  deploymentExpectations,
  verifyArtifacts,
  type ArtifactReport,
} from "../core/artifacts.js";
import type { BuildConfig } from "../core/config.js";
import { createConsoleFormatter } from "../core/console.js";
import { resolvePlatform } from "../core/platform.js";
import { formatBytes } from "../core/utils.js";

export type VerifyOptions = {
  deployment?: boolean;
};

export async function verifyCommand(config: BuildConfig, opts: VerifyOptions): Promise<ArtifactReport> {
  const platform = resolvePlatform(config.platform);
  const expectations = opts.deployment
    ? deploymentExpectations(config, platform)
    : buildArtifactExpectations(config, platform);

  const report = await verifyArtifacts(expectations);
  for (const line of renderArtifactReport(report)) {
    console.log(line);
  }

  if (!report.ok) {
    process.exitCode = 1;
  }
  return report;
}

export function renderArtifactReport(report: ArtifactReport, useColor?: boolean): string[] {
  const format = createConsoleFormatter(useColor);
  const lines = report.entries.map((entry) => {
    if (entry.found) {
      return `${format("[OK]", ["green"])}      ${entry.label}  ${entry.path} (${formatBytes(entry.sizeBytes ?? 0)})`;
    }
    const tag = entry.required ? format("[MISSING]", ["red"]) : format("[MISSING]", ["yellow"]);
    const optional = entry.required ? "" : " (optional)";
    return `${tag} ${entry.label}  ${entry.path}${optional}`;
  });

  lines.push(`${report.found.length} found, ${report.missing.length} missing.`);
  return lines;
}
