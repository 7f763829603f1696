import type { LogSink } from "./logger.js";

export type BuildStatistics = {
  packagesInstalled: number;
  pluginsBuilt: number;
  pluginsFailed: number;
  mainAppBuilt: boolean;
  deploymentSuccessful: boolean;
  errors: number;
  warnings: number;
  qtVersion: string;
  startedAt: Date;
};

export const UNKNOWN_QT_VERSION = "Unknown";

export function createBuildStatistics(startedAt: Date = new Date()): BuildStatistics {
  return {
    packagesInstalled: 0,
    pluginsBuilt: 0,
    pluginsFailed: 0,
    mainAppBuilt: false,
    deploymentSuccessful: false,
    errors: 0,
    warnings: 0,
    qtVersion: UNKNOWN_QT_VERSION,
    startedAt,
  };
}

export function elapsedMs(stats: BuildStatistics, now: Date = new Date()): number {
  return now.getTime() - stats.startedAt.getTime();
}

// Counts warn and error events into the run statistics, then forwards them.
export function createStatsSink(stats: BuildStatistics, next: LogSink | null = null): LogSink {
  return (level, message) => {
    if (level === "warn") stats.warnings += 1;
    if (level === "error") stats.errors += 1;
    next?.(level, message);
  };
}
