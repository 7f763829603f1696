/*
Purpose: find the Qt6 toolchain and check that the build tools answer.
Assumptions: qmake (or qmake6) ships in <qt root>/bin; a Qt6 root reports "Qt version 6.x".
Usage: detectToolchain(ctx) sets Qt6_DIR, CMAKE_PREFIX_PATH and PATH in ctx.env for later commands.
*/

import path from "node:path";

import fse from "fs-extra";

import { run, type BuildContext } from "./context.js";
import { executableFileName } from "./platform.js";

export type QtInstallation = {
  root: string;
  qmake: string;
  version: string | null;
};

export type OsRelease = {
  name: string;
  version: string;
  codename: string;
};

const QT_VERSION_PATTERN = /Qt version (\d+(?:\.\d+)*)/;

export function parseQtVersion(output: string): string | null {
  return QT_VERSION_PATTERN.exec(output)?.[1] ?? null;
}

function isQt6(version: string | null): boolean {
  return version !== null && (version === "6" || version.startsWith("6."));
}

// =============================================================================
// QT DETECTION
// =============================================================================

export async function findQtInstallation(ctx: BuildContext): Promise<QtInstallation | null> {
  for (const root of ctx.config.toolchain.qt_search_paths) {
    const qmake = await findQmakeIn(root, ctx);
    if (!qmake) continue;

    const res = await run(ctx, { args: [qmake, "-version"] });
    const version = res.ok ? parseQtVersion(res.stdout) : null;
    if (isQt6(version)) {
      return { root, qmake, version };
    }
    ctx.logger.debug(`Skipping ${root}: not a Qt6 installation.`);
  }

  const locator = ctx.platform === "windows" ? "where" : "which";
  const located = await run(ctx, { args: [locator, "qmake6"] });
  const qmake = located.ok ? located.stdout.split(/\r?\n/)[0]?.trim() : undefined;
  if (!qmake) {
    return null;
  }

  const res = await run(ctx, { args: [qmake, "-version"] });
  return {
    root: path.dirname(path.dirname(qmake)),
    qmake,
    version: res.ok ? parseQtVersion(res.stdout) : null,
  };
}

async function findQmakeIn(root: string, ctx: BuildContext): Promise<string | null> {
  for (const name of ["qmake6", "qmake"]) {
    const candidate = path.join(root, "bin", executableFileName(name, ctx.platform));
    if (await fse.pathExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

export async function applyQtEnvironment(ctx: BuildContext, qtRoot: string): Promise<void> {
  ctx.env.Qt6_DIR = qtRoot;
  ctx.env.CMAKE_PREFIX_PATH = qtRoot;

  const qtBin = path.join(qtRoot, "bin");
  if (!(await fse.pathExists(qtBin))) return;

  const currentPath = ctx.env.PATH ?? process.env.PATH ?? "";
  const entries = currentPath.split(path.delimiter);
  if (!entries.includes(qtBin)) {
    ctx.env.PATH = currentPath ? `${qtBin}${path.delimiter}${currentPath}` : qtBin;
  }
}

export async function detectToolchain(ctx: BuildContext): Promise<boolean> {
  const qt = await findQtInstallation(ctx);
  if (!qt) {
    ctx.logger.error("Qt6 installation not found. Install the Qt6 development packages.", {
      type: "toolchain.missing",
      searched: ctx.config.toolchain.qt_search_paths,
    });
    return false;
  }

  if (qt.version) {
    ctx.stats.qtVersion = qt.version;
  }
  await applyQtEnvironment(ctx, qt.root);

  ctx.logger.info(`Found Qt6 at: ${qt.root} (version ${ctx.stats.qtVersion})`, {
    type: "toolchain.found",
    root: qt.root,
    qmake: qt.qmake,
    version: qt.version,
  });
  return true;
}

// =============================================================================
// PREREQUISITES
// =============================================================================

export type PrerequisiteCheck = {
  name: string;
  ok: boolean;
  details: string;
};

export async function checkTools(ctx: BuildContext): Promise<PrerequisiteCheck[]> {
  const checks: PrerequisiteCheck[] = [];

  for (const tool of ["cmake", ...ctx.config.toolchain.compilers]) {
    const res = await run(ctx, { args: [tool, "--version"] });
    checks.push({
      name: tool,
      ok: res.ok,
      details: res.ok ? (res.stdout.split("\n")[0] ?? "").trim() : "Not found in PATH",
    });
  }

  return checks;
}

export async function checkPrerequisites(ctx: BuildContext): Promise<PrerequisiteCheck[]> {
  const cmakeLists = path.join(ctx.config.project_dir, "CMakeLists.txt");
  const hasCmakeLists = await fse.pathExists(cmakeLists);

  return [
    {
      name: "CMakeLists.txt",
      ok: hasCmakeLists,
      details: hasCmakeLists ? cmakeLists : `Not found at ${cmakeLists}`,
    },
    ...(await checkTools(ctx)),
  ];
}

function reportChecks(ctx: BuildContext, checks: PrerequisiteCheck[]): boolean {
  for (const check of checks) {
    const line = `${check.name}: ${check.ok ? "OK" : "FAIL"} (${check.details})`;
    if (check.ok) {
      ctx.logger.info(line, { type: "prerequisite.ok", name: check.name });
    } else {
      ctx.logger.error(line, { type: "prerequisite.failed", name: check.name });
    }
  }

  return checks.every((check) => check.ok);
}

export async function verifyPrerequisites(ctx: BuildContext): Promise<boolean> {
  return reportChecks(ctx, await checkPrerequisites(ctx));
}

export async function verifyTools(ctx: BuildContext): Promise<boolean> {
  return reportChecks(ctx, await checkTools(ctx));
}

// =============================================================================
// HOST INFO
// =============================================================================

export function parseOsRelease(content: string): OsRelease {
  const info: OsRelease = { name: "Unknown", version: "Unknown", codename: "Unknown" };
  const keys: Record<string, keyof OsRelease> = {
    NAME: "name",
    VERSION: "version",
    VERSION_CODENAME: "codename",
  };

  for (const line of content.split(/\r?\n/)) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const field = keys[line.slice(0, eq)];
    if (!field) continue;
    info[field] = line
      .slice(eq + 1)
      .trim()
      .replace(/^"(.*)"$/, "$1");
  }

  return info;
}

export async function readOsRelease(filePath = "/etc/os-release"): Promise<OsRelease> {
  try {
    return parseOsRelease(await fse.readFile(filePath, "utf8"));
  } catch {
    return parseOsRelease("");
  }
}
