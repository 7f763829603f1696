/*
Purpose: apt-based system package steps (sudo check, list refresh, install of missing packages).
Assumptions: Debian-family host; callers skip these steps elsewhere.
*/

import { run, secondsToMs, type BuildContext } from "./context.js";
import { chunk } from "./utils.js";

function sudoPrefix(ctx: BuildContext): string[] {
  return ctx.config.packages.sudo ? ["sudo"] : [];
}

export async function checkPrivileges(ctx: BuildContext): Promise<boolean> {
  if (!ctx.config.packages.sudo) {
    ctx.logger.info("Package commands run without sudo; skipping privilege check.");
    return true;
  }

  const res = await run(ctx, {
    args: ["sudo", "-n", "true"],
    timeoutMs: secondsToMs(ctx.config.timeouts.privileges),
  });
  if (res.ok) {
    ctx.logger.info("Sudo access confirmed.", { type: "packages.sudo" });
    return true;
  }

  ctx.logger.error("Sudo access is required to install system packages. Run `sudo -v` and retry.", {
    type: "packages.sudo.missing",
  });
  return false;
}

export async function updatePackageLists(ctx: BuildContext): Promise<boolean> {
  const res = await run(ctx, {
    args: [...sudoPrefix(ctx), "apt", "update"],
    timeoutMs: secondsToMs(ctx.config.timeouts.update),
  });
  if (!res.ok) {
    ctx.logger.error("Failed to update package lists.", { type: "packages.update.failed" });
    return false;
  }

  ctx.logger.info("Package lists updated.", { type: "packages.update" });
  return true;
}

export async function isPackageInstalled(ctx: BuildContext, pkg: string): Promise<boolean> {
  const res = await run(ctx, { args: ["dpkg", "-l", pkg] });
  return res.ok && res.stdout.split("\n").some((line) => /^ii\s/.test(line));
}

export async function findMissingPackages(
  ctx: BuildContext,
  packages: readonly string[],
): Promise<string[]> {
  const missing: string[] = [];
  for (const pkg of packages) {
    if (!(await isPackageInstalled(ctx, pkg))) {
      missing.push(pkg);
    }
  }
  return missing;
}

export async function installPackages(ctx: BuildContext): Promise<boolean> {
  const wanted = ctx.config.packages.install;
  const missing = await findMissingPackages(ctx, wanted);
  const installedAlready = wanted.length - missing.length;

  ctx.logger.info(`${installedAlready} packages already installed.`, {
    type: "packages.check",
    installed: installedAlready,
    missing,
  });

  if (missing.length === 0) {
    ctx.logger.info("All required packages are already installed.");
    return true;
  }

  ctx.logger.info(`${missing.length} packages need to be installed.`, { type: "packages.missing" });

  const chunks = chunk(missing, ctx.config.packages.chunk_size);
  for (const [index, group] of chunks.entries()) {
    ctx.logger.info(`Installing package chunk ${index + 1}/${chunks.length}...`, {
      type: "packages.install.chunk",
      packages: group,
    });

    const res = await run(ctx, {
      args: [...sudoPrefix(ctx), "apt", "install", "-y", ...group],
      timeoutMs: secondsToMs(ctx.config.timeouts.install),
    });
    if (!res.ok) {
      ctx.logger.error(`Failed to install package chunk: ${group.join(", ")}`, {
        type: "packages.install.failed",
        packages: group,
      });
      return false;
    }
    ctx.stats.packagesInstalled += group.length;
  }

  ctx.logger.info(`Installed ${ctx.stats.packagesInstalled} packages.`, {
    type: "packages.install",
    count: ctx.stats.packagesInstalled,
  });
  return true;
}
