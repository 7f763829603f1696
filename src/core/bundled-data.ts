/*
Purpose: locate data files shipped beside the package (data/*.json).
Assumptions: the package root is the nearest ancestor of this module holding package.json,
which holds for both src/ (tests) and dist/src/ (built CLI).
*/

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import { ConfigError } from "./errors.js";

const PackageListSchema = z.array(z.string().min(1));

let cachedPackageRoot: string | null = null;

export function resolvePackageRoot(): string {
  if (cachedPackageRoot) return cachedPackageRoot;

  let current = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      cachedPackageRoot = current;
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      throw new ConfigError("Unable to locate the qtforge package root (no package.json found).");
    }
    current = parent;
  }
}

export function bundledDataPath(fileName: string): string {
  return path.join(resolvePackageRoot(), "data", fileName);
}

export function loadDefaultPackageList(): string[] {
  const filePath = bundledDataPath("qt6-apt-packages.json");

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Failed to read bundled package list at ${filePath}`, err);
  }

  const parsed = PackageListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Bundled package list at ${filePath} is not a list of package names.`);
  }
  return parsed.data;
}
