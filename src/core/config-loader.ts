import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { BuildConfigSchema, type BuildConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { expandHome } from "./utils.js";

export const DEFAULT_CONFIG_FILE = "qtforge.yaml";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Run `qtforge init` in the project or pass --config <path>.";
const INVALID_CONFIG_HINT =
  "Fix the config file and rerun. For a fresh config, run `qtforge init --force`.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!mark || typeof mark !== "object" || !("line" in mark) || !("column" in mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Build config missing.",
    message: `Build config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Build config invalid.",
    message: `Build config at ${configPath} is invalid.\n${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadBuildConfig(configPath: string): BuildConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read build config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    // An empty file means "all defaults".
    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = BuildConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid build config at ${absolutePath}:\n${details}`, parsed.error);
    }

    return resolveConfigPaths(parsed.data, path.dirname(absolutePath));
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

// Relative paths resolve against the config directory (project_dir) or the project
// directory (build, deploy and logs dirs) so the tool behaves the same from any cwd.
export function resolveConfigPaths(cfg: BuildConfig, configDir: string): BuildConfig {
  const projectDir = path.resolve(configDir, expandHome(cfg.project_dir));
  const fromProject = (p: string): string => path.resolve(projectDir, expandHome(p));

  return {
    ...cfg,
    project_dir: projectDir,
    build_dir: fromProject(cfg.build_dir),
    deploy_dir: fromProject(cfg.deploy_dir),
    logs_dir: fromProject(cfg.logs_dir),
    prefix_path: cfg.prefix_path ? fromProject(cfg.prefix_path) : undefined,
    toolchain: {
      ...cfg.toolchain,
      qt_search_paths: cfg.toolchain.qt_search_paths.map((p) =>
        path.resolve(configDir, expandHome(p)),
      ),
    },
  };
}

export function resolveConfigPath(args: { explicitPath?: string; cwd?: string }): string {
  if (args.explicitPath) {
    return path.resolve(args.explicitPath);
  }
  return path.join(path.resolve(args.cwd ?? process.cwd()), DEFAULT_CONFIG_FILE);
}

export type InitConfigResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function initBuildConfig(args: { configPath: string; force?: boolean }): InitConfigResult {
  const configPath = path.resolve(args.configPath);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, renderDefaultConfig(), "utf8");
  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

export function renderDefaultConfig(): string {
  const starter = {
    project_dir: ".",
    app_name: "ItemEditor",
    plugins: ["PluginOne", "PluginTwo", "PluginThree"],
    build_type: "Release",
    generator: "Unix Makefiles",
    fallback_generator: "Ninja",
    build_dir: "build",
    deploy_dir: "deploy",
    logs_dir: "logs",
    packages: { enabled: true, sudo: true, update: true },
    timeouts: { configure: 120, build: 600 },
  };

  const header = [
    "# qtforge build config",
    "# Paths are relative to this file. ${VAR} references expand from the environment.",
    "# packages.install defaults to the bundled Qt6 apt package list.",
    "",
  ].join("\n");

  return `${header}${yaml.dump(starter, { lineWidth: 100 })}`;
}
