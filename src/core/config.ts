import { z } from "zod";

import { loadDefaultPackageList } from "./bundled-data.js";

const DEFAULT_QT_SEARCH_PATHS = [
  "/usr/lib/qt6",
  "/usr/lib/x86_64-linux-gnu/qt6",
  "/opt/qt6",
  "/usr/local/qt6",
  "~/Qt/6.5.0/gcc_64",
  "~/Qt/6.6.0/gcc_64",
  "~/Qt/6.7.0/gcc_64",
  "~/Qt/6.8.0/gcc_64",
];

const ArtifactsSchema = z.object({
  // Candidate paths relative to build_dir; the first existing file wins.
  executable: z
    .array(z.string().min(1))
    .min(1)
    .default(["bin/{app}{exe}", "bin/{config}/{app}{exe}", "src/{app}{exe}", "{app}{exe}"]),
  plugins: z
    .array(z.string().min(1))
    .min(1)
    .default(["plugins/{plugin}/{lib}", "plugins/{lib}", "{config}/plugins/{lib}"]),
  require_all_plugins: z.boolean().default(true),
});

const PackagesSchema = z.object({
  enabled: z.boolean().default(true),
  sudo: z.boolean().default(true),
  update: z.boolean().default(true),
  chunk_size: z.number().int().positive().default(10),
  install: z.array(z.string().min(1)).default(loadDefaultPackageList),
});

const ToolchainSchema = z.object({
  qt_search_paths: z.array(z.string().min(1)).default(DEFAULT_QT_SEARCH_PATHS),
  compilers: z.array(z.string().min(1)).default(["g++"]),
});

const DeploySchema = z.object({
  resources: z.array(z.string().min(1)).default(["resources", "config"]),
  launcher: z.boolean().default(true),
  test_data: z.boolean().default(true),
});

// Seconds.
const TimeoutsSchema = z.object({
  default: z.number().int().positive().default(300),
  privileges: z.number().int().positive().default(5),
  update: z.number().int().positive().default(120),
  install: z.number().int().positive().default(600),
  configure: z.number().int().positive().default(120),
  build: z.number().int().positive().default(600),
});

export const BuildConfigSchema = z
  .object({
    project_dir: z.string().min(1).default("."),
    app_name: z.string().min(1).default("ItemEditor"),
    build_dir: z.string().min(1).default("build"),
    deploy_dir: z.string().min(1).default("deploy"),
    logs_dir: z.string().min(1).default("logs"),
    log_prefix: z
      .string()
      .regex(/^[A-Za-z0-9._-]+$/, "must contain only letters, digits, '.', '_' or '-'")
      .default("build"),

    platform: z.enum(["auto", "linux", "windows"]).default("auto"),
    build_type: z.string().min(1).default("Release"),
    generator: z.string().min(1).default("Unix Makefiles"),
    fallback_generator: z.string().min(1).nullable().default("Ninja"),
    prefix_path: z.string().min(1).optional(),
    parallel_jobs: z.number().int().positive().optional(),
    export_compile_commands: z.boolean().default(true),

    plugins: z.array(z.string().min(1)).default(["PluginOne", "PluginTwo", "PluginThree"]),

    artifacts: ArtifactsSchema.default({}),
    packages: PackagesSchema.default({}),
    toolchain: ToolchainSchema.default({}),
    deploy: DeploySchema.default({}),
    timeouts: TimeoutsSchema.default({}),
  })
  .strict();

export type BuildConfig = z.infer<typeof BuildConfigSchema>;

export type BuildConfigOverrides = {
  buildType?: string;
  generator?: string;
  parallelJobs?: number;
  skipPackages?: boolean;
};

export function applyConfigOverrides(
  config: BuildConfig,
  overrides: BuildConfigOverrides,
): BuildConfig {
  return {
    ...config,
    build_type: overrides.buildType ?? config.build_type,
    generator: overrides.generator ?? config.generator,
    parallel_jobs: overrides.parallelJobs ?? config.parallel_jobs,
    packages: {
      ...config.packages,
      enabled: overrides.skipPackages ? false : config.packages.enabled,
    },
  };
}
