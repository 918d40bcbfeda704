import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import { z, type ZodIssue } from "zod";

import { ConfigurationError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const DEFAULT_CONFIG_FILENAME = "figbuild.yaml";

const ExtensionSchema = z
  .string()
  .regex(/^\.[^/\\]+$/, "Expected an extension starting with '.', e.g. \".tex\"");

const CompilerSchema = z
  .object({
    command: z.string().min(1).default("lualatex"),
    args: z.array(z.string()).default(["-interaction=batchmode", "-halt-on-error"]),
    output_dir_flag: z.string().min(1).default("-output-directory"),
    search_path_env: z.string().min(1).default("TEXINPUTS"),
  })
  .strict();

export const BuildConfigSchema = z
  .object({
    jobs: z.number().int().positive().default(32),
    unit_extension: ExtensionSchema.default(".tex"),
    artifact_extension: ExtensionSchema.default(".pdf"),
    timeout_seconds: z.number().positive().optional(),
    fail_on_error: z.boolean().default(true),
    log_file: z.string().min(1).optional(),
    compiler: CompilerSchema.default({}),
  })
  .strict();

export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type CompilerConfig = BuildConfig["compiler"];

export type BuildConfigOverrides = {
  jobs?: number;
  compiler?: string;
  timeoutSeconds?: number;
  failOnError?: boolean;
  logFile?: string;
};

// =============================================================================
// LOADING
// =============================================================================

export function defaultBuildConfig(): BuildConfig {
  return BuildConfigSchema.parse({});
}

export function parseBuildConfig(raw: string, file: string): BuildConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw createYamlParseError(file, err);
  }

  const expanded = expandEnv(doc ?? {}, { file, trail: [] });
  const parsed = BuildConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw createInvalidConfigError(file, parsed.error.issues);
  }

  const config = parsed.data;
  if (config.unit_extension === config.artifact_extension) {
    throw createInvalidConfigError(file, [], [
      `unit_extension and artifact_extension must differ (both are ${config.unit_extension})`,
    ]);
  }

  if (config.log_file) {
    return { ...config, log_file: path.resolve(path.dirname(file), config.log_file) };
  }
  return config;
}

export function loadBuildConfig(input: {
  sourceRoot: string;
  explicitConfigPath?: string;
}): { config: BuildConfig; configPath: string | null } {
  if (input.explicitConfigPath) {
    const configPath = path.resolve(input.explicitConfigPath);
    if (!fs.existsSync(configPath)) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config file missing.",
        message: `Config file not found at ${configPath}.`,
        hint: "Check the --config path or drop the flag to use defaults.",
      });
    }
    return { config: parseBuildConfig(fs.readFileSync(configPath, "utf8"), configPath), configPath };
  }

  const discovered = path.join(input.sourceRoot, DEFAULT_CONFIG_FILENAME);
  if (fs.existsSync(discovered)) {
    return { config: parseBuildConfig(fs.readFileSync(discovered, "utf8"), discovered), configPath: discovered };
  }

  return { config: defaultBuildConfig(), configPath: null };
}

export function applyConfigOverrides(
  config: BuildConfig,
  overrides: BuildConfigOverrides,
): BuildConfig {
  if (overrides.jobs !== undefined && (!Number.isInteger(overrides.jobs) || overrides.jobs < 1)) {
    throw new ConfigurationError(`--jobs must be a positive integer (received ${overrides.jobs}).`);
  }
  if (
    overrides.timeoutSeconds !== undefined &&
    (!Number.isFinite(overrides.timeoutSeconds) || overrides.timeoutSeconds <= 0)
  ) {
    throw new ConfigurationError(
      `--timeout must be a positive number of seconds (received ${overrides.timeoutSeconds}).`,
    );
  }

  return {
    ...config,
    jobs: overrides.jobs ?? config.jobs,
    timeout_seconds: overrides.timeoutSeconds ?? config.timeout_seconds,
    fail_on_error: overrides.failOnError ?? config.fail_on_error,
    log_file: overrides.logFile ? path.resolve(overrides.logFile) : config.log_file,
    compiler: {
      ...config.compiler,
      command: overrides.compiler ?? config.compiler.command,
    },
  };
}

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
        throw new ConfigurationError(
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

const INVALID_CONFIG_HINT = "Fix the config file and rerun, or remove it to use the defaults.";

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

function createInvalidConfigError(
  file: string,
  issues: ZodIssue[],
  extra: string[] = [],
): UserFacingError {
  const details = [...formatIssues(issues), ...extra].join("\n");
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Build config invalid.",
    message: `Invalid build config at ${file}:\n${details}`,
    hint: INVALID_CONFIG_HINT,
  });
}

function createYamlParseError(file: string, err: unknown): UserFacingError {
  const location = resolveYamlErrorLocation(err);
  const where = location ? ` (line ${location.line}, column ${location.column})` : "";
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Build config invalid.",
    message: `Failed to parse YAML in ${file}${where}.`,
    hint: INVALID_CONFIG_HINT,
    cause: new ConfigurationError(`Failed to parse YAML config: ${file}`, err),
  });
}

function resolveYamlErrorLocation(error: unknown): { line: number; column: number } | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark = error.mark;
  if (!mark) return null;
  return { line: mark.line + 1, column: mark.column + 1 };
}
