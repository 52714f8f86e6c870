import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import { DEFAULT_CONFIG_FILE, ReleaseConfigSchema, defaultReleaseConfig, type ReleaseConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { formatIssues } from "./zod-issues.js";

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
    return value.map((item: unknown, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]: [string, unknown]) => [
        k,
        expandEnv(v, { ...ctx, trail: [...ctx.trail, k] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Check the --config path, or drop it to use ${DEFAULT_CONFIG_FILE} at the workspace root.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Release config missing.",
    message: `Release config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Release config invalid.",
    message: `Release config at ${configPath} is invalid.`,
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

export type ResolvedReleaseConfig = {
  config: ReleaseConfig;
  /** Null when no config file was found and the defaults apply. */
  configPath: string | null;
};

export function loadReleaseConfig(configPath: string): ReleaseConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read release config at ${absolutePath}`, err);
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

    const parsed = ReleaseConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid release config at ${absolutePath}:\n${details}`, parsed.error);
    }

    const cfg = parsed.data;
    return {
      ...cfg,
      logs: { ...cfg.logs, dir: path.resolve(path.dirname(absolutePath), cfg.logs.dir) },
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

/**
 * Loads `--config` when given, else `crate-version.yaml` at the workspace root
 * when it exists, else the defaults. Relative log dirs resolve against the
 * config file's directory, or the workspace root for defaults.
 */
export function resolveReleaseConfig(input: {
  workspaceRoot: string;
  explicitPath?: string;
}): ResolvedReleaseConfig {
  if (input.explicitPath !== undefined) {
    const configPath = path.resolve(input.explicitPath);
    return { config: loadReleaseConfig(configPath), configPath };
  }

  const defaultPath = path.join(input.workspaceRoot, DEFAULT_CONFIG_FILE);
  if (fs.existsSync(defaultPath)) {
    return { config: loadReleaseConfig(defaultPath), configPath: defaultPath };
  }

  const defaults = defaultReleaseConfig();
  return {
    config: { ...defaults, logs: { ...defaults.logs, dir: path.resolve(input.workspaceRoot, defaults.logs.dir) } },
    configPath: null,
  };
}
