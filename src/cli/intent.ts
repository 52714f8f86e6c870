/*
Purpose: validate raw commander options and combine them with the release config.
Assumptions: commander has already split flags; values arrive as strings, booleans or
string arrays. `--no-verify` arrives as `verify: false`.
Usage: const intent = buildReleaseIntent(parseCliOptions(raw), config);
*/

import { z } from "zod";

import { SuppressSchema, type ReleaseConfig, type Suppress } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { Prerelease } from "../core/prerelease.js";
import type { ReleaseAction, ReleaseIntent } from "../core/task-generation.js";
import { Version, parseBuild } from "../core/version.js";
import { formatIssues } from "../core/zod-issues.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const CLI_ACTIONS = ["patch", "minor", "major", "pre", "set", "print", "tree"] as const;

const CliOptionsSchema = z.object({
  action: z.enum(CLI_ACTIONS).default("patch"),
  version: z.string().min(1).optional(),

  pre: z.string().optional(),
  build: z.string().optional(),
  forceVersion: z.boolean().default(false),
  dryRun: z.boolean().default(false),

  gitTag: z.boolean().default(false),
  gitPush: z.boolean().default(false),
  message: z.string().optional(),
  branch: z.string().min(1).optional(),
  allowDirty: z.boolean().default(false),

  cargoPublish: z.boolean().default(false),
  verify: z.boolean().default(true),
  manifestPath: z.string().min(1).optional(),

  package: z.array(z.string().min(1)).default([]),
  exclude: z.array(z.string().min(1)).default([]),
  workspace: z.boolean().default(false),
  all: z.boolean().default(false),
  defaultMembers: z.boolean().default(false),
  workspacePackage: z.boolean().default(false),
  ws: z.boolean().default(false),

  suppress: SuppressSchema.optional(),
  config: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;
export type CliAction = CliOptions["action"];

/** Settings for the adapters that are not part of task generation. */
export type RunSettings = {
  suppress: Suppress;
  noVerify: boolean;
  publishAllowDirty: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseCliOptions(raw: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid command-line options.",
      message: formatIssues(parsed.error.issues),
      hint: "Run `crate-version --help` for usage.",
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function buildReleaseIntent(options: CliOptions, config: ReleaseConfig): ReleaseIntent {
  return {
    action: resolveAction(options),
    prerelease: options.pre === undefined ? undefined : Prerelease.parse(options.pre),
    build: options.build === undefined ? undefined : parseBuild(options.build),
    force: options.forceVersion,
    dryRun: options.dryRun,
    gitTag: options.gitTag || options.gitPush,
    gitPush: options.gitPush,
    publish: options.cargoPublish,
    allowDirty: options.allowDirty,
    message: options.message ?? config.commit_message,
    tagPrefix: config.tag_prefix,
    branch: options.branch,
    workspacePackage: options.workspacePackage || options.ws,
    selection: {
      workspace: options.workspace || options.all,
      defaultMembers: options.defaultMembers,
      include: options.package,
      exclude: options.exclude,
    },
  };
}

export function resolveRunSettings(options: CliOptions, config: ReleaseConfig): RunSettings {
  return {
    suppress: options.suppress ?? config.suppress,
    noVerify: !options.verify || config.publish.no_verify,
    publishAllowDirty: options.allowDirty || config.publish.allow_dirty,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveAction(options: CliOptions): ReleaseAction {
  if (options.action === "set") {
    if (options.version === undefined) {
      throw usageError("`set` needs the version to set, e.g. `crate-version set 1.2.0`.");
    }
    return { kind: "set", version: Version.parse(options.version) };
  }

  if (options.version !== undefined) {
    throw usageError(`A version argument is only accepted with \`set\`, not \`${options.action}\`.`);
  }

  switch (options.action) {
    case "print":
      return { kind: "print" };
    case "tree":
      return { kind: "tree" };
    case "patch":
    case "minor":
    case "major":
    case "pre":
      return { kind: "bump", bump: options.action };
  }
}

function usageError(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.version,
    title: "Invalid version arguments.",
    message,
    hint: "Run `crate-version --help` for usage.",
  });
}
