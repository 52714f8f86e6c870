import path from "node:path";

import { createCargoBuildTool, type CargoBuildToolOptions } from "../app/release/build/cargo-build-tool.js";
import type { BuildTool, ReleaseOutput, ReleaseVcs } from "../app/release/ports.js";
import { TaskFailureError } from "../app/release/task-failure.js";
import { createTaskRunner } from "../app/release/task-runner.js";
import { createJsonlEventSink, Tasks } from "../app/release/tasks.js";
import { createGitVcs, type GitVcsOptions } from "../app/release/vcs/git-vcs.js";
import { discoverWorkspace, type DiscoverOptions } from "../cargo/workspace.js";
import { resolveReleaseConfig } from "../core/config-loader.js";
import { suppressesCargo, suppressesGit } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  CargoError,
  ConfigError,
  GitError,
  ManifestError,
  ReleaseError,
  SelectionError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  VersionError,
} from "../core/errors.js";
import { JsonlLogger, logReleaseEvent } from "../core/logger.js";
import type { Packages } from "../core/packages.js";
import { generateTasks, type ReleaseIntent, type RepoState } from "../core/task-generation.js";
import type { Task } from "../core/task.js";
import { defaultReleaseId } from "../core/utils.js";
import { currentBranch, dirtyFiles, listRemotes } from "../git/git.js";

import { buildReleaseIntent, resolveRunSettings, type CliOptions } from "./intent.js";

// =============================================================================
// TYPES
// =============================================================================

/** Everything the command touches outside the process, replaceable in tests. */
export type ReleaseEnvironment = {
  cwd: string;
  discover(options: DiscoverOptions): Promise<Packages>;
  readRepoState(root: string): Promise<RepoState>;
  createVcs(options: GitVcsOptions): ReleaseVcs;
  createBuildTool(options: CargoBuildToolOptions): BuildTool;
  output: ReleaseOutput;
  now(): Date;
};

export type ReleaseSummary = {
  /** Null for print and tree. */
  rootVersion: string | null;
  dryRun: boolean;
  completed: Task[];
  logPath: string | null;
};

export function createReleaseEnvironment(cwd: string = process.cwd()): ReleaseEnvironment {
  return {
    cwd,
    discover: discoverWorkspace,
    readRepoState,
    createVcs: createGitVcs,
    createBuildTool: createCargoBuildTool,
    output: { line: (text) => console.log(text) },
    now: () => new Date(),
  };
}

// =============================================================================
// COMMAND
// =============================================================================

export async function releaseCommand(
  options: CliOptions,
  env: ReleaseEnvironment = createReleaseEnvironment(),
): Promise<ReleaseSummary> {
  try {
    const summary = await runRelease(options, env);
    if (summary.rootVersion !== null) {
      env.output.line(`Released ${summary.rootVersion}${summary.dryRun ? " (dry run)" : ""}`);
    }
    return summary;
  } catch (error) {
    throw normalizeReleaseCommandError(error);
  }
}

async function runRelease(options: CliOptions, env: ReleaseEnvironment): Promise<ReleaseSummary> {
  const packages = await env.discover({ cwd: env.cwd, manifestPath: options.manifestPath });
  const { config } = resolveReleaseConfig({
    workspaceRoot: packages.rootDirectory,
    explicitPath: options.config,
  });
  const intent = buildReleaseIntent(options, config);
  const settings = resolveRunSettings(options, config);
  const mutating = intent.action.kind === "bump" || intent.action.kind === "set";

  const queried = needsRepoState(intent);
  const repo = queried ? await env.readRepoState(packages.rootDirectory) : EMPTY_REPO;
  if (queried && intent.branch !== undefined && repo.currentBranch.length === 0) {
    throw new GitError("HEAD is detached; check out a branch before releasing with --branch.");
  }
  const remotes = config.remotes ?? repo.remotes;
  const generated = generateTasks(intent, packages, { ...repo, remotes });

  const root = packages.rootDirectory;
  const vcs = env.createVcs({ cwd: root, dryRun: intent.dryRun, quiet: suppressesGit(settings.suppress) });
  const buildTool = env.createBuildTool({
    cwd: root,
    manifestPath: packages.rootManifestPath,
    dryRun: intent.dryRun,
    noVerify: settings.noVerify,
    allowDirty: settings.publishAllowDirty,
    quiet: suppressesCargo(settings.suppress),
  });

  const releaseId = defaultReleaseId(env.now());
  const logger =
    mutating && config.logs.enabled
      ? new JsonlLogger(path.join(config.logs.dir, `${releaseId}.jsonl`), { releaseId }, { debug: options.debug })
      : null;

  const tasks = new Tasks(generated, packages, {
    runner: createTaskRunner({ vcs, buildTool, output: env.output }),
    events: logger ? createJsonlEventSink(logger) : undefined,
    progress: options.verbose ? env.output : undefined,
  });

  try {
    if (logger) {
      logReleaseEvent(logger, "release.start", {
        payload: { action: intent.action.kind, dry_run: intent.dryRun, tasks: generated.length },
      });
    }

    await tasks.runAll();
    await tasks.joinAll();
    await tasks.runCleanupTasks();

    const rootVersion = mutating ? tasks.rootVersion().toString() : null;
    if (logger) {
      logReleaseEvent(logger, "release.complete", {
        payload: { root_version: rootVersion, completed: tasks.completed().length },
      });
    }

    return {
      rootVersion,
      dryRun: intent.dryRun,
      completed: tasks.completed(),
      logPath: logger ? logger.filePath : null,
    };
  } catch (error) {
    const failure = await restoreAfterFailure(tasks, error);
    if (logger) {
      logReleaseEvent(logger, "release.failed", { payload: { message: formatErrorMessage(failure) } });
    }
    throw failure;
  } finally {
    logger?.close();
  }
}

/** Switches back to the starting branch and re-attaches the failure's partition. */
async function restoreAfterFailure(tasks: Tasks, error: unknown): Promise<unknown> {
  if (!(error instanceof TaskFailureError)) return error;
  const restoreFailure = await tasks.restoreAfterFailure();
  return error.withRestore(
    { completed: tasks.completed(), incomplete: tasks.incomplete() },
    restoreFailure,
  );
}

// =============================================================================
// REPO STATE
// =============================================================================

const EMPTY_REPO: RepoState = { currentBranch: "", dirtyFiles: [], remotes: [] };

function needsRepoState(intent: ReleaseIntent): boolean {
  const mutating = intent.action.kind === "bump" || intent.action.kind === "set";
  return mutating && (intent.gitTag || intent.branch !== undefined);
}

async function readRepoState(root: string): Promise<RepoState> {
  const [branch, dirty, remotes] = await Promise.all([
    currentBranch(root),
    dirtyFiles(root),
    listRemotes(root),
  ]);
  return { currentBranch: branch ?? "", dirtyFiles: dirty, remotes };
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const TASK_FAILURE_HINT =
  "Completed tasks were not rolled back. Check the lists above before rerunning.";
const UNKNOWN_PACKAGE_HINT = "Run `crate-version tree` to list the workspace members.";
const CONFLICTING_MODES_HINT = "Pass only one of --workspace and --default-members.";
const PRERELEASE_NOT_EMPTY_HINT =
  "Use `pre` to advance the prerelease, or pass --force-version to drop it.";
const PRERELEASE_NOT_SET_HINT = "Pass --pre <id> with patch, minor or major to start a prerelease.";
const NOT_GREATER_HINT = "Pass --force-version to allow a version that is not greater.";

export function normalizeReleaseCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof TaskFailureError) {
    const output = error.output.trim();
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: "Release task failed.",
      message: output.length > 0 && !error.message.includes(output) ? `${error.message}\n${output}` : error.message,
      hint: TASK_FAILURE_HINT,
      next: error.restoreFailure ? restoreFailureNext(error.restoreFailure) : undefined,
      cause: error,
    });
  }

  if (error instanceof SelectionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.selection,
      title: "Package selection failed.",
      message: error.message,
      hint:
        error.kind === "unknown-package"
          ? UNKNOWN_PACKAGE_HINT
          : error.kind === "conflicting-modes"
            ? CONFLICTING_MODES_HINT
            : undefined,
      cause: error,
    });
  }

  if (error instanceof VersionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.version,
      title: "Version error.",
      message: error.message,
      hint: resolveVersionHint(error),
      cause: error,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: resolveCommandErrorTitle(error),
    message: formatErrorMessage(error),
    cause: error,
  });
}

function restoreFailureNext(failure: TaskFailureError): string {
  return (
    `Restoring the starting branch failed (${failure.message}). ` +
    "Check out the branch and pop the stash by hand."
  );
}

function resolveVersionHint(error: VersionError): string | undefined {
  switch (error.kind) {
    case "prerelease-not-empty":
      return PRERELEASE_NOT_EMPTY_HINT;
    case "prerelease-not-set":
      return PRERELEASE_NOT_SET_HINT;
    case "not-greater":
      return NOT_GREATER_HINT;
    default:
      return undefined;
  }
}

function resolveCommandErrorCode(error: unknown): UserFacingError["code"] {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof ManifestError) return USER_FACING_ERROR_CODES.manifest;
  if (error instanceof GitError) return USER_FACING_ERROR_CODES.git;
  if (error instanceof CargoError) return USER_FACING_ERROR_CODES.cargo;
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveCommandErrorTitle(error: unknown): string {
  if (error instanceof ConfigError) return "Release config invalid.";
  if (error instanceof ManifestError) return "Manifest error.";
  if (error instanceof GitError) return "Git command failed.";
  if (error instanceof CargoError) return "Cargo command failed.";
  if (error instanceof ReleaseError) return "Release failed.";
  return "Release command failed.";
}
