/*
Purpose: turn a resolved release intent and a workspace snapshot into the ordered task list.
Assumptions: repo state (branch, dirty files, remotes) is queried by the caller beforehand,
so generation itself performs no I/O. Version errors surface here, before any mutation.
Usage: const tasks = generateTasks(intent, packages, repo);
*/

import { GitError, SelectionError } from "./errors.js";
import { WORKSPACE_PACKAGE_NAME, type Package } from "./package.js";
import type { Packages } from "./packages.js";
import type { Prerelease } from "./prerelease.js";
import { selectPackages, type SelectionFlags } from "./selection.js";
import { freezeTask, isVersionChange, versionTarget, type Task } from "./task.js";
import type { BumpKind, Version } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseAction =
  | { kind: "bump"; bump: BumpKind }
  | { kind: "set"; version: Version }
  | { kind: "print" }
  | { kind: "tree" };

export type ReleaseIntent = {
  action: ReleaseAction;
  prerelease?: Prerelease;
  build?: string;
  force: boolean;
  dryRun: boolean;
  gitTag: boolean;
  gitPush: boolean;
  publish: boolean;
  allowDirty: boolean;
  /** Commit message template; `{version}` expands to the root version. */
  message?: string;
  tagPrefix: string;
  branch?: string;
  workspacePackage: boolean;
  selection: SelectionFlags;
};

export type RepoState = {
  currentBranch: string;
  dirtyFiles: string[];
  remotes: string[];
};

type VersionAction = Extract<ReleaseAction, { kind: "bump" | "set" }>;

// =============================================================================
// GENERATION
// =============================================================================

export function generateTasks(intent: ReleaseIntent, packages: Packages, repo: RepoState): Task[] {
  const action = intent.action;
  switch (action.kind) {
    case "tree":
      return [freezeTask({ kind: "display-tree" })];
    case "print":
      return generateDisplayTasks(intent, packages);
    case "bump":
    case "set":
      return generateReleaseTasks(intent, action, packages, repo);
  }
}

function generateDisplayTasks(intent: ReleaseIntent, packages: Packages): Task[] {
  const { included } = selectPackages(packages, intent.selection);
  const tasks: Task[] = included.map((pkg) =>
    freezeTask({ kind: "display-version", packageName: pkg.name }),
  );

  if (intent.workspacePackage) {
    const workspace = packages.get(WORKSPACE_PACKAGE_NAME);
    tasks.push(freezeTask({ kind: "display-version", packageName: workspace.name }));
  }

  return tasks;
}

function generateReleaseTasks(
  intent: ReleaseIntent,
  action: VersionAction,
  packages: Packages,
  repo: RepoState,
): Task[] {
  const tasks: Task[] = [];
  const emit = (task: Task): void => {
    tasks.push(freezeTask(task));
  };

  // 1. Branch bracketing.
  const target =
    intent.branch !== undefined && intent.branch !== repo.currentBranch ? intent.branch : undefined;
  const stashing = target !== undefined && repo.dirtyFiles.length > 0;
  if (target !== undefined) {
    if (stashing) emit({ kind: "stash", action: "push" });
    emit({ kind: "switch-branch", from: repo.currentBranch, to: target });
  }

  // 2. Selection.
  const { included } = selectPackages(packages, intent.selection);

  // 3. Packages that own their version.
  for (const pkg of included) {
    if (pkg.versionType !== "own") continue;

    const newVersion = nextVersion(pkg, action, intent);
    emit(
      action.kind === "bump"
        ? { kind: "bump", packageName: pkg.name, bump: action.bump, newVersion }
        : { kind: "set", packageName: pkg.name, newVersion },
    );
    if (!intent.dryRun) emit({ kind: "write-manifest", packageName: pkg.name });
  }

  // 4. The shared workspace version.
  const inheritors = included.filter((pkg) => pkg.inheritsVersion);
  if (inheritors.length > 0 || intent.workspacePackage) {
    const workspace = packages.workspacePackage();
    if (!workspace) {
      const requester =
        inheritors.length > 0
          ? `${inheritors.map((pkg) => pkg.name).join(", ")} inherit the workspace version`
          : "--workspace-package was given";
      throw new SelectionError(
        "no-workspace-package",
        `${requester}, but the workspace does not declare workspace.package.version.`,
        WORKSPACE_PACKAGE_NAME,
      );
    }

    const newVersion = nextVersion(workspace, action, intent);
    emit(
      action.kind === "bump"
        ? { kind: "bump-workspace", bump: action.bump, newVersion }
        : { kind: "set-workspace", newVersion },
    );
    if (!intent.dryRun) emit({ kind: "write-manifest", packageName: WORKSPACE_PACKAGE_NAME });
  }

  // 5. Git.
  let tag: { name: string; version: Version } | undefined;
  if (intent.gitTag) {
    assertCleanTree(intent, packages, repo, stashing, tasks);

    const rootVersion = resolveRootVersion(tasks, packages);
    tag = { name: `${intent.tagPrefix}${rootVersion.toString()}`, version: rootVersion };

    emit({ kind: "regenerate-lockfile" });
    emit({ kind: "add", paths: stagedPaths(tasks, packages) });
    emit({ kind: "commit", message: formatCommitMessage(intent.message, rootVersion) });
    emit({ kind: "tag", name: tag.name, version: tag.version });

    if (intent.gitPush) {
      for (const remote of repo.remotes) {
        emit({ kind: "push", remote, tag: tag.name });
      }
    }
  }

  // 6. Publish.
  if (intent.publish) {
    emit({ kind: "publish", packages: included.map((pkg) => pkg.name) });
  }

  // 7. Dry-run cleanup.
  if (intent.dryRun && tag) {
    emit({ kind: "delete-tag", name: tag.name, version: tag.version });
  }

  // 8. Undo the branch bracketing.
  if (target !== undefined) {
    emit({ kind: "switch-branch", from: target, to: repo.currentBranch, restore: true });
    if (stashing) emit({ kind: "stash", action: "pop" });
  }

  return tasks;
}

// =============================================================================
// ROOT VERSION
// =============================================================================

/**
 * The version a release is tagged with: the root package's new version, else
 * the workspace's, else the one version all changes agree on. Without version
 * changes the workspace model decides.
 */
export function resolveRootVersion(tasks: readonly Task[], packages: Packages): Version {
  const changes = tasks.filter(isVersionChange);
  if (changes.length === 0) {
    return packages.rootVersion();
  }

  const rootName = packages.rootPackage()?.name;
  for (const name of [rootName, WORKSPACE_PACKAGE_NAME]) {
    const change = changes.find((task) => versionTarget(task) === name);
    if (change) return change.newVersion;
  }

  const distinct = new Map(
    changes.map((task): [string, Version] => [task.newVersion.toString(), task.newVersion]),
  );
  if (distinct.size === 1) {
    return changes[0].newVersion;
  }

  throw new SelectionError(
    "no-root-version",
    `No root version: the release sets ${distinct.size} different versions (${[...distinct.keys()].join(", ")}).`,
  );
}

export function formatCommitMessage(template: string | undefined, version: Version): string {
  if (template === undefined || template.trim().length === 0) {
    return version.toString();
  }
  return template.split("{version}").join(version.toString());
}

// =============================================================================
// INTERNALS
// =============================================================================

function nextVersion(pkg: Package, action: VersionAction, intent: ReleaseIntent): Version {
  if (action.kind === "set") {
    return action.version;
  }
  return pkg.version.bump(action.bump, {
    prerelease: intent.prerelease,
    build: intent.build,
    force: intent.force,
  });
}

function stagedPaths(tasks: readonly Task[], packages: Packages): string[] {
  const paths: string[] = [];
  for (const task of tasks) {
    if (task.kind !== "write-manifest") continue;
    paths.push(packages.relativePath(packages.get(task.packageName).manifestPath));
  }
  paths.push(packages.relativePath(packages.lockfilePath));
  return [...new Set(paths)];
}

function assertCleanTree(
  intent: ReleaseIntent,
  packages: Packages,
  repo: RepoState,
  stashing: boolean,
  tasks: readonly Task[],
): void {
  if (intent.allowDirty || stashing) return;

  const expected = new Set(stagedPaths(tasks, packages));
  const unexpected = repo.dirtyFiles.filter((file) => !expected.has(file));
  if (unexpected.length === 0) return;

  throw new GitError(
    `Working tree has uncommitted changes outside the release files: ${unexpected.join(", ")}. Commit or stash them, or pass --allow-dirty.`,
  );
}
