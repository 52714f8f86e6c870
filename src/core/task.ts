import { WORKSPACE_PACKAGE_NAME } from "./package.js";
import { Version, type BumpKind } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export type StashAction = "push" | "pop";

export type Task =
  | { readonly kind: "set"; readonly packageName: string; readonly newVersion: Version }
  | {
      readonly kind: "bump";
      readonly packageName: string;
      readonly bump: BumpKind;
      readonly newVersion: Version;
    }
  | { readonly kind: "set-workspace"; readonly newVersion: Version }
  | { readonly kind: "bump-workspace"; readonly bump: BumpKind; readonly newVersion: Version }
  | { readonly kind: "write-manifest"; readonly packageName: string }
  | { readonly kind: "stash"; readonly action: StashAction }
  | {
      readonly kind: "switch-branch";
      readonly from: string;
      readonly to: string;
      /** Set on the switch back to the starting branch. */
      readonly restore?: boolean;
    }
  | { readonly kind: "add"; readonly paths: readonly string[] }
  | { readonly kind: "commit"; readonly message: string }
  | { readonly kind: "tag"; readonly name: string; readonly version: Version }
  | { readonly kind: "delete-tag"; readonly name: string; readonly version: Version }
  | { readonly kind: "push"; readonly remote: string; readonly tag: string }
  | { readonly kind: "regenerate-lockfile" }
  | { readonly kind: "publish"; readonly packages: readonly string[] }
  | { readonly kind: "display-version"; readonly packageName: string }
  | { readonly kind: "display-tree" };

export type TaskKind = Task["kind"];

export type VersionChangeTask = Extract<
  Task,
  { kind: "set" | "bump" | "set-workspace" | "bump-workspace" }
>;

// =============================================================================
// CLASSIFICATION
// =============================================================================

/** Cleanup tasks run only after every other task has completed. */
export function isCleanupTask(task: Task): boolean {
  return task.kind === "delete-tag";
}

/** Restore tasks put the starting branch and stashed changes back. */
export function isRestoreTask(task: Task): boolean {
  return (
    (task.kind === "switch-branch" && task.restore === true) ||
    (task.kind === "stash" && task.action === "pop")
  );
}

/** Tasks the engine holds back until every spawned process has exited. */
export function isDeferredTask(task: Task): boolean {
  return isCleanupTask(task) || isRestoreTask(task);
}

export function isVersionChange(task: Task): task is VersionChangeTask {
  return (
    task.kind === "set" ||
    task.kind === "bump" ||
    task.kind === "set-workspace" ||
    task.kind === "bump-workspace"
  );
}

/** Package a version change applies to; the workspace entry uses its synthetic name. */
export function versionTarget(task: VersionChangeTask): string {
  return task.kind === "set" || task.kind === "bump" ? task.packageName : WORKSPACE_PACKAGE_NAME;
}

// =============================================================================
// IDENTITY
// =============================================================================

/**
 * Stable identity of a task. Two tasks with the same variant and fields share
 * a key, which is what the engine uses to index its map.
 */
export function taskKey(task: Task): string {
  return JSON.stringify(task, (_key, value: unknown) =>
    value instanceof Version ? value.toString() : value,
  );
}

export function freezeTask<T extends Task>(task: T): T {
  if (task.kind === "add") Object.freeze(task.paths);
  if (task.kind === "publish") Object.freeze(task.packages);
  return Object.freeze(task);
}

// =============================================================================
// DISPLAY
// =============================================================================

export function describeTask(task: Task): string {
  switch (task.kind) {
    case "set":
      return `Set Version: ${task.packageName} -> ${task.newVersion.toString()}`;
    case "bump":
      return `Bump ${capitalize(task.bump)}: ${task.packageName} -> ${task.newVersion.toString()}`;
    case "set-workspace":
      return `Set Version: ${WORKSPACE_PACKAGE_NAME} -> ${task.newVersion.toString()}`;
    case "bump-workspace":
      return `Bump ${capitalize(task.bump)}: ${WORKSPACE_PACKAGE_NAME} -> ${task.newVersion.toString()}`;
    case "write-manifest":
      return `Write Cargo.toml: ${task.packageName}`;
    case "stash":
      return `Git Stash: ${task.action}`;
    case "switch-branch":
      return `Git Switch Branch: ${task.from} -> ${task.to}`;
    case "add":
      return `Git Add: ${task.paths.join(", ")}`;
    case "commit":
      return `Git Commit: ${task.message}`;
    case "tag":
      return `Git Tag: ${task.name}`;
    case "delete-tag":
      return `Delete Git Tag: ${task.name}`;
    case "push":
      return `Git Push: ${task.tag} to ${task.remote}`;
    case "regenerate-lockfile":
      return "Cargo Generate Lockfile";
    case "publish":
      return `Cargo Publish: ${task.packages.join(", ")}`;
    case "display-version":
      return `Print Version: ${task.packageName}`;
    case "display-tree":
      return "Print Workspace Tree";
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
