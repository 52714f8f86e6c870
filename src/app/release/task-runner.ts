/**
 * Task runner: maps each task variant onto the workspace model or an adapter.
 * Purpose: keep the engine ignorant of git, cargo and the console.
 * Assumptions: dry-run flags are baked into the adapters when they are built.
 * Usage: createTaskRunner({ vcs, buildTool, output }) and hand it to Tasks.
 */

import type { Packages } from "../../core/packages.js";
import type { ProcessHandle } from "../../core/process.js";
import type { Task } from "../../core/task.js";

import type { BuildTool, ReleaseOutput, ReleaseVcs, TaskRunner } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskRunnerDeps = {
  vcs: ReleaseVcs;
  buildTool: BuildTool;
  output: ReleaseOutput;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createTaskRunner(deps: TaskRunnerDeps): TaskRunner {
  return {
    run: (task, packages) => runTask(task, packages, deps),
  };
}

async function runTask(
  task: Task,
  packages: Packages,
  { vcs, buildTool, output }: TaskRunnerDeps,
): Promise<ProcessHandle | null> {
  switch (task.kind) {
    case "set":
    case "bump":
      packages.setPackageVersion(task.packageName, task.newVersion);
      return null;
    case "set-workspace":
    case "bump-workspace":
      packages.setWorkspacePackageVersion(task.newVersion);
      return null;
    case "write-manifest":
      await packages.writeManifest(task.packageName);
      return null;
    case "stash":
      await vcs.stash(task.action);
      return null;
    case "switch-branch":
      await vcs.switchBranch(task.to);
      // The checked-out tree has different manifests on disk now.
      await packages.reloadManifests();
      return null;
    case "add":
      await vcs.add(task.paths);
      return null;
    case "commit":
      await vcs.commit(task.message);
      return null;
    case "tag":
      await vcs.tag(task.name);
      return null;
    case "delete-tag":
      await vcs.tag(task.name, { delete: true });
      return null;
    case "push":
      return vcs.push(task.remote, task.tag);
    case "regenerate-lockfile":
      await buildTool.generateLockfile();
      return null;
    case "publish":
      return buildTool.publish(task.packages);
    case "display-version":
      output.line(`${task.packageName} ${packages.get(task.packageName).version.toString()}`);
      return null;
    case "display-tree":
      output.line(packages.displayTree());
      return null;
  }
}
