/**
 * Release ports define the boundary between the task engine and its adapters.
 * Purpose: keep git, cargo and console access replaceable for testing.
 * Assumptions: ordered steps resolve once they are done; push and publish return
 * a handle so several can run at once.
 * Usage: build with createGitVcs / createCargoBuildTool and pass to createTaskRunner.
 */

import type { ReleaseEventFields, ReleaseEventType } from "../../core/logger.js";
import type { Packages } from "../../core/packages.js";
import type { ProcessHandle } from "../../core/process.js";
import type { StashAction, Task } from "../../core/task.js";

// =============================================================================
// PORTS
// =============================================================================

export interface ReleaseVcs {
  add(paths: readonly string[]): Promise<void>;
  commit(message: string): Promise<void>;
  tag(name: string, options?: { delete?: boolean }): Promise<void>;
  push(remote: string, tag: string): ProcessHandle;
  switchBranch(target: string): Promise<void>;
  stash(action: StashAction): Promise<void>;
}

export interface BuildTool {
  publish(packages: readonly string[]): ProcessHandle;
  generateLockfile(): Promise<void>;
}

export interface ReleaseOutput {
  line(text: string): void;
}

/** Executes one task. Returns a handle when the work continues in a child process. */
export interface TaskRunner {
  run(task: Task, packages: Packages): Promise<ProcessHandle | null>;
}

export interface ReleaseEventSink {
  log(type: ReleaseEventType, fields?: ReleaseEventFields): void;
}
