/**
 * Task execution engine.
 * Purpose: run a generated task list in order, let push and publish processes
 * run side by side, and report which tasks completed when something fails.
 * Assumptions: a single caller drives runAll -> joinAll -> runCleanupTasks, and
 * calls restoreAfterFailure when any of them throws.
 * Usage:
 *   const tasks = new Tasks(generateTasks(intent, packages, repo), packages, { runner });
 *   await tasks.runAll();
 *   await tasks.joinAll();
 *   await tasks.runCleanupTasks();
 */

import { formatErrorMessage } from "../../core/error-format.js";
import { ReleaseError } from "../../core/errors.js";
import {
  logReleaseEvent,
  type JsonObject,
  type JsonlLogger,
  type ReleaseEventFields,
  type ReleaseEventType,
} from "../../core/logger.js";
import type { Packages } from "../../core/packages.js";
import type { ProcessExit, ProcessHandle } from "../../core/process.js";
import { resolveRootVersion } from "../../core/task-generation.js";
import {
  describeTask,
  isDeferredTask,
  isRestoreTask,
  taskKey,
  type Task,
} from "../../core/task.js";
import type { Version } from "../../core/version.js";

import type { ReleaseEventSink, ReleaseOutput, TaskRunner } from "./ports.js";
import { TaskFailureError } from "./task-failure.js";

// =============================================================================
// TYPES
// =============================================================================

type TaskStatus =
  | { state: "pending" }
  | { state: "running"; handle: ProcessHandle }
  | { state: "completed" }
  | { state: "failed" };

type TaskEntry = {
  task: Task;
  status: TaskStatus;
};

type FailureDetail = {
  message: string;
  output: string;
  exitCode?: number;
  cause?: unknown;
};

export type TasksOptions = {
  runner: TaskRunner;
  events?: ReleaseEventSink;
  /** Receives a `✓ <task>` line per completed task. */
  progress?: ReleaseOutput;
};

// =============================================================================
// ENGINE
// =============================================================================

export class Tasks {
  private readonly entries = new Map<string, TaskEntry>();
  private readonly completionOrder: Task[] = [];

  constructor(
    tasks: Iterable<Task>,
    private readonly packages: Packages,
    private readonly options: TasksOptions,
  ) {
    for (const task of tasks) {
      const key = taskKey(task);
      if (!this.entries.has(key)) {
        this.entries.set(key, { task, status: { state: "pending" } });
      }
    }
  }

  tasks(): Task[] {
    return [...this.entries.values()].map((entry) => entry.task);
  }

  /** Completed tasks in the order they completed. */
  completed(): Task[] {
    return [...this.completionOrder];
  }

  incomplete(): Task[] {
    return this.select((entry) => entry.status.state !== "completed");
  }

  rootVersion(): Version {
    return resolveRootVersion(this.tasks(), this.packages);
  }

  /**
   * Starts every task in order except cleanup and restore tasks, which wait for
   * runCleanupTasks. Ordered steps finish before the next starts.
   */
  async runAll(): Promise<void> {
    for (const entry of this.entries.values()) {
      if (isDeferredTask(entry.task) || entry.status.state !== "pending") continue;
      await this.start(entry);
    }
  }

  /** Waits for every spawned process; resolves once all non-deferred tasks completed. */
  async joinAll(): Promise<void> {
    this.emit("join.start", { payload: { running: this.running().length } });

    for (const entry of this.entries.values()) {
      if (isDeferredTask(entry.task)) continue;
      if (entry.status.state === "pending") {
        throw this.fail(entry, {
          message: `\`${describeTask(entry.task)}\` was never started.`,
          output: "",
        });
      }
      if (entry.status.state === "failed") {
        throw this.fail(entry, {
          message: `\`${describeTask(entry.task)}\` already failed.`,
          output: "",
        });
      }
    }

    for (;;) {
      const outstanding: ProcessHandle[] = [];
      let progressed = false;

      for (const entry of this.running()) {
        if (entry.status.state !== "running") continue;
        const exit = entry.status.handle.tryWait();
        if (exit === null) {
          outstanding.push(entry.status.handle);
          continue;
        }
        this.settle(entry, exit);
        progressed = true;
      }

      if (outstanding.length === 0) break;
      if (!progressed) {
        await Promise.race(outstanding.map((handle) => handle.settled));
      }
    }

    this.emit("join.complete", { payload: { completed: this.completed().length } });
  }

  /**
   * Runs the tasks held back until the rest of the batch completed: the dry-run
   * tag deletion, then the switch back to the starting branch and the stash pop.
   */
  async runCleanupTasks(): Promise<void> {
    const blocking = this.select(
      (entry) => !isDeferredTask(entry.task) && entry.status.state !== "completed",
    );
    if (blocking.length > 0) {
      throw new ReleaseError(
        `Cleanup tasks cannot run before every other task has completed: ${blocking
          .map((task) => `\`${describeTask(task)}\``)
          .join(", ")}.`,
      );
    }

    const cleanup = [...this.entries.values()].filter(
      (entry) => isDeferredTask(entry.task) && entry.status.state === "pending",
    );
    this.emit("cleanup.start", { payload: { tasks: cleanup.length } });

    for (const entry of cleanup) {
      await this.start(entry);
      if (entry.status.state !== "running") continue;

      await entry.status.handle.settled;
      const failure = this.exitFailure(entry);
      if (failure) throw this.fail(entry, failure);
      this.complete(entry);
    }

    this.emit("cleanup.complete");
  }

  /**
   * Puts the starting branch and stashed changes back after a failure. Waits for
   * the processes still running first, so nothing switches branch under them.
   * Returns the restore failure instead of throwing it.
   */
  async restoreAfterFailure(): Promise<TaskFailureError | null> {
    for (const entry of this.running()) {
      if (entry.status.state !== "running") continue;
      await entry.status.handle.settled;
      const failure = this.exitFailure(entry);
      if (failure) {
        this.fail(entry, failure);
      } else {
        this.complete(entry);
      }
    }

    const restoreEntries = [...this.entries.values()].filter((entry) => isRestoreTask(entry.task));
    // A failed restore leaves the tree somewhere unknown; stop there.
    if (restoreEntries.some((entry) => entry.status.state === "failed")) return null;
    const restore = restoreEntries.filter(
      (entry) => entry.status.state === "pending" && this.wasBracketed(entry.task),
    );
    if (restore.length === 0) return null;

    this.emit("restore.start", { payload: { tasks: restore.length } });
    for (const entry of restore) {
      try {
        await this.start(entry);
      } catch (error) {
        if (error instanceof TaskFailureError) return error;
        throw error;
      }
    }
    this.emit("restore.complete");
    return null;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async start(entry: TaskEntry): Promise<void> {
    const label = describeTask(entry.task);
    this.emit("task.start", { task: label });

    let handle: ProcessHandle | null;
    try {
      handle = await this.options.runner.run(entry.task, this.packages);
    } catch (error) {
      const summary = formatErrorMessage(error);
      throw this.fail(entry, { message: `\`${label}\` failed: ${summary}`, output: summary, cause: error });
    }

    if (handle) {
      entry.status = { state: "running", handle };
      this.emit("task.spawned", { task: label, payload: { command: handle.command } });
      return;
    }
    this.complete(entry);
  }

  private settle(entry: TaskEntry, exit: ProcessExit): void {
    const failure = describeExitFailure(describeTask(entry.task), exit);
    if (failure) throw this.fail(entry, failure);
    this.complete(entry);
  }

  /** Failure of a settled process, or null when it exited 0. */
  private exitFailure(entry: TaskEntry): FailureDetail | null {
    if (entry.status.state !== "running") return null;
    const label = describeTask(entry.task);
    const exit = entry.status.handle.tryWait();
    if (exit === null) {
      return { message: `\`${label}\` settled without an exit status.`, output: "" };
    }
    return describeExitFailure(label, exit);
  }

  /** A restore task only undoes a bracketing step that actually ran. */
  private wasBracketed(task: Task): boolean {
    return [...this.entries.values()].some(
      ({ task: other, status }) =>
        status.state === "completed" &&
        (task.kind === "stash"
          ? other.kind === "stash" && other.action === "push"
          : other.kind === "switch-branch" && other.restore !== true),
    );
  }

  private complete(entry: TaskEntry): void {
    entry.status = { state: "completed" };
    this.completionOrder.push(entry.task);
    const label = describeTask(entry.task);
    this.emit("task.complete", { task: label });
    this.options.progress?.line(`✓ ${label}`);
  }

  private fail(entry: TaskEntry, detail: FailureDetail): TaskFailureError {
    entry.status = { state: "failed" };

    const payload: JsonObject = { message: detail.message };
    if (detail.exitCode !== undefined) payload.exit_code = detail.exitCode;
    this.emit("task.failed", { task: describeTask(entry.task), payload });

    return new TaskFailureError({
      task: entry.task,
      message: detail.message,
      output: detail.output,
      exitCode: detail.exitCode,
      completed: this.completed(),
      incomplete: this.incomplete(),
      cause: detail.cause,
    });
  }

  private running(): TaskEntry[] {
    return [...this.entries.values()].filter((entry) => entry.status.state === "running");
  }

  private select(predicate: (entry: TaskEntry) => boolean): Task[] {
    return [...this.entries.values()].filter(predicate).map((entry) => entry.task);
  }

  private emit(type: ReleaseEventType, fields?: ReleaseEventFields): void {
    this.options.events?.log(type, fields);
  }
}

function describeExitFailure(label: string, exit: ProcessExit): FailureDetail | null {
  if (exit.kind === "error") {
    return {
      message: `\`${label}\` failed: ${exit.error.message}`,
      output: exit.error.message,
      cause: exit.error,
    };
  }
  if (exit.exitCode !== 0) {
    return {
      message: `\`${label}\` exited with code: ${exit.exitCode}`,
      output: exit.stderr,
      exitCode: exit.exitCode,
    };
  }
  return null;
}

// =============================================================================
// EVENT SINKS
// =============================================================================

export function createJsonlEventSink(logger: JsonlLogger): ReleaseEventSink {
  return {
    log: (type, fields) => logReleaseEvent(logger, type, fields),
  };
}
