import { ReleaseError } from "../../core/errors.js";
import type { Task } from "../../core/task.js";

export type TaskFailureInput = {
  task: Task;
  message: string;
  output: string;
  exitCode?: number;
  completed: readonly Task[];
  incomplete: readonly Task[];
  cause?: unknown;
  /** Set when putting the starting branch back failed as well. */
  restoreFailure?: TaskFailureError;
};

/**
 * A task that could not finish. Carries the partition of the batch at the time
 * of failure; nothing that already completed is undone.
 */
export class TaskFailureError extends ReleaseError {
  readonly task: Task;
  readonly output: string;
  readonly exitCode?: number;
  readonly completed: readonly Task[];
  readonly incomplete: readonly Task[];
  readonly restoreFailure?: TaskFailureError;

  constructor(input: TaskFailureInput) {
    super(input.message, input.cause);
    this.name = "TaskFailureError";
    this.task = input.task;
    this.output = input.output;
    this.exitCode = input.exitCode;
    this.completed = input.completed;
    this.incomplete = input.incomplete;
    this.restoreFailure = input.restoreFailure;
  }

  /** Same failure with the partition taken after restoring. */
  withRestore(
    partition: { completed: readonly Task[]; incomplete: readonly Task[] },
    restoreFailure: TaskFailureError | null,
  ): TaskFailureError {
    return new TaskFailureError({
      task: this.task,
      message: this.message,
      output: this.output,
      exitCode: this.exitCode,
      completed: partition.completed,
      incomplete: partition.incomplete,
      cause: this.cause,
      restoreFailure: restoreFailure ?? undefined,
    });
  }
}
