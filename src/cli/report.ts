import type { AnsiFormatter } from "../core/error-format.js";
import { describeTask, type Task } from "../core/task.js";

export type TaskPartition = {
  completed: readonly Task[];
  incomplete: readonly Task[];
};

const plain: AnsiFormatter = (text) => text;

/** Lists what took effect and what did not after a failed release. */
export function formatTaskReport(partition: TaskPartition, format: AnsiFormatter = plain): string {
  const lines = [format("Completed:", ["bold"])];
  lines.push(...bullets(partition.completed, format("✓", ["green"]), format));
  lines.push(format("Incomplete:", ["bold"]));
  lines.push(...bullets(partition.incomplete, format("✗", ["red"]), format));
  return lines.join("\n");
}

function bullets(tasks: readonly Task[], mark: string, format: AnsiFormatter): string[] {
  if (tasks.length === 0) return [`  ${format("(none)", ["dim"])}`];
  return tasks.map((task) => `  ${mark} ${describeTask(task)}`);
}
