import { execa, type Options } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessOutcome = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ProcessExit =
  | ({ kind: "exited" } & ProcessOutcome)
  | { kind: "error"; error: Error };

/**
 * A spawned process that can be polled without blocking. `tryWait()` returns
 * null while the process runs; `settled` resolves (never rejects) once it has
 * exited or failed.
 */
export interface ProcessHandle {
  readonly command: string;
  tryWait(): ProcessExit | null;
  readonly settled: Promise<void>;
}

export type SpawnOptions = {
  cwd: string;
  /** Capture output only; otherwise it is also forwarded to the console. */
  quiet?: boolean;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// HANDLES
// =============================================================================

export function createProcessHandle(
  command: string,
  completion: Promise<ProcessOutcome>,
): ProcessHandle {
  let exit: ProcessExit | null = null;

  const settled = completion.then(
    (outcome) => {
      exit = { kind: "exited", ...outcome };
    },
    (error: unknown) => {
      exit = { kind: "error", error: error instanceof Error ? error : new Error(String(error)) };
    },
  );

  return {
    command,
    tryWait: () => exit,
    settled,
  };
}

export function spawnProcess(file: string, args: string[], options: SpawnOptions): ProcessHandle {
  const command = formatCommand(file, args);
  const execaOptions: Options = {
    cwd: options.cwd,
    env: options.env ?? process.env,
    reject: false,
    stdin: "ignore",
    stdout: options.quiet ? "pipe" : ["pipe", "inherit"],
    stderr: options.quiet ? "pipe" : ["pipe", "inherit"],
  };

  const completion = execa(file, args, execaOptions).then((res) => {
    const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
    const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
    if (res.exitCode === undefined) {
      throw new Error(`${command} did not exit normally${stderr ? `: ${stderr}` : ""}`);
    }
    return { exitCode: res.exitCode, stdout, stderr };
  });

  return createProcessHandle(command, completion);
}

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].join(" ");
}
