import { execa } from "execa";

import { CargoError } from "../core/errors.js";
import { spawnProcess, type ProcessHandle } from "../core/process.js";

// =============================================================================
// TYPES
// =============================================================================

export type CargoResult = { stdout: string; stderr: string; exitCode: number };

export type CargoRunOptions = {
  /** Capture output only; otherwise it is also forwarded to the console. */
  quiet?: boolean;
};

export type PublishOptions = CargoRunOptions & {
  manifestPath: string;
  packages: readonly string[];
  dryRun?: boolean;
  noVerify?: boolean;
  allowDirty?: boolean;
};

// =============================================================================
// RUNNER
// =============================================================================

export async function cargo(
  cwd: string,
  args: string[],
  opts: CargoRunOptions = {},
): Promise<CargoResult> {
  const quiet = opts.quiet ?? true;
  const res = await execa("cargo", args, {
    cwd,
    env: process.env,
    reject: false,
    stdin: "ignore",
    stdout: quiet ? "pipe" : ["pipe", "inherit"],
    stderr: quiet ? "pipe" : ["pipe", "inherit"],
  });

  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  const exitCode = res.exitCode ?? -1;
  if (exitCode !== 0) {
    const detail = stderr.trim() || `exit code ${exitCode}`;
    throw new CargoError(`cargo ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, {
      stdout,
      stderr,
    });
  }
  return { stdout, stderr, exitCode };
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function generateLockfile(
  cwd: string,
  manifestPath: string,
  opts: CargoRunOptions = {},
): Promise<void> {
  await cargo(cwd, ["generate-lockfile", "--manifest-path", manifestPath], opts);
}

/** Starts `cargo publish`; the returned handle reports the exit. */
export function publish(cwd: string, options: PublishOptions): ProcessHandle {
  return spawnProcess("cargo", publishArgs(options), { cwd, quiet: options.quiet ?? true });
}

export function publishArgs(options: Omit<PublishOptions, "quiet">): string[] {
  const args = ["publish"];
  if (options.dryRun) args.push("--dry-run");
  if (options.noVerify) args.push("--no-verify");
  if (options.allowDirty) args.push("--allow-dirty");
  args.push("--manifest-path", options.manifestPath);
  for (const name of options.packages) {
    args.push("--package", name);
  }
  return args;
}

export function metadataArgs(manifestPath?: string): string[] {
  const args = ["metadata", "--format-version", "1", "--no-deps"];
  if (manifestPath !== undefined) args.push("--manifest-path", manifestPath);
  return args;
}
