import { execa } from "execa";

import { GitError } from "../core/errors.js";
import { spawnProcess, type ProcessHandle } from "../core/process.js";
import type { StashAction } from "../core/task.js";

import { statusPaths } from "./status.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export type GitRunOptions = {
  /** Capture output only; otherwise it is also forwarded to the console. */
  quiet?: boolean;
  /** Non-zero exit codes that still count as success. */
  acceptExitCodes?: readonly number[];
};

export type GitWriteOptions = GitRunOptions & {
  dryRun?: boolean;
};

// =============================================================================
// RUNNER
// =============================================================================

export async function git(
  cwd: string,
  args: string[],
  opts: GitRunOptions = {},
): Promise<GitResult> {
  const quiet = opts.quiet ?? true;
  const res = await execa("git", args, {
    cwd,
    env: process.env,
    reject: false,
    stdin: "ignore",
    stdout: quiet ? "pipe" : ["pipe", "inherit"],
    stderr: quiet ? "pipe" : ["pipe", "inherit"],
  });

  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  // A missing exit code means git never started or was killed.
  const exitCode = res.exitCode ?? -1;
  if (exitCode !== 0 && !(opts.acceptExitCodes ?? []).includes(exitCode)) {
    const detail = stderr.trim() || `exit code ${exitCode}`;
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, { stdout, stderr });
  }
  return { stdout, stderr, exitCode };
}

// =============================================================================
// QUERIES
// =============================================================================

/** Current branch name, or null on a detached HEAD. */
export async function currentBranch(cwd: string): Promise<string | null> {
  const res = await git(cwd, ["branch", "--show-current"]);
  const branch = res.stdout.trim();
  return branch.length > 0 ? branch : null;
}

/** Paths with uncommitted changes, untracked files included, relative to the repo root. */
export async function dirtyFiles(cwd: string): Promise<string[]> {
  const res = await git(cwd, ["status", "--short"]);
  return statusPaths(res.stdout);
}

export async function listRemotes(cwd: string): Promise<string[]> {
  const res = await git(cwd, ["remote"]);
  return res.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// =============================================================================
// MUTATIONS
// =============================================================================

export async function addFiles(
  cwd: string,
  paths: readonly string[],
  opts: GitRunOptions = {},
): Promise<void> {
  if (paths.length === 0) return;
  await git(cwd, ["add", "--", ...paths], opts);
}

// `git commit --dry-run` exits 1 when there is nothing to commit.
export async function commit(cwd: string, message: string, opts: GitWriteOptions = {}): Promise<void> {
  await git(cwd, commitArgs(message, opts), opts.dryRun ? { ...opts, acceptExitCodes: [1] } : opts);
}

export async function tag(
  cwd: string,
  name: string,
  opts: GitRunOptions & { delete?: boolean } = {},
): Promise<void> {
  await git(cwd, opts.delete ? ["tag", "--delete", name] : ["tag", name], opts);
}

export async function checkout(cwd: string, branch: string, opts: GitRunOptions = {}): Promise<void> {
  await git(cwd, ["checkout", branch], opts);
}

export async function stash(cwd: string, action: StashAction, opts: GitRunOptions = {}): Promise<void> {
  await git(cwd, ["stash", action], opts);
}

/** Starts pushing a tag; the returned handle reports the exit. */
export function pushTag(
  cwd: string,
  remote: string,
  tagName: string,
  opts: GitWriteOptions = {},
): ProcessHandle {
  return spawnProcess("git", pushTagArgs(remote, tagName, opts), { cwd, quiet: opts.quiet ?? true });
}

// =============================================================================
// ARGUMENTS
// =============================================================================

export function commitArgs(message: string, opts: { dryRun?: boolean } = {}): string[] {
  return ["commit", ...(opts.dryRun ? ["--dry-run"] : []), "--message", message];
}

export function pushTagArgs(
  remote: string,
  tagName: string,
  opts: { dryRun?: boolean } = {},
): string[] {
  return ["push", ...(opts.dryRun ? ["--dry-run"] : []), "--porcelain", remote, `tags/${tagName}`];
}

// =============================================================================
// ERRORS
// =============================================================================

export function gitErrorOutput(err: GitError): { stdout: string; stderr: string } {
  const cause = err.cause;
  if (cause && typeof cause === "object") {
    const stdoutRaw = "stdout" in cause ? cause.stdout : undefined;
    const stderrRaw = "stderr" in cause ? cause.stderr : undefined;
    return {
      stdout: typeof stdoutRaw === "string" ? stdoutRaw : "",
      stderr: typeof stderrRaw === "string" ? stderrRaw : "",
    };
  }
  return { stdout: "", stderr: "" };
}
