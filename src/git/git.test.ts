import { afterEach, describe, expect, it, vi } from "vitest";

import { GitError } from "../core/errors.js";

import { commit, commitArgs, gitErrorOutput, pushTagArgs } from "./git.js";

const execaMock = vi.hoisted(() => vi.fn());

vi.mock("execa", () => ({
  execa: execaMock,
}));

const NOTHING_TO_COMMIT = "On branch main\nnothing to commit, working tree clean\n";

describe("commitArgs", () => {
  it("adds --dry-run before the message", () => {
    expect(commitArgs("1.2.0")).toEqual(["commit", "--message", "1.2.0"]);
    expect(commitArgs("1.2.0", { dryRun: true })).toEqual([
      "commit",
      "--dry-run",
      "--message",
      "1.2.0",
    ]);
  });
});

describe("commit", () => {
  afterEach(() => {
    execaMock.mockReset();
  });

  it("treats a dry run with nothing to commit as success", async () => {
    execaMock.mockResolvedValueOnce({ stdout: NOTHING_TO_COMMIT, stderr: "", exitCode: 1 });

    await expect(commit("/repo", "1.0.1", { dryRun: true })).resolves.toBeUndefined();
    expect(execaMock).toHaveBeenCalledWith(
      "git",
      ["commit", "--dry-run", "--message", "1.0.1"],
      expect.objectContaining({ cwd: "/repo" }),
    );
  });

  it("still fails a real commit with nothing to commit", async () => {
    execaMock.mockResolvedValueOnce({ stdout: NOTHING_TO_COMMIT, stderr: "", exitCode: 1 });

    await expect(commit("/repo", "1.0.1")).rejects.toBeInstanceOf(GitError);
  });

  it("fails a dry run on other exit codes", async () => {
    execaMock.mockResolvedValueOnce({ stdout: "", stderr: "fatal: not a git repository\n", exitCode: 128 });

    await expect(commit("/repo", "1.0.1", { dryRun: true })).rejects.toThrow(
      "git commit --dry-run --message 1.0.1 failed (cwd=/repo): fatal: not a git repository",
    );
  });
});

describe("pushTagArgs", () => {
  it("pushes a single tag ref with porcelain output", () => {
    expect(pushTagArgs("origin", "v1.2.0")).toEqual(["push", "--porcelain", "origin", "tags/v1.2.0"]);
    expect(pushTagArgs("upstream", "v1.2.0", { dryRun: true })).toEqual([
      "push",
      "--dry-run",
      "--porcelain",
      "upstream",
      "tags/v1.2.0",
    ]);
  });
});

describe("gitErrorOutput", () => {
  it("reads captured output from the cause", () => {
    const err = new GitError("git tag failed", {
      stdout: "",
      stderr: "fatal: tag 'v1.2.0' already exists\n",
    });

    expect(gitErrorOutput(err)).toEqual({ stdout: "", stderr: "fatal: tag 'v1.2.0' already exists\n" });
  });

  it("is empty without a cause", () => {
    expect(gitErrorOutput(new GitError("git failed"))).toEqual({ stdout: "", stderr: "" });
  });
});
