/**
 * Git VCS adapter tests.
 * Purpose: ensure the adapter forwards the working directory and run flags.
 * Usage: vitest run src/app/release/vcs/git-vcs.test.ts
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import type { addFiles, checkout, commit, pushTag, stash, tag } from "../../../git/git.js";
import { createProcessHandle } from "../../../core/process.js";

import { createGitVcs } from "./git-vcs.js";

const gitMocks = vi.hoisted(() => ({
  addFiles: vi.fn<typeof addFiles>(),
  commit: vi.fn<typeof commit>(),
  tag: vi.fn<typeof tag>(),
  pushTag: vi.fn<typeof pushTag>(),
  checkout: vi.fn<typeof checkout>(),
  stash: vi.fn<typeof stash>(),
}));

vi.mock("../../../git/git.js", () => gitMocks);

// =============================================================================
// TESTS
// =============================================================================

describe("createGitVcs", () => {
  beforeEach(() => {
    for (const mock of Object.values(gitMocks)) {
      mock.mockReset();
    }
  });

  it("passes dry-run to commit and push only", async () => {
    const handle = createProcessHandle("git push", Promise.resolve({ exitCode: 0, stdout: "", stderr: "" }));
    gitMocks.pushTag.mockReturnValue(handle);
    const vcs = createGitVcs({ cwd: "/repo", dryRun: true, quiet: false });

    await vcs.add(["Cargo.toml"]);
    await vcs.commit("1.0.0");
    await vcs.tag("v1.0.0");
    await vcs.tag("v1.0.0", { delete: true });

    expect(vcs.push("origin", "v1.0.0")).toBe(handle);
    expect(gitMocks.addFiles).toHaveBeenCalledWith("/repo", ["Cargo.toml"], { quiet: false });
    expect(gitMocks.commit).toHaveBeenCalledWith("/repo", "1.0.0", { dryRun: true, quiet: false });
    expect(gitMocks.tag.mock.calls).toEqual([
      ["/repo", "v1.0.0", { quiet: false, delete: undefined }],
      ["/repo", "v1.0.0", { quiet: false, delete: true }],
    ]);
    expect(gitMocks.pushTag).toHaveBeenCalledWith("/repo", "origin", "v1.0.0", {
      dryRun: true,
      quiet: false,
    });
  });

  it("switches branch and stashes in the working directory", async () => {
    const vcs = createGitVcs({ cwd: "/repo", dryRun: false, quiet: true });

    await vcs.stash("push");
    await vcs.switchBranch("release");

    expect(gitMocks.stash).toHaveBeenCalledWith("/repo", "push", { quiet: true });
    expect(gitMocks.checkout).toHaveBeenCalledWith("/repo", "release", { quiet: true });
  });
});
