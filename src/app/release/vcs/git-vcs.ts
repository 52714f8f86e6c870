/**
 * Git-backed release VCS adapter.
 * Purpose: map ReleaseVcs calls to the git helpers with the run's flags applied.
 * Assumptions: `cwd` is the workspace root, which is also the repository root.
 * Usage: createGitVcs({ cwd, dryRun, quiet }) and pass to createTaskRunner.
 */

import { addFiles, checkout, commit, pushTag, stash, tag } from "../../../git/git.js";
import type { ReleaseVcs } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitVcsOptions = {
  cwd: string;
  /** Commit and push with `--dry-run`. Tags are real and removed by cleanup. */
  dryRun: boolean;
  quiet: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(options: GitVcsOptions): ReleaseVcs {
  const { cwd, dryRun, quiet } = options;

  return {
    add: (paths) => addFiles(cwd, paths, { quiet }),
    commit: (message) => commit(cwd, message, { dryRun, quiet }),
    tag: (name, tagOptions = {}) => tag(cwd, name, { quiet, delete: tagOptions.delete }),
    push: (remote, tagName) => pushTag(cwd, remote, tagName, { dryRun, quiet }),
    switchBranch: (target) => checkout(cwd, target, { quiet }),
    stash: (action) => stash(cwd, action, { quiet }),
  };
}
