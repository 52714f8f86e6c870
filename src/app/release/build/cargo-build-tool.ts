/**
 * Cargo-backed build tool adapter.
 * Purpose: map BuildTool calls to cargo with the run's publish flags applied.
 * Usage: createCargoBuildTool({ cwd, manifestPath, dryRun, noVerify, allowDirty, quiet }).
 */

import { generateLockfile, publish } from "../../../cargo/cargo.js";
import type { BuildTool } from "../ports.js";

export type CargoBuildToolOptions = {
  cwd: string;
  /** Root manifest of the workspace. */
  manifestPath: string;
  dryRun: boolean;
  noVerify: boolean;
  allowDirty: boolean;
  quiet: boolean;
};

export function createCargoBuildTool(options: CargoBuildToolOptions): BuildTool {
  const { cwd, manifestPath, quiet } = options;

  return {
    publish: (packages) =>
      publish(cwd, {
        manifestPath,
        packages,
        dryRun: options.dryRun,
        noVerify: options.noVerify,
        allowDirty: options.allowDirty,
        quiet,
      }),
    generateLockfile: () => generateLockfile(cwd, manifestPath, { quiet }),
  };
}
