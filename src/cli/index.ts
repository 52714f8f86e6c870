import { Command, Option } from "commander";

import { CLI_ACTIONS, parseCliOptions } from "./intent.js";
import { releaseCommand } from "./release.js";

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

export function buildCli(): Command {
  const program = new Command();

  program
    .name("crate-version")
    .description("Bump, tag, push and publish the versions of a Cargo workspace")
    .version("0.1.0")
    .argument("[action]", `One of: ${CLI_ACTIONS.join(", ")} (default: patch)`)
    .argument("[version]", "Version to set (only with `set`)");

  // Version
  program
    .option("--pre <id>", "Prerelease identifier to add or advance")
    .option("--build <meta>", "Build metadata to attach")
    .option("-f, --force-version", "Allow a version that is not greater than the current one", false)
    .option("--dry-run", "Change nothing on disk; pass --dry-run to git and cargo", false);

  // Git
  program
    .option("-t, --git-tag", "Commit the changed files and tag the release", false)
    .option("--git-push", "Push the release tag to every remote (implies --git-tag)", false)
    .option("-m, --message <msg>", "Commit message; {version} expands to the root version")
    .option("--branch <name>", "Release from this branch, then switch back")
    .option("-n, --allow-dirty", "Allow uncommitted changes outside the release files", false);

  // Cargo
  program
    .option("-c, --cargo-publish", "Publish the selected packages", false)
    .option("--no-verify", "Skip the build cargo publish runs before uploading")
    .option("--manifest-path <path>", "Path to the workspace Cargo.toml");

  // Selection
  program
    .option("-p, --package <name>", "Package to include (repeatable)", collect)
    .option("-x, --exclude <name>", "Package to exclude (repeatable)", collect)
    .option("--workspace", "Select every workspace member", false)
    .option("--all", "Alias for --workspace", false)
    .option("--default-members", "Select the workspace default members", false)
    .option("--workspace-package", "Also change workspace.package.version", false)
    .option("--ws", "Alias for --workspace-package", false);

  // Output and config
  program
    .addOption(
      new Option("--suppress <level>", "Silence git or cargo output").choices([
        "none",
        "git",
        "cargo",
        "all",
      ]),
    )
    .option("--config <path>", "Release config path (default: <workspace>/crate-version.yaml)")
    .option("-v, --verbose", "Print each task as it completes", false)
    .option("--debug", "Include stacks in error output", false);

  program.action(
    async (
      action: string | undefined,
      version: string | undefined,
      _opts: Record<string, unknown>,
      command: Command,
    ) => {
      const options = parseCliOptions({ ...command.opts(), action, version });
      await releaseCommand(options);
    },
  );

  return program;
}
