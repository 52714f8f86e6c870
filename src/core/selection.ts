import { SelectionError } from "./errors.js";
import type { Package } from "./package.js";
import type { Packages } from "./packages.js";

// =============================================================================
// TYPES
// =============================================================================

export type SelectionMode = "root" | "all" | "default-members";

export type SelectionFlags = {
  workspace: boolean;
  defaultMembers: boolean;
  include: string[];
  exclude: string[];
};

export type Selection = {
  mode: SelectionMode;
  included: Package[];
  excluded: Package[];
};

export const EMPTY_SELECTION_FLAGS: SelectionFlags = {
  workspace: false,
  defaultMembers: false,
  include: [],
  exclude: [],
};

// =============================================================================
// SELECTION
// =============================================================================

export function resolveSelectionMode(flags: Pick<SelectionFlags, "workspace" | "defaultMembers">): SelectionMode {
  if (flags.workspace && flags.defaultMembers) {
    throw new SelectionError(
      "conflicting-modes",
      "--workspace and --default-members cannot be used together.",
    );
  }
  if (flags.workspace) return "all";
  if (flags.defaultMembers) return "default-members";
  return "root";
}

/**
 * Partitions the members into included and excluded. A member is included when
 * the mode selects it or it is named in `include`, unless `exclude` names it.
 */
export function selectPackages(packages: Packages, flags: SelectionFlags): Selection {
  const mode = resolveSelectionMode(flags);

  for (const name of [...flags.include, ...flags.exclude]) {
    if (!packages.hasMember(name)) {
      throw new SelectionError("unknown-package", `Package ${name} is not a workspace member.`, name);
    }
  }

  const base = new Set(baseSet(packages, mode).map((pkg) => pkg.name));
  const include = new Set(flags.include);
  const exclude = new Set(flags.exclude);

  const included: Package[] = [];
  const excluded: Package[] = [];
  for (const pkg of packages.members()) {
    const wanted = base.has(pkg.name) || include.has(pkg.name);
    if (wanted && !exclude.has(pkg.name)) {
      included.push(pkg);
    } else {
      excluded.push(pkg);
    }
  }

  if (included.length === 0) {
    throw new SelectionError("empty-selection", describeEmptySelection(packages, mode));
  }

  return { mode, included, excluded };
}

function baseSet(packages: Packages, mode: SelectionMode): Package[] {
  switch (mode) {
    case "all":
      return packages.members();
    case "default-members":
      return packages.defaultMembers();
    case "root": {
      const root = packages.rootPackage();
      return root ? [root] : [];
    }
  }
}

function describeEmptySelection(packages: Packages, mode: SelectionMode): string {
  if (mode === "root" && !packages.rootPackage()) {
    return "No packages selected: the workspace has no root package. Use --workspace, --default-members or --package.";
  }
  return "No packages selected after applying --package and --exclude.";
}
