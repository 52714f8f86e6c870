import { describe, expect, it } from "vitest";

import { buildPackages, type WorkspaceLayout } from "./__tests__/workspace-builder.js";
import { SelectionError } from "./errors.js";
import {
  EMPTY_SELECTION_FLAGS,
  resolveSelectionMode,
  selectPackages,
  type SelectionFlags,
} from "./selection.js";

const WORKSPACE: WorkspaceLayout = {
  workspaceVersion: "0.4.0",
  members: [
    { name: "app", dir: "", version: "1.0.0", defaultMember: true },
    { name: "core", dir: "crates/core", version: "1.0.0", defaultMember: true },
    { name: "cli", dir: "crates/cli", inherits: true },
    { name: "macros", dir: "crates/macros", version: "0.1.0" },
  ],
};

function names(flags: Partial<SelectionFlags>, layout: WorkspaceLayout = WORKSPACE) {
  const selection = selectPackages(buildPackages(layout), { ...EMPTY_SELECTION_FLAGS, ...flags });
  return {
    mode: selection.mode,
    included: selection.included.map((pkg) => pkg.name),
    excluded: selection.excluded.map((pkg) => pkg.name),
  };
}

function selectionError(fn: () => unknown): SelectionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SelectionError) return error;
    throw error;
  }
  throw new Error("expected a SelectionError");
}

describe("resolveSelectionMode", () => {
  it("maps flags to exactly one mode", () => {
    expect(resolveSelectionMode({ workspace: false, defaultMembers: false })).toBe("root");
    expect(resolveSelectionMode({ workspace: true, defaultMembers: false })).toBe("all");
    expect(resolveSelectionMode({ workspace: false, defaultMembers: true })).toBe("default-members");
    expect(selectionError(() => resolveSelectionMode({ workspace: true, defaultMembers: true })).kind).toBe(
      "conflicting-modes",
    );
  });
});

describe("selectPackages", () => {
  it("selects only the root package by default", () => {
    expect(names({})).toEqual({
      mode: "root",
      included: ["app"],
      excluded: ["core", "cli", "macros"],
    });
  });

  it("selects every member with --workspace", () => {
    expect(names({ workspace: true }).included).toEqual(["app", "core", "cli", "macros"]);
  });

  it("selects default members", () => {
    expect(names({ defaultMembers: true }).included).toEqual(["app", "core"]);
  });

  it("adds included names to the base set", () => {
    expect(names({ include: ["macros"] }).included).toEqual(["app", "macros"]);
  });

  it("lets exclude win over include and the base set", () => {
    expect(names({ workspace: true, include: ["core"], exclude: ["core", "app"] })).toEqual({
      mode: "all",
      included: ["cli", "macros"],
      excluded: ["app", "core"],
    });
  });

  it("partitions every member exactly once", () => {
    const cases: Partial<SelectionFlags>[] = [
      {},
      { workspace: true },
      { defaultMembers: true, exclude: ["app"] },
      { include: ["cli", "macros"], exclude: ["macros"] },
    ];

    for (const flags of cases) {
      const { included, excluded } = names(flags);
      expect([...included, ...excluded].sort()).toEqual(["app", "cli", "core", "macros"]);
      expect(included.filter((name) => excluded.includes(name))).toEqual([]);
    }
  });

  it("fails when nothing is left", () => {
    const error = selectionError(() => names({ exclude: ["app"] }));

    expect(error.kind).toBe("empty-selection");
    expect(error.message).toBe("No packages selected after applying --package and --exclude.");
  });

  it("fails for a virtual workspace without flags", () => {
    const layout: WorkspaceLayout = { members: [{ name: "a", dir: "a", version: "1.0.0" }] };

    expect(selectionError(() => names({}, layout)).message).toBe(
      "No packages selected: the workspace has no root package. Use --workspace, --default-members or --package.",
    );
    expect(names({ include: ["a"] }, layout).included).toEqual(["a"]);
  });

  it("rejects unknown names", () => {
    const error = selectionError(() => names({ exclude: ["ghost"] }));

    expect(error.kind).toBe("unknown-package");
    expect(error.packageName).toBe("ghost");
  });
});
