import { describe, expect, it } from "vitest";

import { CargoError } from "../core/errors.js";

import { parseCargoMetadata, workspaceSnapshot } from "./metadata.js";

const METADATA = JSON.stringify({
  packages: [
    {
      name: "app",
      version: "0.4.0",
      id: "path+file:///ws#app@0.4.0",
      manifest_path: "/ws/Cargo.toml",
      dependencies: [],
    },
    {
      name: "core",
      version: "1.2.3",
      id: "path+file:///ws/crates/core#1.2.3",
      manifest_path: "/ws/crates/core/Cargo.toml",
      dependencies: [],
    },
  ],
  workspace_members: ["path+file:///ws#app@0.4.0", "path+file:///ws/crates/core#1.2.3"],
  workspace_default_members: ["path+file:///ws/crates/core#1.2.3"],
  resolve: null,
  target_directory: "/ws/target",
  version: 1,
  workspace_root: "/ws",
});

describe("parseCargoMetadata", () => {
  it("keeps the fields discovery needs", () => {
    const metadata = parseCargoMetadata(METADATA);

    expect(metadata.workspace_root).toBe("/ws");
    expect(metadata.packages.map((pkg) => pkg.name)).toEqual(["app", "core"]);
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseCargoMetadata("warning: unused manifest key")).toThrow(
      new CargoError("cargo metadata did not print valid JSON."),
    );
  });

  it("names the fields that do not match", () => {
    expect(() => parseCargoMetadata(JSON.stringify({ packages: [], workspace_members: [] }))).toThrow(
      "Unexpected cargo metadata output:\nworkspace_root: Expected string, received undefined",
    );
  });
});

describe("workspaceSnapshot", () => {
  it("resolves the root package and default members", () => {
    const snapshot = workspaceSnapshot(parseCargoMetadata(METADATA));

    expect(snapshot).toEqual({
      rootDirectory: "/ws",
      rootManifestPath: "/ws/Cargo.toml",
      lockfilePath: "/ws/Cargo.lock",
      members: [
        { name: "app", manifestPath: "/ws/Cargo.toml" },
        { name: "core", manifestPath: "/ws/crates/core/Cargo.toml" },
      ],
      rootPackageName: "app",
      defaultMembers: ["core"],
    });
    expect(Object.isFrozen(snapshot.members)).toBe(true);
  });

  it("has no root package in a virtual workspace", () => {
    const metadata = parseCargoMetadata(METADATA);
    const virtual = {
      ...metadata,
      packages: metadata.packages.filter((pkg) => pkg.name !== "app"),
      workspace_members: ["path+file:///ws/crates/core#1.2.3"],
      workspace_default_members: undefined,
    };

    const snapshot = workspaceSnapshot(virtual);

    expect(snapshot.rootPackageName).toBeUndefined();
    expect(snapshot.defaultMembers).toEqual([]);
  });

  it("fails when a member id has no package", () => {
    const metadata = parseCargoMetadata(METADATA);

    expect(() => workspaceSnapshot({ ...metadata, workspace_members: ["missing#0.1.0"] })).toThrow(
      "cargo metadata lists workspace member missing#0.1.0 without its package.",
    );
  });
});
