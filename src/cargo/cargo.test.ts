import { describe, expect, it } from "vitest";

import { metadataArgs, publishArgs } from "./cargo.js";

describe("publishArgs", () => {
  it("publishes the selected packages from the root manifest", () => {
    expect(publishArgs({ manifestPath: "/ws/Cargo.toml", packages: ["core", "cli"] })).toEqual([
      "publish",
      "--manifest-path",
      "/ws/Cargo.toml",
      "--package",
      "core",
      "--package",
      "cli",
    ]);
  });

  it("adds the optional flags in a fixed order", () => {
    expect(
      publishArgs({
        manifestPath: "/ws/Cargo.toml",
        packages: ["core"],
        dryRun: true,
        noVerify: true,
        allowDirty: true,
      }),
    ).toEqual([
      "publish",
      "--dry-run",
      "--no-verify",
      "--allow-dirty",
      "--manifest-path",
      "/ws/Cargo.toml",
      "--package",
      "core",
    ]);
  });
});

describe("metadataArgs", () => {
  it("asks for workspace members only", () => {
    expect(metadataArgs()).toEqual(["metadata", "--format-version", "1", "--no-deps"]);
    expect(metadataArgs("crates/app/Cargo.toml")).toEqual([
      "metadata",
      "--format-version",
      "1",
      "--no-deps",
      "--manifest-path",
      "crates/app/Cargo.toml",
    ]);
  });
});
