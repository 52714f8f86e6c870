/**
 * Workspace discovery.
 * Purpose: build the Packages model from cargo metadata and the manifests on disk.
 * Assumptions: every manifest path maps to one shared ManifestFile, so the root
 * package and `[workspace.package]` edit the same document.
 * Usage: const packages = await discoverWorkspace({ cwd, manifestPath });
 */

import { ManifestFile } from "../core/manifest.js";
import { Package, WORKSPACE_PACKAGE_NAME } from "../core/package.js";
import { Packages } from "../core/packages.js";

import { parseCargoMetadata, readCargoMetadata, workspaceSnapshot, type WorkspaceSnapshot } from "./metadata.js";

export type DiscoverOptions = {
  cwd: string;
  manifestPath?: string;
};

export async function discoverWorkspace(options: DiscoverOptions): Promise<Packages> {
  const json = await readCargoMetadata(options.cwd, options.manifestPath);
  return loadPackages(workspaceSnapshot(parseCargoMetadata(json)));
}

export async function loadPackages(snapshot: WorkspaceSnapshot): Promise<Packages> {
  const manifests = new Map<string, ManifestFile>();
  const open = async (manifestPath: string): Promise<ManifestFile> => {
    const existing = manifests.get(manifestPath);
    if (existing) return existing;
    const manifest = await ManifestFile.open(manifestPath);
    manifests.set(manifestPath, manifest);
    return manifest;
  };

  const rootManifest = await open(snapshot.rootManifestPath);
  const members: Package[] = [];

  for (const member of snapshot.members) {
    const manifest = await open(member.manifestPath);
    switch (manifest.packageVersionSource()) {
      case "own":
        members.push(new Package(member.name, manifest.getVersion("package"), manifest, "own"));
        break;
      case "inherited":
        members.push(
          new Package(member.name, rootManifest.getVersion("workspace"), manifest, "inherited"),
        );
        break;
      case "missing":
        // Cargo reads an absent version as 0.0.0 and refuses to publish it; nothing to release.
        break;
    }
  }

  const workspacePackage = rootManifest.hasVersion("workspace")
    ? new Package(
        WORKSPACE_PACKAGE_NAME,
        rootManifest.getVersion("workspace"),
        rootManifest,
        "workspace-declaration",
      )
    : undefined;

  const known = new Set(members.map((pkg) => pkg.name));
  const rootPackageName =
    snapshot.rootPackageName !== undefined && known.has(snapshot.rootPackageName)
      ? snapshot.rootPackageName
      : undefined;

  return new Packages({
    rootDirectory: snapshot.rootDirectory,
    rootManifestPath: snapshot.rootManifestPath,
    lockfilePath: snapshot.lockfilePath,
    members,
    rootPackageName,
    workspacePackage,
    defaultMembers: snapshot.defaultMembers.filter((name) => known.has(name)),
  });
}
