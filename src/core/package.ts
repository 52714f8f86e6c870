import { ManifestError } from "./errors.js";
import type { ManifestFile } from "./manifest.js";
import type { Version } from "./version.js";
import type { VersionLocation } from "./version-location.js";

export const WORKSPACE_PACKAGE_NAME = "workspace.package";

/**
 * Where a package's version is declared:
 * - `own`: `[package] version = "..."`
 * - `inherited`: `version.workspace = true`
 * - `workspace-declaration`: the synthetic `[workspace.package]` entry
 */
export type VersionType = "own" | "inherited" | "workspace-declaration";

export class Package {
  private currentVersion: Version;

  constructor(
    public readonly name: string,
    version: Version,
    public readonly manifest: ManifestFile,
    public readonly versionType: VersionType,
  ) {
    this.currentVersion = version;
  }

  get version(): Version {
    return this.currentVersion;
  }

  get manifestPath(): string {
    return this.manifest.path;
  }

  get isWorkspacePackage(): boolean {
    return this.versionType === "workspace-declaration";
  }

  get inheritsVersion(): boolean {
    return this.versionType === "inherited";
  }

  /** Updates the in-memory manifest and version; nothing is written to disk. */
  setVersion(version: Version): void {
    this.manifest.setVersion(this.location(), version);
    this.currentVersion = version;
  }

  /** Writes the manifest and returns the version as it now reads back. */
  async writeManifest(): Promise<Version> {
    const location = this.location();
    await this.manifest.write();
    return this.manifest.getVersion(location);
  }

  private location(): VersionLocation {
    switch (this.versionType) {
      case "own":
        return "package";
      case "workspace-declaration":
        return "workspace";
      case "inherited":
        throw new ManifestError(
          "set-by-workspace",
          this.manifest.path,
          `${this.name} inherits its version from the workspace; change ${WORKSPACE_PACKAGE_NAME} instead.`,
        );
    }
  }
}
