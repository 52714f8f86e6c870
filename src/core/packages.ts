import path from "node:path";

import { SelectionError } from "./errors.js";
import type { ManifestFile } from "./manifest.js";
import { WORKSPACE_PACKAGE_NAME, type Package } from "./package.js";
import { toPosixRelative } from "./utils.js";
import type { Version } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export type PackagesInit = {
  rootDirectory: string;
  rootManifestPath: string;
  lockfilePath: string;
  members: Package[];
  rootPackageName?: string;
  workspacePackage?: Package;
  defaultMembers?: string[];
};

// =============================================================================
// WORKSPACE MODEL
// =============================================================================

export class Packages {
  readonly rootDirectory: string;
  readonly rootManifestPath: string;
  readonly lockfilePath: string;

  private readonly byName = new Map<string, Package>();
  private readonly rootPackageName?: string;
  private readonly workspace?: Package;
  private readonly defaultMemberNames: ReadonlySet<string>;

  constructor(init: PackagesInit) {
    this.rootDirectory = init.rootDirectory;
    this.rootManifestPath = init.rootManifestPath;
    this.lockfilePath = init.lockfilePath;
    this.workspace = init.workspacePackage;
    this.defaultMemberNames = new Set(init.defaultMembers ?? []);

    for (const pkg of init.members) {
      if (pkg.isWorkspacePackage) {
        throw new SelectionError(
          "unknown-package",
          `${WORKSPACE_PACKAGE_NAME} cannot be registered as a member.`,
          pkg.name,
        );
      }
      this.byName.set(pkg.name, pkg);
    }

    if (init.rootPackageName !== undefined) {
      this.requireMember(init.rootPackageName);
      this.rootPackageName = init.rootPackageName;
    }
    for (const name of this.defaultMemberNames) {
      this.requireMember(name);
    }
  }

  // ===========================================================================
  // LOOKUP
  // ===========================================================================

  members(): Package[] {
    return [...this.byName.values()];
  }

  hasMember(name: string): boolean {
    return this.byName.has(name);
  }

  /** Resolves a member, or the workspace package by its synthetic name. */
  get(name: string): Package {
    if (name === WORKSPACE_PACKAGE_NAME) {
      return this.requireWorkspacePackage();
    }
    return this.requireMember(name);
  }

  rootPackage(): Package | undefined {
    return this.rootPackageName === undefined ? undefined : this.byName.get(this.rootPackageName);
  }

  workspacePackage(): Package | undefined {
    return this.workspace;
  }

  defaultMembers(): Package[] {
    return this.members().filter((pkg) => this.defaultMemberNames.has(pkg.name));
  }

  manifests(): ManifestFile[] {
    const all = this.members().map((pkg) => pkg.manifest);
    if (this.workspace) all.push(this.workspace.manifest);
    return [...new Set(all)];
  }

  // ===========================================================================
  // VERSIONS
  // ===========================================================================

  /**
   * Root package version, else the workspace version, else the one version
   * every member shares.
   */
  rootVersion(): Version {
    const root = this.rootPackage();
    if (root) return root.version;
    if (this.workspace) return this.workspace.version;

    const distinct = new Map<string, Version>();
    for (const pkg of this.members()) {
      distinct.set(pkg.version.toString(), pkg.version);
    }
    const [only, ...others] = [...distinct.values()];
    if (only && others.length === 0) {
      return only;
    }

    throw new SelectionError(
      "no-root-version",
      `No root version: the workspace has no root package, no workspace.package.version and ${distinct.size} distinct member versions.`,
    );
  }

  setPackageVersion(name: string, version: Version): void {
    this.requireMember(name).setVersion(version);
  }

  setWorkspacePackageVersion(version: Version): void {
    this.requireWorkspacePackage().setVersion(version);
  }

  async writeManifest(name: string): Promise<Version> {
    return this.get(name).writeManifest();
  }

  async reloadManifests(): Promise<void> {
    for (const manifest of this.manifests()) {
      await manifest.load();
    }
  }

  // ===========================================================================
  // DISPLAY
  // ===========================================================================

  displayTree(): string {
    const lines = [`Workspace root: ${this.rootDirectory}`];
    const root = this.rootPackage();

    if (root) {
      lines.push(`Root package: ${root.name} ${root.version.toString()}`);
    }
    if (this.defaultMemberNames.size > 0) {
      lines.push(`Default members: [${[...this.defaultMemberNames].sort().join(", ")}]`);
    }

    lines.push("");
    lines.push(root ? root.name : "Members:");

    const children = this.members()
      .filter((pkg) => pkg !== root)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    children.forEach((pkg, index) => {
      const branch = index === children.length - 1 ? "└─" : "├─";
      lines.push(`${branch} ${pkg.name} ${pkg.version.toString()}: ${this.relativeDirectory(pkg)}`);
    });

    return lines.join("\n");
  }

  relativePath(filePath: string): string {
    return toPosixRelative(this.rootDirectory, filePath);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private relativeDirectory(pkg: Package): string {
    const relative = this.relativePath(path.dirname(pkg.manifestPath));
    return relative.length === 0 ? "." : `./${relative}`;
  }

  private requireMember(name: string): Package {
    const pkg = this.byName.get(name);
    if (!pkg) {
      throw new SelectionError("unknown-package", `Package ${name} is not a workspace member.`, name);
    }
    return pkg;
  }

  private requireWorkspacePackage(): Package {
    if (!this.workspace) {
      throw new SelectionError(
        "no-workspace-package",
        "The workspace does not declare workspace.package.version.",
        WORKSPACE_PACKAGE_NAME,
      );
    }
    return this.workspace;
  }
}
