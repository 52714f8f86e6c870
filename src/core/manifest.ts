import { parse as parseToml } from "smol-toml";

import { ManifestError, VersionError } from "./errors.js";
import { readTextFile, writeTextFile } from "./utils.js";
import { Version } from "./version.js";
import {
  describeLocation,
  isRecord,
  patchVersionText,
  readVersionItem,
  type TomlRecord,
  type VersionItem,
  type VersionLocation,
} from "./version-location.js";

// =============================================================================
// TYPES
// =============================================================================

type ManifestState =
  | { kind: "unloaded" }
  | { kind: "loaded"; text: string; document: TomlRecord };

export type PackageVersionSource = "own" | "inherited" | "missing";

// =============================================================================
// MANIFEST FILE
// =============================================================================

/**
 * A Cargo.toml on disk. Reads and version edits require a successful `load()`;
 * edits stay in memory until `write()`.
 */
export class ManifestFile {
  private state: ManifestState = { kind: "unloaded" };

  constructor(public readonly path: string) {}

  static async open(manifestPath: string): Promise<ManifestFile> {
    const manifest = new ManifestFile(manifestPath);
    await manifest.load();
    return manifest;
  }

  static fromText(manifestPath: string, text: string): ManifestFile {
    const manifest = new ManifestFile(manifestPath);
    manifest.state = { kind: "loaded", text, document: parseManifestText(manifestPath, text) };
    return manifest;
  }

  get isLoaded(): boolean {
    return this.state.kind === "loaded";
  }

  async load(): Promise<void> {
    let text: string;
    try {
      text = await readTextFile(this.path);
    } catch (err) {
      throw new ManifestError("read-failed", this.path, `Failed to read manifest ${this.path}.`, err);
    }

    this.state = { kind: "loaded", text, document: parseManifestText(this.path, text) };
  }

  text(): string {
    return this.loaded().text;
  }

  packageVersionSource(): PackageVersionSource {
    const item = this.item("package");
    if (item.kind === "string") return "own";
    if (item.kind === "workspace-inherited") return "inherited";
    return "missing";
  }

  hasVersion(location: VersionLocation): boolean {
    return this.item(location).kind === "string";
  }

  getVersion(location: VersionLocation): Version {
    const item = this.item(location);
    if (item.kind !== "string") {
      throw this.itemError(item, location);
    }

    try {
      return Version.parse(item.value);
    } catch (err) {
      if (err instanceof VersionError) {
        throw new ManifestError(
          "invalid-version-item",
          this.path,
          `${describeLocation(location)} in ${this.path} is not a valid version: ${err.message}`,
          err,
        );
      }
      throw err;
    }
  }

  setVersion(location: VersionLocation, version: Version): void {
    const state = this.loaded();
    const item = readVersionItem(state.document, location);
    if (item.kind !== "string") {
      throw this.itemError(item, location);
    }

    const patched = patchVersionText(state.text, location, version.toString());
    if (patched === null) {
      throw new ManifestError(
        "invalid-version-item",
        this.path,
        `${describeLocation(location)} in ${this.path} is not a plain string assignment.`,
      );
    }

    this.state = { kind: "loaded", text: patched, document: parseManifestText(this.path, patched) };
  }

  async write(): Promise<void> {
    const { text } = this.loaded();
    try {
      await writeTextFile(this.path, text);
    } catch (err) {
      throw new ManifestError("write-failed", this.path, `Failed to write manifest ${this.path}.`, err);
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private loaded(): Extract<ManifestState, { kind: "loaded" }> {
    if (this.state.kind !== "loaded") {
      throw new ManifestError("not-loaded", this.path, `Manifest ${this.path} has not been loaded.`);
    }
    return this.state;
  }

  private item(location: VersionLocation): VersionItem {
    return readVersionItem(this.loaded().document, location);
  }

  private itemError(item: VersionItem, location: VersionLocation): ManifestError {
    const label = describeLocation(location);
    switch (item.kind) {
      case "workspace-inherited":
        return new ManifestError(
          "set-by-workspace",
          this.path,
          `${label} in ${this.path} is inherited from the workspace; change workspace.package.version instead.`,
        );
      case "missing":
        return new ManifestError("version-not-found", this.path, `${label} not found in ${this.path}.`);
      case "invalid":
        return new ManifestError(
          "invalid-version-item",
          this.path,
          `${label} in ${this.path} must be a string, found ${item.found}.`,
        );
      case "string":
        return new ManifestError("invalid-version-item", this.path, `${label} in ${this.path} is unexpected.`);
    }
  }
}

function parseManifestText(manifestPath: string, text: string): TomlRecord {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ManifestError("parse-failed", manifestPath, `Failed to parse ${manifestPath}: ${detail}`, err);
  }

  if (!isRecord(document)) {
    throw new ManifestError("parse-failed", manifestPath, `Manifest ${manifestPath} is not a table.`);
  }
  return document;
}
