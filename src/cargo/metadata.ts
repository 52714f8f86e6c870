/*
Purpose: read `cargo metadata` output into an immutable workspace snapshot.
Assumptions: metadata is produced with `--no-deps`, so `packages` lists only workspace
members and `resolve` is null. Older cargo omits `workspace_default_members`.
Usage: const snapshot = workspaceSnapshot(parseCargoMetadata(await readCargoMetadata(cwd)));
*/

import path from "node:path";

import { z } from "zod";

import { CargoError } from "../core/errors.js";
import { formatIssues } from "../core/zod-issues.js";

import { cargo, metadataArgs } from "./cargo.js";

// =============================================================================
// SCHEMA
// =============================================================================

const MetadataPackageSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    id: z.string().min(1),
    manifest_path: z.string().min(1),
  })
  .passthrough();

export const CargoMetadataSchema = z
  .object({
    packages: z.array(MetadataPackageSchema),
    workspace_members: z.array(z.string()),
    workspace_default_members: z.array(z.string()).optional(),
    workspace_root: z.string().min(1),
  })
  .passthrough();

export type CargoMetadata = z.infer<typeof CargoMetadataSchema>;

// =============================================================================
// SNAPSHOT
// =============================================================================

export type MemberSnapshot = {
  readonly name: string;
  readonly manifestPath: string;
};

export type WorkspaceSnapshot = {
  readonly rootDirectory: string;
  readonly rootManifestPath: string;
  readonly lockfilePath: string;
  readonly members: readonly MemberSnapshot[];
  readonly rootPackageName?: string;
  readonly defaultMembers: readonly string[];
};

export async function readCargoMetadata(cwd: string, manifestPath?: string): Promise<string> {
  const res = await cargo(cwd, metadataArgs(manifestPath), { quiet: true });
  return res.stdout;
}

export function parseCargoMetadata(json: string): CargoMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new CargoError("cargo metadata did not print valid JSON.", err);
  }

  const parsed = CargoMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CargoError(
      `Unexpected cargo metadata output:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

export function workspaceSnapshot(metadata: CargoMetadata): WorkspaceSnapshot {
  const rootDirectory = path.resolve(metadata.workspace_root);
  const rootManifestPath = path.join(rootDirectory, "Cargo.toml");

  const byId = new Map(metadata.packages.map((pkg) => [pkg.id, pkg]));
  const memberOf = (id: string): z.infer<typeof MetadataPackageSchema> => {
    const pkg = byId.get(id);
    if (!pkg) {
      throw new CargoError(`cargo metadata lists workspace member ${id} without its package.`);
    }
    return pkg;
  };

  const members = metadata.workspace_members.map((id) => {
    const pkg = memberOf(id);
    return Object.freeze({ name: pkg.name, manifestPath: path.resolve(pkg.manifest_path) });
  });
  const root = members.find((member) => member.manifestPath === rootManifestPath);

  return Object.freeze({
    rootDirectory,
    rootManifestPath,
    lockfilePath: path.join(rootDirectory, "Cargo.lock"),
    members: Object.freeze(members),
    rootPackageName: root?.name,
    defaultMembers: Object.freeze((metadata.workspace_default_members ?? []).map((id) => memberOf(id).name)),
  });
}
