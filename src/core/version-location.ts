/*
Purpose: locate and rewrite the `version` key of a Cargo manifest.
Assumptions: the parsed document is the source of truth for reads; writes patch the
original text line by line so comments, ordering and quoting survive.
*/

// =============================================================================
// TYPES
// =============================================================================

export type VersionLocation = "package" | "workspace";

export type VersionItem =
  | { kind: "string"; value: string }
  | { kind: "workspace-inherited" }
  | { kind: "missing" }
  | { kind: "invalid"; found: string };

export type TomlRecord = Record<string, unknown>;

const LOCATION_PATHS: Record<VersionLocation, readonly string[]> = {
  package: ["package", "version"],
  workspace: ["workspace", "package", "version"],
};

const TABLE_HEADER = /^\s*\[\s*([^[\]]+?)\s*\](\s*#.*)?\s*$/;
const ARRAY_TABLE_HEADER = /^\s*\[\[/;
const STRING_ASSIGNMENT = /^(\s*)([^=#]+?)(\s*=\s*)(["'])([^"']*)\4(.*)$/;

// =============================================================================
// READ
// =============================================================================

export function describeLocation(location: VersionLocation): string {
  return LOCATION_PATHS[location].join(".");
}

export function readVersionItem(document: TomlRecord, location: VersionLocation): VersionItem {
  const keys = LOCATION_PATHS[location];
  let current: unknown = document;

  for (const key of keys) {
    if (!isRecord(current) || !(key in current)) {
      return { kind: "missing" };
    }
    current = current[key];
  }

  if (typeof current === "string") {
    return { kind: "string", value: current };
  }
  if (location === "package" && isRecord(current) && current.workspace === true) {
    return { kind: "workspace-inherited" };
  }

  return { kind: "invalid", found: describeValue(current) };
}

export function isRecord(value: unknown): value is TomlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// =============================================================================
// WRITE
// =============================================================================

/**
 * Replaces the quoted value of the version key for `location`.
 * Returns null when no plain string assignment exists for that key.
 */
export function patchVersionText(
  text: string,
  location: VersionLocation,
  version: string,
): string | null {
  const target = LOCATION_PATHS[location].join(".");
  const lines = text.split("\n");
  let table: string[] | null = [];

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];

    if (ARRAY_TABLE_HEADER.test(line)) {
      table = null;
      continue;
    }

    const header = TABLE_HEADER.exec(line);
    if (header) {
      table = splitKeyPath(header[1]);
      continue;
    }

    if (!table) continue;

    const assignment = STRING_ASSIGNMENT.exec(line);
    if (!assignment) continue;

    const [, indent, key, equals, quote, , rest] = assignment;
    const fullPath = [...table, ...splitKeyPath(key)].join(".");
    if (fullPath !== target) continue;

    lines[index] = `${indent}${key}${equals}${quote}${version}${quote}${rest}`;
    return lines.join("\n");
  }

  return null;
}

function splitKeyPath(raw: string): string[] {
  return raw
    .split(".")
    .map((part) => part.trim().replace(/^(["'])(.*)\1$/, "$2"))
    .filter((part) => part.length > 0);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "datetime";
  if (isRecord(value)) return "table";
  return typeof value;
}
