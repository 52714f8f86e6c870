// =============================================================================
// TYPES
// =============================================================================

export type StatusEntry = {
  /** Two-letter index/worktree code, e.g. " M", "??", "R ". */
  code: string;
  path: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Parses `git status --short` output. Renames report their new path. */
export function parseShortStatus(output: string): StatusEntry[] {
  return output
    .split("\n")
    .map(parseStatusLine)
    .filter((entry): entry is StatusEntry => entry !== null);
}

export function statusPaths(output: string): string[] {
  return [...new Set(parseShortStatus(output).map((entry) => entry.path))];
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseStatusLine(line: string): StatusEntry | null {
  if (line.trim().length === 0 || line.length < 4) return null;

  const code = line.slice(0, 2);
  let rest = line.slice(3);

  const arrowIndex = rest.indexOf(" -> ");
  if (arrowIndex !== -1) {
    rest = rest.slice(arrowIndex + 4);
  }

  const filePath = unquote(rest.trim());
  return filePath.length > 0 ? { code, path: filePath } : null;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  return value;
}
