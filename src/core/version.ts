import { VersionError, type BumpLabel } from "./errors.js";
import { assertIdentifierChars } from "./identifier.js";
import { Prerelease } from "./prerelease.js";

// =============================================================================
// TYPES
// =============================================================================

export type BumpKind = BumpLabel;

export const BUMP_KINDS: readonly BumpKind[] = ["patch", "minor", "major", "pre"];

export type BumpOptions = {
  prerelease?: Prerelease;
  build?: string;
  force?: boolean;
};

const VERSION_PATTERN =
  /^(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)(?:-([^+]*))?(?:\+(.*))?$/;

// =============================================================================
// VERSION
// =============================================================================

export class Version {
  readonly prerelease: Prerelease;

  constructor(
    readonly major: number,
    readonly minor: number,
    readonly patch: number,
    prerelease: Prerelease = Prerelease.EMPTY,
    readonly build: string = "",
  ) {
    this.prerelease = prerelease;
  }

  static parse(input: string): Version {
    const trimmed = input.trim();
    const match = VERSION_PATTERN.exec(trimmed);
    if (!match) {
      throw new VersionError(
        { kind: "invalid-version", input },
        `"${input}" is not a valid semantic version (expected MAJOR.MINOR.PATCH[-PRE][+BUILD]).`,
      );
    }

    const pre: string | undefined = match[4];
    const build: string | undefined = match[5];
    if (pre === "" || build === "") {
      throw new VersionError(
        { kind: "empty-identifier", input },
        `Empty prerelease or build metadata in "${input}".`,
      );
    }

    return new Version(
      parseCoreNumber(match[1], input),
      parseCoreNumber(match[2], input),
      parseCoreNumber(match[3], input),
      pre === undefined ? Prerelease.EMPTY : Prerelease.parse(pre),
      build === undefined ? "" : parseBuild(build),
    );
  }

  /** Semantic-version precedence; build metadata is ignored. */
  compare(other: Version): number {
    const core =
      Math.sign(this.major - other.major) ||
      Math.sign(this.minor - other.minor) ||
      Math.sign(this.patch - other.patch);
    if (core !== 0) return core;

    const thisEmpty = this.prerelease.isEmpty();
    const otherEmpty = other.prerelease.isEmpty();
    if (thisEmpty && otherEmpty) return 0;
    if (thisEmpty) return 1;
    if (otherEmpty) return -1;
    return this.prerelease.compare(other.prerelease);
  }

  equals(other: Version): boolean {
    return this.toString() === other.toString();
  }

  withPrerelease(prerelease: Prerelease): Version {
    return new Version(this.major, this.minor, this.patch, prerelease, this.build);
  }

  withBuild(build: string): Version {
    return new Version(this.major, this.minor, this.patch, this.prerelease, build);
  }

  bump(kind: BumpKind, options: BumpOptions = {}): Version {
    const force = options.force ?? false;
    let next = this.applyBump(kind, force);

    if (kind !== "pre" && options.prerelease) {
      next = next.withPrerelease(options.prerelease);
    }
    if (options.build !== undefined) {
      next = next.withBuild(parseBuild(options.build));
    }

    if (!force && next.compare(this) <= 0) {
      throw new VersionError(
        { kind: "not-greater", from: this.toString(), to: next.toString() },
        `New version ${next.toString()} is not larger than old version ${this.toString()}.`,
      );
    }

    return next;
  }

  toString(): string {
    let text = `${this.major}.${this.minor}.${this.patch}`;
    if (!this.prerelease.isEmpty()) text += `-${this.prerelease.toString()}`;
    if (this.build.length > 0) text += `+${this.build}`;
    return text;
  }

  private applyBump(kind: BumpKind, force: boolean): Version {
    switch (kind) {
      case "patch":
        return this.prerelease.isEmpty()
          ? new Version(this.major, this.minor, this.patch + 1, Prerelease.EMPTY, this.build)
          : this.withPrerelease(Prerelease.EMPTY);
      case "minor":
        this.assertReleaseLine(kind, force);
        return new Version(this.major, this.minor + 1, 0, Prerelease.EMPTY, this.build);
      case "major":
        this.assertReleaseLine(kind, force);
        return new Version(this.major + 1, 0, 0, Prerelease.EMPTY, this.build);
      case "pre":
        if (this.prerelease.isEmpty()) {
          throw new VersionError(
            { kind: "prerelease-not-set", version: this.toString() },
            "Prerelease not set.",
          );
        }
        return this.withPrerelease(this.prerelease.incrementLast());
    }
  }

  private assertReleaseLine(kind: BumpKind, force: boolean): void {
    if (force || this.prerelease.isEmpty()) return;
    throw new VersionError(
      { kind: "prerelease-not-empty", bump: kind, version: this.toString() },
      `Cannot bump ${kind} of ${this.toString()}: prerelease not empty.`,
    );
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isBumpKind(value: string): value is BumpKind {
  return BUMP_KINDS.some((kind) => kind === value);
}

export function parseBuild(input: string): string {
  if (input.length === 0) return "";

  let offset = 0;
  for (const field of input.split(".")) {
    if (field.length === 0) {
      throw new VersionError(
        { kind: "empty-identifier", input },
        `Empty build metadata field in "${input}" at index ${offset}.`,
      );
    }
    assertIdentifierChars(field, offset, input);
    offset += field.length + 1;
  }
  return input;
}

function parseCoreNumber(part: string, input: string): number {
  const value = Number(part);
  if (!Number.isSafeInteger(value)) {
    throw new VersionError(
      { kind: "numeric-overflow", input },
      `Version component "${part}" in "${input}" is too large.`,
    );
  }
  return value;
}
