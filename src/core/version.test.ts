import { describe, expect, it } from "vitest";

import { VersionError } from "./errors.js";
import { Prerelease } from "./prerelease.js";
import { BUMP_KINDS, Version, isBumpKind, parseBuild, type BumpKind } from "./version.js";

function catchVersionError(fn: () => unknown): VersionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof VersionError) return error;
    throw error;
  }
  throw new Error("expected a VersionError");
}

const v = (input: string): Version => Version.parse(input);

// =============================================================================
// PARSING
// =============================================================================

describe("Version.parse", () => {
  it("parses the full grammar", () => {
    const version = v("1.2.3-rc.1+build.5");

    expect(version.major).toBe(1);
    expect(version.minor).toBe(2);
    expect(version.patch).toBe(3);
    expect(version.prerelease.toString()).toBe("rc.1");
    expect(version.build).toBe("build.5");
    expect(version.toString()).toBe("1.2.3-rc.1+build.5");
  });

  it.each(["1.2", "v1.2.3", "01.2.3", "1.2.3.4", "", "1.2.x"])("rejects %j", (input) => {
    expect(catchVersionError(() => v(input)).kind).toBe("invalid-version");
  });

  it("rejects an empty prerelease or build", () => {
    expect(catchVersionError(() => v("1.2.3-")).kind).toBe("empty-identifier");
    expect(catchVersionError(() => v("1.2.3+")).kind).toBe("empty-identifier");
  });

  it("reports invalid prerelease characters", () => {
    expect(catchVersionError(() => v("1.0.0-al$pha")).detail).toEqual({
      kind: "invalid-identifier",
      input: "al$pha",
      character: "$",
      index: 2,
    });
  });
});

// =============================================================================
// ORDERING
// =============================================================================

describe("Version.compare", () => {
  it("orders by major, minor, patch then prerelease", () => {
    const ordered = [
      "1.0.0-alpha",
      "1.0.0-alpha.1",
      "1.0.0-alpha.beta",
      "1.0.0-beta",
      "1.0.0-beta.2",
      "1.0.0-beta.11",
      "1.0.0-rc.1",
      "1.0.0",
      "1.0.1",
      "1.1.0",
      "2.0.0",
    ].map(v);

    for (let i = 1; i < ordered.length; i += 1) {
      expect(ordered[i - 1].compare(ordered[i])).toBe(-1);
      expect(ordered[i].compare(ordered[i - 1])).toBe(1);
    }
  });

  it("ignores build metadata", () => {
    expect(v("1.0.0+a").compare(v("1.0.0+b"))).toBe(0);
  });
});

describe("Prerelease.compare", () => {
  it("ranks a longer sequence above its equal prefix", () => {
    expect(Prerelease.parse("1").compare(Prerelease.parse("1.0"))).toBe(-1);
    expect(Prerelease.parse("1.0").compare(Prerelease.parse("1"))).toBe(1);
  });

  it("compares field by field", () => {
    expect(Prerelease.parse("alpha.2").compare(Prerelease.parse("alpha.10"))).toBe(-1);
    expect(Prerelease.parse("alpha.2").compare(Prerelease.parse("alpha.2"))).toBe(0);
  });
});

// =============================================================================
// BUMPS
// =============================================================================

describe("Version.bump", () => {
  it("increments patch without a prerelease", () => {
    expect(v("1.2.3").bump("patch").toString()).toBe("1.2.4");
  });

  it("graduates a prerelease on patch without touching the patch number", () => {
    expect(v("1.2.3-rc.2").bump("patch").toString()).toBe("1.2.3");
  });

  it("bumps minor and major and zeroes lower fields", () => {
    expect(v("1.2.3").bump("minor").toString()).toBe("1.3.0");
    expect(v("1.2.3").bump("major").toString()).toBe("2.0.0");
  });

  it("refuses a minor bump over a prerelease unless forced", () => {
    const error = catchVersionError(() => v("0.1.1-alpha.2").bump("minor"));

    expect(error.detail).toEqual({
      kind: "prerelease-not-empty",
      bump: "minor",
      version: "0.1.1-alpha.2",
    });
    expect(error.message).toContain("prerelease not empty");
    expect(v("0.1.1-alpha.2").bump("minor", { force: true }).toString()).toBe("0.2.0");
  });

  it("names the major bump when it is refused", () => {
    const error = catchVersionError(() => v("1.0.0-rc.1").bump("major"));

    expect(error.detail).toEqual({
      kind: "prerelease-not-empty",
      bump: "major",
      version: "1.0.0-rc.1",
    });
  });

  it("refuses a pre bump without a prerelease, even when forced", () => {
    expect(catchVersionError(() => v("1.0.0").bump("pre")).message).toBe("Prerelease not set.");
    expect(catchVersionError(() => v("1.0.0").bump("pre", { force: true })).kind).toBe(
      "prerelease-not-set",
    );
  });

  it("increments the last prerelease field", () => {
    expect(v("1.0.0-alpha.2").bump("pre").toString()).toBe("1.0.0-alpha.3");
    expect(v("1.0.0-rc.1.9").bump("pre").toString()).toBe("1.0.0-rc.1.10");
    expect(v("1.0.0-4").bump("pre").toString()).toBe("1.0.0-5");
  });

  it("reports the span of a non-numeric last field", () => {
    const error = catchVersionError(() => v("1.0.0-alpha.beta").bump("pre"));

    expect(error.detail).toEqual({
      kind: "non-numeric-prerelease",
      prerelease: "alpha.beta",
      span: { start: 6, end: 10 },
    });
  });

  it("applies prerelease and build overrides after the bump", () => {
    const next = v("1.2.3").bump("minor", {
      prerelease: Prerelease.parse("beta.0"),
      build: "sha.abc",
    });

    expect(next.toString()).toBe("1.3.0-beta.0+sha.abc");
  });

  it("ignores a prerelease override on a pre bump", () => {
    const next = v("1.0.0-alpha.1").bump("pre", { prerelease: Prerelease.parse("rc.0") });

    expect(next.toString()).toBe("1.0.0-alpha.2");
  });

  it("fails when an override makes the version go backwards", () => {
    const error = catchVersionError(() =>
      v("1.0.0-beta.1").bump("patch", { prerelease: Prerelease.parse("alpha.0") }),
    );

    expect(error.detail).toEqual({ kind: "not-greater", from: "1.0.0-beta.1", to: "1.0.0-alpha.0" });
  });

  it("skips the ordering check when forced", () => {
    const next = v("1.0.0-beta.1").bump("patch", {
      prerelease: Prerelease.parse("alpha.0"),
      force: true,
    });

    expect(next.toString()).toBe("1.0.0-alpha.0");
  });

  it("always produces a strictly greater version when not forced", () => {
    const inputs = ["0.0.0", "0.1.1-alpha.2", "1.0.0-rc.1", "3.9.9", "1.0.0-0", "2.4.6+meta"];

    for (const input of inputs) {
      for (const kind of BUMP_KINDS) {
        let next: Version;
        try {
          next = v(input).bump(kind);
        } catch (error) {
          if (error instanceof VersionError) continue;
          throw error;
        }
        expect(next.compare(v(input))).toBe(1);
      }
    }
  });
});

describe("helpers", () => {
  it("recognizes bump kinds", () => {
    const kinds: string[] = ["patch", "minor", "major", "pre", "set"];
    expect(kinds.filter(isBumpKind)).toEqual<BumpKind[]>(["patch", "minor", "major", "pre"]);
  });

  it("validates build metadata", () => {
    expect(parseBuild("exp.sha.5114f85")).toBe("exp.sha.5114f85");
    expect(catchVersionError(() => parseBuild("a..b")).kind).toBe("empty-identifier");
  });
});
