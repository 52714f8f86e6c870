import { describe, expect, it } from "vitest";

import type { AnsiFormatter } from "../core/error-format.js";
import { Version } from "../core/version.js";

import { formatTaskReport } from "./report.js";

describe("formatTaskReport", () => {
  it("lists both sides of the partition", () => {
    const report = formatTaskReport({
      completed: [{ kind: "bump", packageName: "core", bump: "patch", newVersion: Version.parse("1.0.1") }],
      incomplete: [
        { kind: "push", remote: "origin", tag: "1.0.1" },
        { kind: "delete-tag", name: "1.0.1", version: Version.parse("1.0.1") },
      ],
    });

    expect(report).toBe(
      [
        "Completed:",
        "  ✓ Bump Patch: core -> 1.0.1",
        "Incomplete:",
        "  ✗ Git Push: 1.0.1 to origin",
        "  ✗ Delete Git Tag: 1.0.1",
      ].join("\n"),
    );
  });

  it("marks an empty side", () => {
    expect(formatTaskReport({ completed: [], incomplete: [{ kind: "display-tree" }] })).toBe(
      ["Completed:", "  (none)", "Incomplete:", "  ✗ Print Workspace Tree"].join("\n"),
    );
  });

  it("styles headings and marks through the formatter", () => {
    const tags: AnsiFormatter = (text, styles) => `<${styles.join(",")}>${text}`;

    expect(formatTaskReport({ completed: [{ kind: "display-tree" }], incomplete: [] }, tags)).toBe(
      ["<bold>Completed:", "  <green>✓ Print Workspace Tree", "<bold>Incomplete:", "  <dim>(none)"].join(
        "\n",
      ),
    );
  });
});
