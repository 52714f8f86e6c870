import { describe, expect, it } from "vitest";

import { createProcessHandle, formatCommand, type ProcessOutcome } from "./process.js";

function deferred(): {
  promise: Promise<ProcessOutcome>;
  resolve: (outcome: ProcessOutcome) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (outcome: ProcessOutcome) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<ProcessOutcome>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("createProcessHandle", () => {
  it("reports nothing until the process exits", async () => {
    const completion = deferred();
    const handle = createProcessHandle("git push origin tags/1.0.0", completion.promise);

    expect(handle.tryWait()).toBeNull();

    completion.resolve({ exitCode: 0, stdout: "done", stderr: "" });
    await handle.settled;

    expect(handle.tryWait()).toEqual({ kind: "exited", exitCode: 0, stdout: "done", stderr: "" });
  });

  it("keeps non-zero exits with their stderr", async () => {
    const completion = deferred();
    const handle = createProcessHandle("cargo publish", completion.promise);

    completion.resolve({ exitCode: 101, stdout: "", stderr: "error: crate exists" });
    await handle.settled;

    expect(handle.tryWait()).toEqual({
      kind: "exited",
      exitCode: 101,
      stdout: "",
      stderr: "error: crate exists",
    });
  });

  it("turns rejections into error exits and still settles", async () => {
    const completion = deferred();
    const handle = createProcessHandle("git push", completion.promise);

    completion.reject("spawn git ENOENT");
    await handle.settled;

    const exit = handle.tryWait();
    expect(exit?.kind).toBe("error");
    expect(exit?.kind === "error" ? exit.error.message : "").toBe("spawn git ENOENT");
  });
});

describe("formatCommand", () => {
  it("joins the file and arguments", () => {
    expect(formatCommand("git", ["tag", "--delete", "1.0.0"])).toBe("git tag --delete 1.0.0");
  });
});
