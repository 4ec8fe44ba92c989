import { describe, expect, it } from "vitest";
import {
  collectFailureContext,
  findErrorMarkers,
} from "../failure-context.js";
import { resolveParseOptions } from "../options.js";

describe("findErrorMarkers", () => {
  it("finds lines starting with the error marker", () => {
    expect(
      findErrorMarkers(["##[error]a", " ##[error]b", "ok", "##[error]c"])
    ).toEqual([0, 3]);
  });

  it("returns nothing for a clean log", () => {
    expect(findErrorMarkers(["a", "b"])).toEqual([]);
  });
});

describe("collectFailureContext", () => {
  it("returns undefined without error markers", () => {
    expect(collectFailureContext(["a failed"], [])).toBeUndefined();
  });

  it("picks the last line mentioning a failure keyword", () => {
    const messages = [
      "[command]/usr/bin/make",
      "compiling a.c",
      "",
      "ld: cannot find -lfoo",
      "collect2: error: ld returned 1 exit status",
      "make: leaving directory",
      "##[error]Process completed with exit code 2.",
    ];

    const context = collectFailureContext(messages, findErrorMarkers(messages));

    expect(context).toEqual({
      reason: "collect2: error: ld returned 1 exit status",
      output:
        "compiling a.c\nld: cannot find -lfoo\ncollect2: error: ld returned 1 exit status\nmake: leaving directory",
    });
  });

  it("falls back to the last line when no keyword matches", () => {
    const messages = ["step one", "step two", "##[error]boom"];

    expect(collectFailureContext(messages, [2])).toEqual({
      reason: "step two",
      output: "step one\nstep two",
    });
  });

  it("matches keywords case-insensitively", () => {
    const messages = ["Permission DENIED", "cleanup done", "##[error]x"];

    expect(collectFailureContext(messages, [2])?.reason).toBe(
      "Permission DENIED"
    );
  });

  it("returns undefined when only noise precedes the marker", () => {
    const messages = [
      "[command]/usr/bin/git checkout",
      "",
      "Cleaning up orphan processes",
      "env:",
      "##[error]x",
    ];

    expect(collectFailureContext(messages, [4])).toBeUndefined();
  });

  it("uses only the first marker", () => {
    const messages = ["a failed", "##[error]1", "b", "##[error]2"];

    expect(collectFailureContext(messages, [1, 3])).toEqual({
      reason: "a failed",
      output: "a failed",
    });
  });

  it("looks back 30 lines and keeps the last 20", () => {
    const messages = Array.from({ length: 40 }, (_, i) => `line ${i}`);
    messages[15] = "error outside the kept window";
    messages.push("##[error]done");

    const context = collectFailureContext(messages, [40]);

    expect(context?.reason).toBe("line 39");
    expect(context?.output.split("\n")).toHaveLength(20);
    expect(context?.output.split("\n")[0]).toBe("line 20");
  });

  it("honors custom window sizes", () => {
    const messages = ["x failed", "y", "z", "##[error]"];

    expect(
      collectFailureContext(
        messages,
        [3],
        resolveParseOptions({ contextLookback: 2, contextKeep: 1 })
      )
    ).toEqual({ reason: "z", output: "z" });
  });
});
