import { describe, expect, it } from "vitest";
import { clampText } from "../clamp.js";
import { normalizeLine, normalizeLog } from "../normalize.js";
import { compareCodePoints, splitLines } from "../utils.js";

describe("normalizeLine", () => {
  it("strips a whole-second timestamp", () => {
    expect(normalizeLine("2024-01-01T00:00:00Z Hello")).toBe("Hello");
  });

  it("strips a fractional timestamp", () => {
    expect(normalizeLine("2024-01-15T10:30:45.1234567Z error: failed")).toBe(
      "error: failed"
    );
  });

  it("leaves lines without a timestamp unchanged apart from trailing whitespace", () => {
    expect(normalizeLine("  indented line  \t")).toBe("  indented line");
  });

  it("strips only one leading timestamp", () => {
    expect(
      normalizeLine("2024-01-01T00:00:00Z 2024-01-01T00:00:01Z nested")
    ).toBe("2024-01-01T00:00:01Z nested");
  });

  it("does not strip a timestamp in the middle of a line", () => {
    expect(normalizeLine("at 2024-01-01T00:00:00Z done")).toBe(
      "at 2024-01-01T00:00:00Z done"
    );
  });

  it("removes byte-order marks anywhere in the line", () => {
    expect(normalizeLine("\uFEFF2024-01-01T00:00:00Z a\uFEFFb")).toBe("ab");
  });

  it("turns a timestamp-only line into an empty message", () => {
    expect(normalizeLine("2024-01-01T00:00:00.5Z   ")).toBe("");
  });
});

describe("normalizeLog", () => {
  it("splits on every line break convention", () => {
    expect(normalizeLog("a\r\nb\rc\nd")).toEqual(["a", "b", "c", "d"]);
  });

  it("does not produce a trailing empty line", () => {
    expect(normalizeLog("a\nb\n")).toEqual(["a", "b"]);
  });

  it("keeps interior blank lines", () => {
    expect(normalizeLog("a\n\nb")).toEqual(["a", "", "b"]);
  });
});

describe("splitLines", () => {
  it("returns no lines for empty text", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("treats unicode line separators as breaks", () => {
    expect(splitLines("a\u2028b\u0085c")).toEqual(["a", "b", "c"]);
  });
});

describe("compareCodePoints", () => {
  it("orders by code point rather than code unit", () => {
    expect(compareCodePoints("\uFF61", "\u{1F600}")).toBe(-1);
    expect(compareCodePoints("\u{1F600}", "\uFF61")).toBe(1);
  });

  it("puts a prefix first and treats equal strings as equal", () => {
    expect(compareCodePoints("ab", "abc")).toBe(-1);
    expect(compareCodePoints("abc", "ab")).toBe(1);
    expect(compareCodePoints("abc", "abc")).toBe(0);
  });
});

describe("clampText", () => {
  it("returns text at the limit unchanged", () => {
    const text = "x".repeat(10);
    expect(clampText(text, 10)).toBe(text);
  });

  it("truncates and reports omitted characters", () => {
    expect(clampText("abcdefghij", 4)).toBe(
      "abcd\n... (truncated, 6 more characters)"
    );
  });

  it("removes trailing whitespace at the cut point", () => {
    expect(clampText("ab   cdef", 5)).toBe(
      "ab\n... (truncated, 4 more characters)"
    );
  });

  it("defaults to a 4000 character limit", () => {
    const text = "y".repeat(4001);
    const clamped = clampText(text);
    expect(clamped.startsWith("y".repeat(4000))).toBe(true);
    expect(clamped.endsWith("\n... (truncated, 1 more characters)")).toBe(true);
    expect(clampText("y".repeat(4000))).toBe("y".repeat(4000));
  });

  it("counts astral characters once", () => {
    const rockets = "\u{1F680}".repeat(3000);
    expect(clampText(rockets)).toBe(rockets);
    expect(clampText("\u{1F680}".repeat(4000))).toBe("\u{1F680}".repeat(4000));
  });

  it("never splits a surrogate pair at the cut", () => {
    expect(clampText("a\u{1F680}b", 2)).toBe(
      "a\u{1F680}\n... (truncated, 1 more characters)"
    );
    expect(clampText("\u{1F680}".repeat(5), 3)).toBe(
      `${"\u{1F680}".repeat(3)}\n... (truncated, 2 more characters)`
    );
  });
});
