import { describe, expect, it } from "vitest";
import {
  formatEntryCompact,
  serializeSummary,
  toLogEntryJson,
} from "../serialize.js";
import { createBuildSummary } from "../summary.js";
import type { LogEntry } from "../types.js";

const entry = (
  name: string,
  status: LogEntry["status"],
  extra: Partial<LogEntry> = {}
): LogEntry => ({
  name,
  path: `logs/${name}.txt`,
  status,
  reason: status === "failed" ? "boom" : "ok",
  ...extra,
});

describe("createBuildSummary", () => {
  it("counts statuses and sorts entries by name", () => {
    const summary = createBuildSummary("logs", [
      entry("charlie", "succeeded"),
      entry("alpha", "failed"),
      entry("bravo", "succeeded"),
    ]);

    expect(summary.logDirectory).toBe("logs");
    expect(summary.totalBuilds).toBe(3);
    expect(summary.summary).toEqual({ succeeded: 2, failed: 1 });
    expect(summary.entries.map((e) => e.name)).toEqual([
      "alpha",
      "bravo",
      "charlie",
    ]);
  });

  it("sorts by code point, astral characters after U+FF61", () => {
    const summary = createBuildSummary("logs", [
      entry("\u{1F600}", "succeeded"),
      entry("\uFF61", "succeeded"),
    ]);

    expect(summary.entries.map((e) => e.name)).toEqual(["\uFF61", "\u{1F600}"]);
  });

  it("sorts upper case before lower case", () => {
    const summary = createBuildSummary("logs", [
      entry("b", "succeeded"),
      entry("B", "succeeded"),
      entry("a", "succeeded"),
    ]);

    expect(summary.entries.map((e) => e.name)).toEqual(["B", "a", "b"]);
  });

  it("produces an empty summary for no entries", () => {
    expect(createBuildSummary("missing", [])).toEqual({
      logDirectory: "missing",
      totalBuilds: 0,
      summary: { succeeded: 0, failed: 0 },
      entries: [],
    });
  });
});

describe("toLogEntryJson", () => {
  it("uses wire names in artifact order and omits absent fields", () => {
    const json = toLogEntryJson(
      entry("job", "failed", {
        failureOutput: "trace",
        testTarget: "demo",
        recipe: "r",
        failures: [{ name: "t", status: "failed", output: "trace" }],
        tests: [
          { name: "s", status: "skipped", note: "flaky" },
          { name: "t", status: "failed", output: "trace" },
        ],
      })
    );

    expect(Object.keys(json)).toEqual([
      "name",
      "path",
      "recipe",
      "status",
      "test_target",
      "tests",
      "failures",
      "reason",
      "failure_output",
    ]);
    expect(json.tests).toEqual([
      { name: "s", status: "skipped", note: "flaky" },
      { name: "t", status: "failed", output: "trace" },
    ]);
  });
});

describe("serializeSummary", () => {
  it("renders the artifact with two-space indentation", () => {
    const summary = createBuildSummary("logs", [
      {
        name: "a",
        path: "logs/a.txt",
        status: "succeeded",
        testSummary: { total: 1 },
        reason: "Completed without reported failures.",
      },
    ]);

    expect(serializeSummary(summary)).toBe(
      [
        "{",
        '  "log_directory": "logs",',
        '  "total_builds": 1,',
        '  "summary": {',
        '    "succeeded": 1,',
        '    "failed": 0',
        "  },",
        '  "entries": [',
        "    {",
        '      "name": "a",',
        '      "path": "logs/a.txt",',
        '      "status": "succeeded",',
        '      "test_summary": {',
        '        "total": 1',
        "      },",
        '      "reason": "Completed without reported failures."',
        "    }",
        "  ]",
        "}",
      ].join("\n")
    );
  });

  it("renders compact JSON when pretty printing is off", () => {
    const summary = createBuildSummary("logs", []);

    expect(serializeSummary(summary, { pretty: false })).toBe(
      '{"log_directory":"logs","total_builds":0,"summary":{"succeeded":0,"failed":0},"entries":[]}'
    );
  });
});

describe("formatEntryCompact", () => {
  it("joins name, status and reason", () => {
    expect(formatEntryCompact(entry("job", "failed"))).toBe(
      "job: failed: boom"
    );
  });
});
