import { createBuildSummary, parseLog } from "@buildlog/parser";
import { describe, expect, it } from "vitest";
import type { RunResult } from "../runner/types.js";
import { formatDurationMs, formatRunReport } from "./format.js";

describe("formatDurationMs", () => {
  it("formats milliseconds under 60 seconds with decimal", () => {
    expect(formatDurationMs(0)).toBe("0.0s");
    expect(formatDurationMs(1500)).toBe("1.5s");
  });

  it("formats minutes and seconds without decimal", () => {
    expect(formatDurationMs(60_000)).toBe("1m 0s");
    expect(formatDurationMs(90_000)).toBe("1m 30s");
  });
});

describe("formatRunReport", () => {
  const resultFor = (overrides: Partial<RunResult> = {}): RunResult => ({
    summary: createBuildSummary("logs", [
      parseLog("ok", "fine\n"),
      parseLog("broken", "disk full\n##[error]exit 1\n"),
    ]),
    outputPath: "build_summary.json",
    unreadable: [],
    duration: 1500,
    ...overrides,
  });

  it("lists totals and each failed build", () => {
    expect(formatRunReport(resultFor(), false)).toEqual([
      "2 builds: 1 succeeded, 1 failed",
      "  ✗ broken: failed: disk full",
      "Summary written to build_summary.json in 1.5s",
    ]);
  });

  it("reports an empty directory and unreadable files", () => {
    const result = resultFor({
      summary: createBuildSummary("ci", []),
      unreadable: ["ci/x.txt"],
      debugLogPath: "/tmp/run.log",
    });

    expect(formatRunReport(result, false)).toEqual([
      "No build logs found in ci",
      "  ! could not read ci/x.txt",
      "Summary written to build_summary.json in 1.5s",
      "Debug log: /tmp/run.log",
    ]);
  });

  it("adds ANSI colors when enabled", () => {
    const [first] = formatRunReport(resultFor(), true);

    expect(first).toBe(
      "2 builds: \x1b[38;2;0;215;135m1 succeeded\x1b[0m, \x1b[38;2;255;95;95m1 failed\x1b[0m"
    );
  });
});
