/**
 * Core types for build log summaries.
 * A LogEntry describes one build job, a BuildSummary aggregates every entry of a run.
 */

// ============================================================================
// Build Status
// ============================================================================

/**
 * BuildStatus is the overall outcome of one build job.
 */
export type BuildStatus = "succeeded" | "failed";

export const BuildStatuses = {
  Succeeded: "succeeded" as const,
  Failed: "failed" as const,
};

// ============================================================================
// Test Status
// ============================================================================

/**
 * TestStatus is the outcome of a single test case in a test report.
 * "unknown" is reserved for glyphs the parser recognizes but cannot map.
 */
export type TestStatus = "passed" | "failed" | "skipped" | "unknown";

export const TestStatuses = {
  Passed: "passed" as const,
  Failed: "failed" as const,
  Skipped: "skipped" as const,
  Unknown: "unknown" as const,
};

// ============================================================================
// Records
// ============================================================================

/**
 * TestRecord is one test case parsed from a test report.
 * `output` is only ever set on failed records.
 */
export interface TestRecord {
  readonly name: string;
  readonly status: TestStatus;
  /** Trailing annotation after `name: `, when it differs from the status word */
  readonly note?: string;
  /** Clamped output printed below a failed test */
  readonly output?: string;
}

/**
 * Values of the key/value table printed under a test report header.
 * Integer literals are stored as numbers, everything else as trimmed strings.
 */
export type TestSummaryValue = number | string;

export type TestSummary = Readonly<Record<string, TestSummaryValue>>;

/**
 * TestBlock is everything recovered from one structured test report.
 * Fields are only present when non-empty.
 */
export interface TestBlock {
  readonly testTarget?: string;
  readonly testSummary?: TestSummary;
  readonly tests?: readonly TestRecord[];
  readonly failures?: readonly TestRecord[];
}

/**
 * FailureContext is the fallback diagnostic picked from the lines
 * preceding the first generic error marker.
 */
export interface FailureContext {
  readonly reason: string;
  readonly output: string;
}

// ============================================================================
// Entries
// ============================================================================

/**
 * LogSource is a decoded log file handed to the entry builder.
 */
export interface LogSource {
  /** File name without its extension */
  readonly name: string;
  readonly path: string;
  readonly text: string;
}

/**
 * LogEntry is the parsed result for one build job's log file.
 */
export interface LogEntry extends TestBlock {
  readonly name: string;
  readonly path: string;
  readonly recipe?: string;
  readonly version?: string;
  readonly status: BuildStatus;
  readonly reason: string;
  readonly failureOutput?: string;
}

/**
 * BuildSummary aggregates every entry of one run, sorted by entry name.
 */
export interface BuildSummary {
  readonly logDirectory: string;
  readonly totalBuilds: number;
  readonly summary: {
    readonly succeeded: number;
    readonly failed: number;
  };
  readonly entries: readonly LogEntry[];
}
