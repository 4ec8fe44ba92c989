/**
 * Serialization helpers for build summaries.
 * The JSON artifact uses snake_case field names and omits absent fields.
 */

import type {
  BuildStatus,
  BuildSummary,
  LogEntry,
  TestRecord,
  TestStatus,
  TestSummary,
} from "./types.js";

// ============================================================================
// Wire Format
// ============================================================================

export interface TestRecordJson {
  name: string;
  status: TestStatus;
  note?: string;
  output?: string;
}

export interface LogEntryJson {
  name: string;
  path: string;
  recipe?: string;
  version?: string;
  status: BuildStatus;
  test_target?: string;
  test_summary?: TestSummary;
  tests?: TestRecordJson[];
  failures?: TestRecordJson[];
  reason: string;
  failure_output?: string;
}

export interface BuildSummaryJson {
  log_directory: string;
  total_builds: number;
  summary: {
    succeeded: number;
    failed: number;
  };
  entries: LogEntryJson[];
}

/**
 * Convert a test record to its wire shape.
 */
export const toTestRecordJson = (record: TestRecord): TestRecordJson => ({
  name: record.name,
  status: record.status,
  ...(record.note === undefined ? {} : { note: record.note }),
  ...(record.output === undefined ? {} : { output: record.output }),
});

/**
 * Convert a log entry to its wire shape. Keys follow the artifact's field order.
 */
export const toLogEntryJson = (entry: LogEntry): LogEntryJson => ({
  name: entry.name,
  path: entry.path,
  ...(entry.recipe === undefined ? {} : { recipe: entry.recipe }),
  ...(entry.version === undefined ? {} : { version: entry.version }),
  status: entry.status,
  ...(entry.testTarget === undefined ? {} : { test_target: entry.testTarget }),
  ...(entry.testSummary === undefined
    ? {}
    : { test_summary: entry.testSummary }),
  ...(entry.tests === undefined
    ? {}
    : { tests: entry.tests.map(toTestRecordJson) }),
  ...(entry.failures === undefined
    ? {}
    : { failures: entry.failures.map(toTestRecordJson) }),
  reason: entry.reason,
  ...(entry.failureOutput === undefined
    ? {}
    : { failure_output: entry.failureOutput }),
});

/**
 * Convert a run summary to its wire shape.
 */
export const toBuildSummaryJson = (summary: BuildSummary): BuildSummaryJson => ({
  log_directory: summary.logDirectory,
  total_builds: summary.totalBuilds,
  summary: {
    succeeded: summary.summary.succeeded,
    failed: summary.summary.failed,
  },
  entries: summary.entries.map(toLogEntryJson),
});

// ============================================================================
// JSON Serialization
// ============================================================================

/**
 * Options for JSON serialization.
 */
export interface SerializeOptions {
  /** Pretty print with indentation (default: true) */
  readonly pretty?: boolean;
  /** Indentation for pretty printing (default: 2) */
  readonly indent?: number;
}

/**
 * Serialize a run summary to the JSON artifact.
 */
export const serializeSummary = (
  summary: BuildSummary,
  opts: SerializeOptions = {}
): string => {
  const { pretty = true, indent = 2 } = opts;
  const json = toBuildSummaryJson(summary);
  return pretty ? JSON.stringify(json, null, indent) : JSON.stringify(json);
};

// ============================================================================
// Compact Output
// ============================================================================

/**
 * Format an entry as a compact single-line string.
 * Format: name: status: reason
 */
export const formatEntryCompact = (entry: LogEntry): string =>
  [entry.name, entry.status, entry.reason].join(": ");
