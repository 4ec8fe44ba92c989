/**
 * @buildlog/parser - build log summarization library
 *
 * Architecture:
 * - normalize      : raw line cleanup (timestamps, byte-order marks)
 * - test-block     : structured test report extraction
 * - failure-context: fallback diagnostics around generic error markers
 * - entry          : per-file orchestration into a LogEntry
 * - summary        : aggregation of entries into a run summary
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  BuildStatus,
  BuildSummary,
  FailureContext,
  LogEntry,
  LogSource,
  TestBlock,
  TestRecord,
  TestStatus,
  TestSummary,
  TestSummaryValue,
} from "./types.js";

export { BuildStatuses, TestStatuses } from "./types.js";

// ============================================================================
// Options
// ============================================================================

export type { ParseOptions } from "./options.js";
export {
  DefaultContextKeep,
  DefaultContextLookback,
  DefaultMaxOutputChars,
  defaultParseOptions,
  resolveParseOptions,
} from "./options.js";

// ============================================================================
// Scanners
// ============================================================================

export { clampText } from "./clamp.js";
export {
  buildLogEntry,
  extractEnvValue,
  UnknownFailureReason,
  unreadableLogEntry,
} from "./entry.js";
export {
  collectFailureContext,
  findErrorMarkers,
} from "./failure-context.js";
export {
  detailedResultsHeader,
  errorMarker,
  failureKeywords,
  noisePrefixes,
  sectionBoundaryPrefixes,
  testGlyphs,
  testReportHeader,
} from "./markers.js";
export { normalizeLine, normalizeLog } from "./normalize.js";
export { findLastReportHeader, parseTestBlock } from "./test-block.js";

// ============================================================================
// Aggregation & Output
// ============================================================================

export type {
  BuildSummaryJson,
  LogEntryJson,
  SerializeOptions,
  TestRecordJson,
} from "./serialize.js";
export {
  formatEntryCompact,
  serializeSummary,
  toBuildSummaryJson,
  toLogEntryJson,
  toTestRecordJson,
} from "./serialize.js";
export { compareEntriesByName, createBuildSummary } from "./summary.js";
export { compareCodePoints, splitLines } from "./utils.js";

// ============================================================================
// Convenience API for Simple Usage
// ============================================================================

import { buildLogEntry } from "./entry.js";
import type { ParseOptions } from "./options.js";
import { resolveParseOptions } from "./options.js";
import type { LogEntry } from "./types.js";

/**
 * Parse a single log's text into an entry.
 *
 * @example
 * ```typescript
 * import { parseLog } from "@buildlog/parser";
 *
 * const entry = parseLog("job-42", logText);
 * console.log(entry.status, entry.reason);
 * ```
 */
export const parseLog = (
  name: string,
  text: string,
  options: Partial<ParseOptions> = {}
): LogEntry =>
  buildLogEntry({ name, path: name, text }, resolveParseOptions(options));
