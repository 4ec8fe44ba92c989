/**
 * Structured test report parser.
 *
 * Report format (one per test container, possibly repeated when retries are concatenated):
 *
 *   Test Results for demo:
 *     total: 3
 *     passed: 2
 *     failed: 1
 *   Detailed Results:
 *     ✓ caseA
 *     ✗ caseB: some error
 *       output of caseB
 *     ⊝ caseC: skipped
 *
 * Only the last report in a log is used. Everything here is a heuristic over
 * free text: sections end at the first line that does not fit, and whatever
 * was gathered up to that point is kept.
 */

import { clampText } from "./clamp.js";
import {
  detailedResultsHeader,
  glyphStatus,
  isTestGlyph,
  sectionBoundaryPrefixes,
  testReportHeader,
} from "./markers.js";
import { type ParseOptions, defaultParseOptions } from "./options.js";
import {
  type TestBlock,
  type TestRecord,
  type TestStatus,
  TestStatuses,
  type TestSummaryValue,
} from "./types.js";
import { parseSummaryValue, splitOnce, startsWithAny } from "./utils.js";

// ============================================================================
// Header Lookup
// ============================================================================

/**
 * Index of the last test report header, or -1 when the log has none.
 */
export const findLastReportHeader = (messages: readonly string[]): number => {
  for (let i = messages.length - 1; i >= 0; i--) {
    const msg = messages[i];
    if (msg !== undefined && msg.trimStart().startsWith(testReportHeader)) {
      return i;
    }
  }
  return -1;
};

const TRAILING_COLONS_REGEX = /:+$/;

const extractTarget = (headerLine: string): string =>
  headerLine
    .trimStart()
    .slice(testReportHeader.length)
    .trim()
    .replace(TRAILING_COLONS_REGEX, "");

// ============================================================================
// Summary Table
// ============================================================================

interface SummaryScan {
  readonly summary: Map<string, TestSummaryValue>;
  /** Index of the first line after the table */
  readonly next: number;
}

const scanSummaryTable = (
  messages: readonly string[],
  start: number
): SummaryScan => {
  const summary = new Map<string, TestSummaryValue>();
  let idx = start;

  while (idx < messages.length) {
    const msg = (messages[idx] ?? "").trimStart();
    if (!msg) {
      idx++;
      continue;
    }
    if (msg.startsWith(detailedResultsHeader)) {
      idx++;
      break;
    }
    const pair = splitOnce(msg, ":");
    if (!pair) {
      break;
    }
    const [key, value] = pair;
    summary.set(key.trim().toLowerCase(), parseSummaryValue(value));
    idx++;
  }

  return { summary, next: idx };
};

// ============================================================================
// Test Lines
// ============================================================================

const isBoundary = (msg: string): boolean =>
  startsWithAny(msg, sectionBoundaryPrefixes);

/**
 * Split record text into name and note. A note repeating the status word is dropped.
 */
const parseRecordText = (
  rest: string,
  status: TestStatus
): { name: string; note?: string } => {
  const parts = splitOnce(rest, ": ");
  if (!parts) {
    return { name: rest };
  }
  const name = parts[0].trim();
  const note = parts[1].trim();
  if (note && note.toLowerCase() !== status) {
    return { name, note };
  }
  return { name };
};

interface OutputScan {
  readonly lines: string[];
  /** Index of the line that ended the output (not consumed) */
  readonly next: number;
}

/**
 * Greedily collect the lines printed below a failed test.
 */
const collectFailureOutput = (
  messages: readonly string[],
  start: number
): OutputScan => {
  const lines: string[] = [];
  let idx = start;

  while (idx < messages.length) {
    const msg = (messages[idx] ?? "").trimStart();
    if (!msg) {
      lines.push("");
      idx++;
      continue;
    }
    if (isBoundary(msg) || isTestGlyph(msg.charAt(0))) {
      break;
    }
    lines.push(msg);
    idx++;
  }

  return { lines, next: idx };
};

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse the last structured test report in a list of normalized messages.
 * Returns an empty object when the log has no report.
 */
export const parseTestBlock = (
  messages: readonly string[],
  options: ParseOptions = defaultParseOptions
): TestBlock => {
  const headerIdx = findLastReportHeader(messages);
  if (headerIdx === -1) {
    return {};
  }

  const target = extractTarget(messages[headerIdx] ?? "");
  const { summary, next } = scanSummaryTable(messages, headerIdx + 1);
  const tests: TestRecord[] = [];
  const failures: TestRecord[] = [];

  let idx = next;
  while (idx < messages.length) {
    const msg = (messages[idx] ?? "").trimStart();
    if (!msg) {
      idx++;
      continue;
    }
    if (isBoundary(msg)) {
      break;
    }
    const status = glyphStatus(msg.charAt(0));
    if (!status) {
      break;
    }

    const { name, note } = parseRecordText(msg.slice(1).trim(), status);
    idx++;

    if (status !== TestStatuses.Failed) {
      tests.push(
        note === undefined ? { name, status } : { name, status, note }
      );
      continue;
    }

    const scan = collectFailureOutput(messages, idx);
    const output = scan.lines.join("\n").trim();
    const record: TestRecord = {
      name,
      status,
      ...(note === undefined ? {} : { note }),
      ...(output
        ? { output: clampText(output, options.maxOutputChars) }
        : {}),
    };
    tests.push(record);
    failures.push(record);
    idx = scan.next;
  }

  return {
    ...(target ? { testTarget: target } : {}),
    ...(summary.size > 0 ? { testSummary: Object.fromEntries(summary) } : {}),
    ...(tests.length > 0 ? { tests } : {}),
    ...(failures.length > 0 ? { failures } : {}),
  };
};
