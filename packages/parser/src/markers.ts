/**
 * Literal markers recognized in build logs.
 * All prefixes are matched with `startsWith` on the normalized message.
 */

import { type TestStatus, TestStatuses } from "./types.js";

// ============================================================================
// Test Report
// ============================================================================

/** Header of a structured test report: `Test Results for <target>:` */
export const testReportHeader = "Test Results for";

/** Ends the summary table and starts the per-test lines */
export const detailedResultsHeader = "Detailed Results:";

/**
 * Leading glyphs of a test line and the status each one stands for.
 */
export const testGlyphs: Readonly<Record<string, TestStatus>> = {
  "✓": TestStatuses.Passed,
  "✗": TestStatuses.Failed,
  "⊝": TestStatuses.Skipped,
};

export const isTestGlyph = (char: string): boolean =>
  Object.hasOwn(testGlyphs, char);

/**
 * Status for a leading glyph, or undefined when the character is not a test glyph.
 */
export const glyphStatus = (char: string): TestStatus | undefined =>
  isTestGlyph(char) ? testGlyphs[char] : undefined;

/**
 * Prefixes that close a run of test lines (and a failed test's output).
 */
export const sectionBoundaryPrefixes: readonly string[] = [
  testReportHeader,
  detailedResultsHeader,
  "##[",
  "[command]",
  "Post job cleanup",
  "shell:",
  "env:",
  "Running test:",
  "Running builtin test:",
  "Using container runtime",
  "Found container",
];

// ============================================================================
// Generic Build Output
// ============================================================================

/** Marker the runner prints when a step fails */
export const errorMarker = "##[error]";

/**
 * Runner housekeeping lines that never explain a failure.
 */
export const noisePrefixes: readonly string[] = [
  "[command]",
  "Post job cleanup",
  "Temporary overriding",
  "Adding repository directory",
  "Cleaning up",
  "shell:",
  "env:",
];

/**
 * Lower-case keywords that make a context line a likely failure reason.
 */
export const failureKeywords: readonly string[] = [
  "error",
  "failed",
  "exception",
  "traceback",
  "abort",
  "denied",
];

// ============================================================================
// Environment Lines
// ============================================================================

export const recipePrefix = "RECIPE:";
export const versionPrefix = "VERSION:";
/** Takes priority over `VERSION:` */
export const detectedVersionPrefix = "Detected version:";
