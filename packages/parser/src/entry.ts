/**
 * Log entry builder.
 * Turns one decoded log file into a LogEntry: status, test report, and a
 * one-line reason with failure output attached when the build failed.
 */

import { clampText } from "./clamp.js";
import { collectFailureContext, findErrorMarkers } from "./failure-context.js";
import {
  detectedVersionPrefix,
  recipePrefix,
  versionPrefix,
} from "./markers.js";
import { normalizeLog } from "./normalize.js";
import { type ParseOptions, defaultParseOptions } from "./options.js";
import { parseTestBlock } from "./test-block.js";
import {
  type BuildStatus,
  BuildStatuses,
  type LogEntry,
  type LogSource,
  type TestBlock,
} from "./types.js";

export const UnknownFailureReason = "Build failed for an unknown reason.";

// ============================================================================
// Environment Values
// ============================================================================

/**
 * Value of the first `PREFIX: value` message, trimmed.
 * Empty values count as absent.
 */
export const extractEnvValue = (
  messages: readonly string[],
  prefix: string
): string | undefined => {
  for (const msg of messages) {
    if (msg.startsWith(prefix)) {
      return msg.slice(prefix.length).trim() || undefined;
    }
  }
  return undefined;
};

const extractVersion = (messages: readonly string[]): string | undefined =>
  extractEnvValue(messages, detectedVersionPrefix) ??
  extractEnvValue(messages, versionPrefix);

// ============================================================================
// Reason Derivation
// ============================================================================

interface Outcome {
  readonly reason: string;
  readonly failureOutput?: string;
}

const describeSuccess = (block: TestBlock): string => {
  const summary = block.testSummary;
  if (summary && summary.failed === 0) {
    const { passed, total } = summary;
    if (passed !== undefined && total !== undefined) {
      return `All tests passed (${passed} of ${total}).`;
    }
    if (passed !== undefined) {
      return `All tests passed (${passed}).`;
    }
    return "All tests passed.";
  }
  if (block.tests) {
    return "All tests completed without failures.";
  }
  return "Completed without reported failures.";
};

const describeFailure = (
  messages: readonly string[],
  errorIndices: readonly number[],
  block: TestBlock,
  options: ParseOptions
): Outcome => {
  const failures = block.failures ?? [];
  if (failures.length > 0) {
    const reason = `Tests failed: ${failures.map((f) => f.name).join(", ")}`;
    const outputs = failures.flatMap((f) => (f.output ? [f.output] : []));
    if (outputs.length === 0) {
      return { reason };
    }
    return {
      reason,
      failureOutput: clampText(outputs.join("\n\n"), options.maxOutputChars),
    };
  }

  const context = collectFailureContext(messages, errorIndices, options);
  if (context) {
    return { reason: context.reason, failureOutput: context.output };
  }
  return { reason: UnknownFailureReason };
};

// ============================================================================
// Public API
// ============================================================================

/**
 * Build the entry for one log file. Pure: the same source always yields an equal entry.
 */
export const buildLogEntry = (
  source: LogSource,
  options: ParseOptions = defaultParseOptions
): LogEntry => {
  const messages = normalizeLog(source.text);
  const recipe = extractEnvValue(messages, recipePrefix);
  const version = extractVersion(messages);

  const errorIndices = findErrorMarkers(messages);
  const status: BuildStatus =
    errorIndices.length > 0 ? BuildStatuses.Failed : BuildStatuses.Succeeded;

  const block = parseTestBlock(messages, options);
  const outcome: Outcome =
    status === BuildStatuses.Succeeded
      ? { reason: describeSuccess(block) }
      : describeFailure(messages, errorIndices, block, options);

  return Object.freeze({
    name: source.name,
    path: source.path,
    ...(recipe ? { recipe } : {}),
    ...(version ? { version } : {}),
    status,
    ...block,
    ...outcome,
  });
};

/**
 * Entry for a log that could not be read or parsed.
 */
export const unreadableLogEntry = (
  source: Pick<LogSource, "name" | "path">
): LogEntry =>
  Object.freeze({
    name: source.name,
    path: source.path,
    status: BuildStatuses.Failed,
    reason: UnknownFailureReason,
  });
