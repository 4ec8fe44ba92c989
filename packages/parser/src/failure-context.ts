/**
 * Fallback failure diagnostics for logs without a structured test report.
 *
 * The runner prints `##[error]` when a step fails, usually right after the
 * tool output that explains why. The lines just before the first marker are
 * the best guess at that explanation once runner housekeeping is filtered out.
 */

import { clampText } from "./clamp.js";
import { errorMarker, failureKeywords, noisePrefixes } from "./markers.js";
import { type ParseOptions, defaultParseOptions } from "./options.js";
import type { FailureContext } from "./types.js";
import { startsWithAny } from "./utils.js";

/**
 * Indices of every message that starts with the generic error marker.
 */
export const findErrorMarkers = (messages: readonly string[]): number[] => {
  const indices: number[] = [];
  messages.forEach((msg, idx) => {
    if (msg.startsWith(errorMarker)) {
      indices.push(idx);
    }
  });
  return indices;
};

const isContextLine = (msg: string): boolean =>
  msg !== "" && !startsWithAny(msg, noisePrefixes);

const mentionsFailure = (line: string): boolean => {
  const lower = line.toLowerCase();
  return failureKeywords.some((keyword) => lower.includes(keyword));
};

/**
 * Pick the reason line: the last line mentioning a failure keyword,
 * or the last line when none does.
 */
const pickReason = (lines: readonly string[]): string => {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (line !== undefined && mentionsFailure(line)) {
      return line;
    }
  }
  return lines.at(-1) ?? "";
};

/**
 * Collect context before the first error marker.
 * Returns undefined when there is no marker or nothing useful precedes it.
 */
export const collectFailureContext = (
  messages: readonly string[],
  errorIndices: readonly number[],
  options: ParseOptions = defaultParseOptions
): FailureContext | undefined => {
  const first = errorIndices[0];
  if (first === undefined) {
    return undefined;
  }

  const start = Math.max(0, first - options.contextLookback);
  const context = messages.slice(start, first).filter(isContextLine);
  if (context.length === 0) {
    return undefined;
  }

  const kept = context.slice(-options.contextKeep);
  return {
    reason: pickReason(kept),
    output: clampText(kept.join("\n").trim(), options.maxOutputChars),
  };
};
