/**
 * Line normalization for runner logs.
 *
 * Runner log format:
 * - Lines are prefixed with timestamps: 2024-01-15T10:30:45.1234567Z message
 * - Fetched logs may carry a byte-order mark, sometimes mid-file when logs are concatenated
 *
 * Normalization strips both and trailing whitespace, leaving the message text.
 */

import { splitLines } from "./utils.js";

/**
 * Regex to match the runner's timestamp prefix.
 * Format: 2024-01-15T10:30:45Z or 2024-01-15T10:30:45.1234567Z, followed by optional whitespace.
 */
const TIMESTAMP_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z\s*/;

const BOM_REGEX = /\uFEFF/g;

/**
 * Normalize one raw log line into its message.
 *
 * @example
 * ```typescript
 * normalizeLine("2024-01-01T00:00:00Z Hello"); // "Hello"
 * normalizeLine("plain line   "); // "plain line"
 * ```
 */
export const normalizeLine = (line: string): string =>
  line.replace(BOM_REGEX, "").replace(TIMESTAMP_REGEX, "").trimEnd();

/**
 * Split raw log text into normalized messages.
 */
export const normalizeLog = (text: string): string[] =>
  splitLines(text).map(normalizeLine);
