/**
 * Parser utilities shared by the scanners.
 */

// ============================================================================
// Prefix Matching
// ============================================================================

/**
 * Check whether a line starts with any of the given prefixes.
 */
export const startsWithAny = (
  line: string,
  prefixes: readonly string[]
): boolean => {
  for (const prefix of prefixes) {
    if (line.startsWith(prefix)) {
      return true;
    }
  }
  return false;
};

// ============================================================================
// Value Parsing
// ============================================================================

/**
 * Integer literal: optional sign, digits, single underscores between digit groups.
 */
const integerLiteralPattern = /^[+-]?\d+(?:_\d+)*$/;

/**
 * Parse a summary table value.
 * Integer literals become numbers (when they fit a safe integer), anything else
 * is returned as the trimmed string.
 */
export const parseSummaryValue = (raw: string): number | string => {
  const value = raw.trim();
  if (!integerLiteralPattern.test(value)) {
    return value;
  }
  const n = Number.parseInt(value.replaceAll("_", ""), 10);
  if (!Number.isSafeInteger(n)) {
    return value;
  }
  // Avoid -0 for "-0"
  return n === 0 ? 0 : n;
};

/**
 * Split once on the first occurrence of a separator.
 * Returns undefined when the separator is absent.
 */
export const splitOnce = (
  s: string,
  separator: string
): [string, string] | undefined => {
  const idx = s.indexOf(separator);
  if (idx === -1) {
    return undefined;
  }
  return [s.slice(0, idx), s.slice(idx + separator.length)];
};

// ============================================================================
// Line Splitting
// ============================================================================

/**
 * Every line boundary a log may use: CRLF, LF, CR, vertical tab, form feed,
 * file/group/record separators, NEL and the Unicode line/paragraph separators.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: intentional line separator matching
const lineBreakPattern = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

/**
 * Split text into lines. A trailing line break does not produce an empty last line.
 */
export const splitLines = (text: string): string[] => {
  if (text === "") {
    return [];
  }
  const lines = text.split(lineBreakPattern);
  if (lines.length > 0 && lines.at(-1) === "") {
    lines.pop();
  }
  return lines;
};

// ============================================================================
// Ordering
// ============================================================================

/**
 * Compare two strings by Unicode code point, independent of locale.
 * Differs from `<` only where astral characters meet U+E000..U+FFFF.
 */
export const compareCodePoints = (a: string, b: string): number => {
  let idx = 0;
  while (idx < a.length && idx < b.length) {
    const ca = a.codePointAt(idx) ?? 0;
    const cb = b.codePointAt(idx) ?? 0;
    if (ca !== cb) {
      return ca < cb ? -1 : 1;
    }
    idx += ca > 0xffff ? 2 : 1;
  }
  if (idx < a.length) {
    return 1;
  }
  if (idx < b.length) {
    return -1;
  }
  return 0;
};
