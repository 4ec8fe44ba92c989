import { DefaultMaxOutputChars } from "./options.js";

/**
 * Bound a text blob to `limit` characters, counted by code point so an
 * astral character is never split.
 * Longer text is cut, trailing whitespace at the cut removed, and a marker
 * naming the omitted character count is appended on its own line.
 */
export const clampText = (
  text: string,
  limit: number = DefaultMaxOutputChars
): string => {
  // Every code point takes at least one code unit
  if (text.length <= limit) {
    return text;
  }
  const chars = Array.from(text);
  if (chars.length <= limit) {
    return text;
  }
  const truncated = chars.slice(0, limit).join("").trimEnd();
  const remainder = chars.length - limit;
  return `${truncated}\n... (truncated, ${remainder} more characters)`;
};
