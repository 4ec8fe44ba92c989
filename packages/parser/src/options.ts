/**
 * Tunable limits for log parsing.
 */

/** Default character budget for any extracted text blob */
export const DefaultMaxOutputChars = 4000;

/** How many messages before the first error marker are inspected */
export const DefaultContextLookback = 30;

/** How many filtered context lines are kept for the fallback reason */
export const DefaultContextKeep = 20;

export interface ParseOptions {
  readonly maxOutputChars: number;
  readonly contextLookback: number;
  readonly contextKeep: number;
}

export const defaultParseOptions: ParseOptions = Object.freeze({
  maxOutputChars: DefaultMaxOutputChars,
  contextLookback: DefaultContextLookback,
  contextKeep: DefaultContextKeep,
});

/**
 * Fill unset fields with defaults.
 */
export const resolveParseOptions = (
  overrides: Partial<ParseOptions> = {}
): ParseOptions => ({
  maxOutputChars: overrides.maxOutputChars ?? DefaultMaxOutputChars,
  contextLookback: overrides.contextLookback ?? DefaultContextLookback,
  contextKeep: overrides.contextKeep ?? DefaultContextKeep,
});
