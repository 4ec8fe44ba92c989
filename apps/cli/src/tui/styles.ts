/**
 * Buildlog CLI colors
 *
 * - brand: Logo and headings
 * - muted: Hints, paths
 * - error: Failed builds and fatal errors
 * - warn: Skipped or unreadable files
 * - success: Succeeded builds
 */

export const colors = {
  brand: "#5B9CF5",
  text: "#FFFFFF",
  muted: "#585858",
  error: "#ff5f5f",
  warn: "#ffaf00",
  success: "#00d787",
} as const;

export type ColorName = keyof typeof colors;

/**
 * Converts a hex color to ANSI escape code for true color (24-bit) terminals.
 */
export const hexToAnsi = (hex: string): string => {
  const cleaned = hex.replace("#", "");
  const r = Number.parseInt(cleaned.slice(0, 2), 16);
  const g = Number.parseInt(cleaned.slice(2, 4), 16);
  const b = Number.parseInt(cleaned.slice(4, 6), 16);
  return `\x1b[38;2;${r};${g};${b}m`;
};

export const ANSI_RESET = "\x1b[0m";

interface ColorStream {
  readonly isTTY?: boolean;
}

/**
 * Whether ANSI colors should be written to a stream.
 * NO_COLOR (any non-empty value) always disables them.
 */
export const shouldUseColor = (
  stream: ColorStream = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean => !env.NO_COLOR && Boolean(stream.isTTY);

/**
 * Wraps text in a palette color, or returns it unchanged when colors are off.
 */
export const paint = (
  text: string,
  color: ColorName,
  enabled: boolean = shouldUseColor()
): string => (enabled ? `${hexToAnsi(colors[color])}${text}${ANSI_RESET}` : text);
