import { BuildStatuses, formatEntryCompact } from "@buildlog/parser";
import type { RunResult } from "../runner/types.js";
import { paint } from "../tui/styles.js";

/**
 * Formats a duration in milliseconds to a human-readable string.
 *
 * Examples:
 * - 1500 -> "1.5s"
 * - 90000 -> "1m 30s"
 */
export const formatDurationMs = (ms: number): string => {
  const seconds = ms / 1000;

  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);

  return `${minutes}m ${remainingSeconds}s`;
};

const plural = (count: number, word: string): string =>
  `${count} ${word}${count === 1 ? "" : "s"}`;

/**
 * Lines printed after a run: totals, one line per failed build, any
 * unreadable files, and where the artifact went.
 */
export const formatRunReport = (
  result: RunResult,
  color: boolean
): string[] => {
  const { summary } = result;
  const lines: string[] = [];

  if (summary.totalBuilds === 0) {
    lines.push(paint(`No build logs found in ${summary.logDirectory}`, "warn", color));
  } else {
    const succeeded = paint(`${summary.summary.succeeded} succeeded`, "success", color);
    const failed = paint(
      `${summary.summary.failed} failed`,
      summary.summary.failed > 0 ? "error" : "muted",
      color
    );
    lines.push(`${plural(summary.totalBuilds, "build")}: ${succeeded}, ${failed}`);
  }

  const failures = summary.entries.filter(
    (entry) => entry.status === BuildStatuses.Failed
  );
  for (const entry of failures) {
    lines.push(`  ${paint("✗", "error", color)} ${formatEntryCompact(entry)}`);
  }

  for (const path of result.unreadable) {
    lines.push(`  ${paint("!", "warn", color)} could not read ${path}`);
  }

  lines.push(
    paint(
      `Summary written to ${result.outputPath} in ${formatDurationMs(result.duration)}`,
      "muted",
      color
    )
  );
  if (result.debugLogPath) {
    lines.push(paint(`Debug log: ${result.debugLogPath}`, "muted", color));
  }

  return lines;
};
