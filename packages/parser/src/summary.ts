import { type BuildSummary, BuildStatuses, type LogEntry } from "./types.js";
import { compareCodePoints } from "./utils.js";

/**
 * Order entries by name using code-point comparison, independent of locale.
 */
export const compareEntriesByName = (a: LogEntry, b: LogEntry): number =>
  compareCodePoints(a.name, b.name);

/**
 * Aggregate entries into a run summary.
 * Entries may arrive in any order; the summary lists them sorted by name.
 */
export const createBuildSummary = (
  logDirectory: string,
  entries: readonly LogEntry[]
): BuildSummary => {
  const sorted = [...entries].sort(compareEntriesByName);

  let succeeded = 0;
  let failed = 0;
  for (const entry of sorted) {
    if (entry.status === BuildStatuses.Succeeded) {
      succeeded++;
    } else if (entry.status === BuildStatuses.Failed) {
      failed++;
    }
  }

  return {
    logDirectory,
    totalBuilds: sorted.length,
    summary: { succeeded, failed },
    entries: sorted,
  };
};
