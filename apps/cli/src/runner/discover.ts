import { stat } from "node:fs/promises";
import { basename, extname, join, sep } from "node:path";
import { compareCodePoints } from "@buildlog/parser";
import fg from "fast-glob";
import type { DiscoverResult, LogFile } from "./types.js";

const LOG_PATTERN = "**/*.txt";

/** Runner-level log that never describes a build job */
const EXCLUDED_FILE_NAME = "system.txt";

/**
 * Derive an entry name from a log path: the file name without its extension.
 */
export const logNameFromPath = (path: string): string =>
  basename(path, extname(path));

const isExcluded = (path: string): boolean =>
  basename(path).toLowerCase() === EXCLUDED_FILE_NAME;

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Order paths segment by segment, so `a/x.txt` sorts before `a-b/x.txt`.
 */
export const compareLogPaths = (a: string, b: string): number => {
  const aParts = a.split(sep);
  const bParts = b.split(sep);
  const shared = Math.min(aParts.length, bParts.length);
  for (let i = 0; i < shared; i++) {
    const order = compareCodePoints(aParts[i] ?? "", bParts[i] ?? "");
    if (order !== 0) {
      return order;
    }
  }
  return aParts.length - bParts.length;
};

/**
 * Find every eligible log file under a directory, sorted by path.
 * A missing directory yields no files rather than an error.
 */
export const discoverLogFiles = async (
  logDirectory: string
): Promise<DiscoverResult> => {
  if (!(await isDirectory(logDirectory))) {
    return { files: [], missingDirectory: true };
  }

  const matches = await fg(LOG_PATTERN, {
    cwd: logDirectory,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
  });

  const files = matches
    .filter((match) => !isExcluded(match))
    .map((match): LogFile => {
      const path = join(logDirectory, match);
      return { path, name: logNameFromPath(path) };
    })
    .sort((a, b) => compareLogPaths(a.path, b.path));

  return { files, missingDirectory: false };
};
