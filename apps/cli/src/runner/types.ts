import type { BuildSummary, LogEntry, ParseOptions } from "@buildlog/parser";

/**
 * Configuration for summarizing a directory of build logs.
 */
export interface RunConfig {
  /**
   * Directory searched recursively for `*.txt` logs.
   * Reported verbatim as `log_directory` in the artifact.
   */
  readonly logDirectory: string;

  /**
   * Path of the JSON artifact.
   */
  readonly outputPath: string;

  /**
   * Limits handed to the parser for every file.
   */
  readonly parse: ParseOptions;

  /**
   * Maximum number of files read and parsed at the same time.
   */
  readonly concurrency: number;

  /**
   * Write a per-run debug log.
   */
  readonly debug?: boolean;
}

/**
 * Log file selected for parsing.
 */
export interface LogFile {
  /** Path as reported in the entry (log directory joined with the match) */
  readonly path: string;
  /** File name without its extension */
  readonly name: string;
}

/**
 * Result of discovering log files.
 */
export interface DiscoverResult {
  readonly files: readonly LogFile[];
  /** True when the log directory does not exist */
  readonly missingDirectory: boolean;
}

/**
 * Result of parsing every discovered file.
 */
export interface ProcessResult {
  readonly entries: readonly LogEntry[];
  /** Files that could not be read or parsed; each still has an entry */
  readonly unreadable: readonly string[];
}

/**
 * Final result of a run.
 */
export interface RunResult {
  readonly summary: BuildSummary;
  readonly outputPath: string;
  readonly unreadable: readonly string[];
  readonly duration: number;
  /** Path of the debug log, when one was written */
  readonly debugLogPath?: string;
}
