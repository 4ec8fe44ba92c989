/**
 * Debug logger for per-run troubleshooting.
 * Stores debug logs in ~/.buildlog/debug/<run-id>.log
 *
 * Per-run files are timestamped line by line and rotated so that only the
 * most recent MAX_LOG_FILES remain.
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { getBuildlogDir } from "../lib/config.js";
import type { RunConfig } from "../runner/types.js";

const DEBUG_DIR_NAME = "debug";
const MAX_LOG_FILES = 10;
const RULE = "=".repeat(80);

/**
 * Generate a run ID from the current time plus a short random suffix.
 */
export const createRunID = (now: Date = new Date()): string => {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..*$/, "");
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${stamp}-${suffix}`;
};

interface LogFileInfo {
  path: string;
  mtime: number;
}

const listLogFiles = (debugDir: string): LogFileInfo[] =>
  readdirSync(debugDir)
    .filter((file) => file.endsWith(".log"))
    .map((file) => {
      const path = join(debugDir, file);
      return { path, mtime: statSync(path).mtime.getTime() };
    })
    .sort((a, b) => b.mtime - a.mtime);

/**
 * Per-run debug logger that writes to <debugDir>/<run-id>.log
 */
export class DebugLogger {
  private readonly logPath: string;
  private closed = false;
  private readonly phaseStartTimes = new Map<string, number>();

  constructor(runID: string, debugDir = join(getBuildlogDir(), DEBUG_DIR_NAME)) {
    this.logPath = this.initializeLogFile(runID, debugDir);
    this.log("DebugLogger initialized");
  }

  private initializeLogFile(runID: string, debugDir: string): string {
    if (!existsSync(debugDir)) {
      mkdirSync(debugDir, { recursive: true, mode: 0o700 });
    }

    this.rotateLogs(debugDir);

    const logPath = join(debugDir, `${runID}.log`);
    const header = `${RULE}\nBuildlog Debug Log\nRun ID: ${runID}\nStarted: ${this.formatTimestamp()}\n${RULE}\n\n`;
    writeFileSync(logPath, header, { mode: 0o600 });

    return logPath;
  }

  /**
   * Deletes the oldest logs, leaving room for the new one.
   * Rotation is best effort: files that vanish or resist deletion are skipped.
   */
  private rotateLogs(debugDir: string): void {
    let logFiles: LogFileInfo[];
    try {
      logFiles = listLogFiles(debugDir);
    } catch {
      return;
    }

    for (const log of logFiles.slice(MAX_LOG_FILES - 1)) {
      try {
        unlinkSync(log.path);
      } catch {
        continue;
      }
    }
  }

  /**
   * Formats a timestamp in ISO 8601 format with local timezone offset.
   */
  private formatTimestamp(): string {
    const now = new Date();
    const offset = -now.getTimezoneOffset();
    const offsetHours = String(Math.floor(Math.abs(offset) / 60)).padStart(
      2,
      "0"
    );
    const offsetMinutes = String(Math.abs(offset) % 60).padStart(2, "0");
    const offsetSign = offset >= 0 ? "+" : "-";

    const iso = now.toISOString().slice(0, -1);
    return `${iso}${offsetSign}${offsetHours}:${offsetMinutes}`;
  }

  /**
   * Logs a message with timestamp. A failed write disables the logger
   * for the rest of the run.
   */
  log(message: string): void {
    if (this.closed) {
      return;
    }

    try {
      appendFileSync(this.logPath, `${this.formatTimestamp()} ${message}\n`);
    } catch {
      this.closed = true;
    }
  }

  logPhase(phase: string, message: string): void {
    this.log(`[${phase}] ${message}`);
  }

  /**
   * Logs an error with stack trace.
   */
  logError(error: unknown, context?: string): void {
    const prefix = context ? `[${context}] ` : "";

    if (error instanceof Error) {
      this.log(`${prefix}Error: ${error.message}`);
      if (error.stack) {
        this.log(`Stack trace:\n${error.stack}`);
      }
    } else {
      this.log(`${prefix}Error: ${String(error)}`);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.log("DebugLogger closed");
    this.log(`${RULE}\n`);
    this.closed = true;
  }

  get path(): string {
    return this.logPath;
  }

  /**
   * Logs the resolved configuration at the start of a run.
   */
  logHeader(config: RunConfig): void {
    this.log(RULE);
    this.log("Configuration:");
    this.log(`  Log directory: ${config.logDirectory}`);
    this.log(`  Output: ${config.outputPath}`);
    this.log(`  Max output chars: ${config.parse.maxOutputChars}`);
    this.log(`  Context lookback: ${config.parse.contextLookback}`);
    this.log(`  Context keep: ${config.parse.contextKeep}`);
    this.log(`  Concurrency: ${config.concurrency}`);
    this.log(`  Node: ${process.version} (${process.platform} ${process.arch})`);
    this.log(RULE);
    this.log("");
  }

  logSection(title: string): void {
    this.log("");
    this.log(RULE);
    this.log(title);
    this.log(RULE);
    this.log("");
  }

  startPhase(phase: string): void {
    this.phaseStartTimes.set(phase, Date.now());
    this.logPhase(phase, "Starting");
  }

  endPhase(phase: string): void {
    const start = this.phaseStartTimes.get(phase);
    if (start !== undefined) {
      this.logPhase(phase, `Completed in ${Date.now() - start}ms`);
      this.phaseStartTimes.delete(phase);
    }
  }
}
