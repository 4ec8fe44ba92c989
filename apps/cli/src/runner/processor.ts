import { readFile } from "node:fs/promises";
import {
  buildLogEntry,
  type LogEntry,
  type ParseOptions,
  unreadableLogEntry,
} from "@buildlog/parser";
import type { DebugLogger } from "../utils/debug-logger.js";
import type { LogFile, ProcessResult } from "./types.js";

/**
 * Decode log bytes as UTF-8. Malformed sequences become U+FFFD and a
 * leading byte-order mark is dropped.
 */
export const decodeLog = (bytes: Uint8Array): string =>
  new TextDecoder("utf-8").decode(bytes);

/**
 * Reads and parses log files into entries.
 * A file that cannot be read or parsed still yields an entry, so one bad
 * file never aborts the batch.
 */
export class LogProcessor {
  private readonly parse: ParseOptions;
  private readonly concurrency: number;
  private readonly debugLogger?: DebugLogger;

  constructor(
    parse: ParseOptions,
    concurrency: number,
    debugLogger?: DebugLogger
  ) {
    this.parse = parse;
    this.concurrency = Math.max(1, concurrency);
    this.debugLogger = debugLogger;
  }

  /**
   * Parse one file. Never rejects.
   */
  processFile = async (
    file: LogFile
  ): Promise<{ entry: LogEntry; ok: boolean }> => {
    try {
      const text = decodeLog(await readFile(file.path));
      const entry = buildLogEntry({ ...file, text }, this.parse);
      this.debugLogger?.log(
        `[Process] ${file.path}: ${entry.status} (${entry.reason})`
      );
      return { entry, ok: true };
    } catch (error) {
      this.debugLogger?.logError(error, `Process ${file.path}`);
      return { entry: unreadableLogEntry(file), ok: false };
    }
  };

  /**
   * Parse files in batches of `concurrency`. Results keep the input order.
   */
  process = async (files: readonly LogFile[]): Promise<ProcessResult> => {
    const entries: LogEntry[] = [];
    const unreadable: string[] = [];

    for (let start = 0; start < files.length; start += this.concurrency) {
      const batch = files.slice(start, start + this.concurrency);
      const results = await Promise.all(batch.map(this.processFile));
      results.forEach((result, i) => {
        entries.push(result.entry);
        const file = batch[i];
        if (!result.ok && file) {
          unreadable.push(file.path);
        }
      });
    }

    return { entries, unreadable };
  };
}
