import { createBuildSummary } from "@buildlog/parser";
import { createRunID, DebugLogger } from "../utils/debug-logger.js";
import { discoverLogFiles } from "./discover.js";
import { LogProcessor } from "./processor.js";
import type { DiscoverResult, ProcessResult, RunConfig, RunResult } from "./types.js";
import { writeSummary } from "./writer.js";

export interface SummaryRunnerOptions {
  /** Logger to use instead of creating one when `config.debug` is set */
  readonly debugLogger?: DebugLogger;
}

/**
 * Orchestrates one summarization run:
 * 1. Discover: Find eligible logs under the log directory
 * 2. Process: Parse each log into an entry
 * 3. Write: Aggregate entries and write the JSON artifact
 */
export class SummaryRunner {
  private readonly config: RunConfig;
  private debugLogger?: DebugLogger;
  private startTime = 0;

  constructor(config: RunConfig, options: SummaryRunnerOptions = {}) {
    this.config = config;
    this.debugLogger = options.debugLogger;
  }

  private readonly initializeDebugLogger = (): void => {
    if (!this.debugLogger && this.config.debug) {
      this.debugLogger = new DebugLogger(createRunID());
    }
    this.debugLogger?.logHeader(this.config);
  };

  private readonly runDiscoverPhase = async (): Promise<DiscoverResult> => {
    this.debugLogger?.logSection("DISCOVERY");
    this.debugLogger?.startPhase("Discover");

    const result = await discoverLogFiles(this.config.logDirectory);

    this.debugLogger?.endPhase("Discover");
    if (result.missingDirectory) {
      this.debugLogger?.log(
        `Log directory not found: ${this.config.logDirectory}`
      );
    }
    this.debugLogger?.log(`Found ${result.files.length} log file(s)`);

    return result;
  };

  private readonly runProcessPhase = async (
    discovered: DiscoverResult
  ): Promise<ProcessResult> => {
    this.debugLogger?.logSection("PARSING");
    this.debugLogger?.startPhase("Process");

    const processor = new LogProcessor(
      this.config.parse,
      this.config.concurrency,
      this.debugLogger
    );
    const result = await processor.process(discovered.files);

    this.debugLogger?.endPhase("Process");
    if (result.unreadable.length > 0) {
      this.debugLogger?.log(`Unreadable: ${result.unreadable.join(", ")}`);
    }

    return result;
  };

  /**
   * Runs discovery, parsing and writing.
   *
   * @throws SummaryWriteError when the artifact cannot be written
   */
  run = async (): Promise<RunResult> => {
    this.startTime = Date.now();

    try {
      this.initializeDebugLogger();

      const discovered = await this.runDiscoverPhase();
      const processed = await this.runProcessPhase(discovered);
      const summary = createBuildSummary(
        this.config.logDirectory,
        processed.entries
      );

      this.debugLogger?.logSection("WRITE");
      this.debugLogger?.startPhase("Write");
      await writeSummary(summary, this.config.outputPath);
      this.debugLogger?.endPhase("Write");

      const duration = Date.now() - this.startTime;
      this.debugLogger?.logSection("SUMMARY");
      this.debugLogger?.log(`Total builds: ${summary.totalBuilds}`);
      this.debugLogger?.log(`Succeeded: ${summary.summary.succeeded}`);
      this.debugLogger?.log(`Failed: ${summary.summary.failed}`);
      this.debugLogger?.log(`Total duration: ${duration}ms`);

      return {
        summary,
        outputPath: this.config.outputPath,
        unreadable: processed.unreadable,
        duration,
        ...(this.debugLogger ? { debugLogPath: this.debugLogger.path } : {}),
      };
    } catch (error) {
      this.debugLogger?.logError(error, "RunError");
      throw error;
    } finally {
      this.debugLogger?.close();
    }
  };
}
