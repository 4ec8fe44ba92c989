import { defineCommand } from "citty";
import {
  type ConfigOverrides,
  loadProjectConfig,
  readEnvOverrides,
  resolveRunConfig,
} from "../lib/config.js";
import { SummaryRunner } from "../runner/index.js";
import { paint, shouldUseColor } from "../tui/styles.js";
import { formatError } from "../utils/error.js";
import { formatRunReport } from "../utils/format.js";

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" && value.length > 0 ? value : undefined;

/**
 * Map parsed flags onto config overrides, leaving out flags not given.
 */
export const flagsToOverrides = (args: Record<string, unknown>): ConfigOverrides => {
  const overrides: ConfigOverrides = {};
  const logDirectory = optionalString(args.logs);
  if (logDirectory !== undefined) {
    overrides.logDirectory = logDirectory;
  }
  const output = optionalString(args.output);
  if (output !== undefined) {
    overrides.output = output;
  }
  const maxOutputChars = optionalString(args["max-output-chars"]);
  if (maxOutputChars !== undefined) {
    overrides.maxOutputChars = maxOutputChars;
  }
  const contextLookback = optionalString(args["context-lookback"]);
  if (contextLookback !== undefined) {
    overrides.contextLookback = contextLookback;
  }
  const contextKeep = optionalString(args["context-keep"]);
  if (contextKeep !== undefined) {
    overrides.contextKeep = contextKeep;
  }
  const concurrency = optionalString(args.concurrency);
  if (concurrency !== undefined) {
    overrides.concurrency = concurrency;
  }
  if (args.debug === true) {
    overrides.debug = true;
  }
  return overrides;
};

export const summarizeCommand = defineCommand({
  meta: {
    name: "summarize",
    description: "Summarize a directory of build logs into a JSON report",
  },
  args: {
    logs: {
      type: "string",
      description: "Directory searched recursively for *.txt logs",
      alias: "l",
    },
    output: {
      type: "string",
      description: "Path of the JSON summary",
      alias: "o",
    },
    "max-output-chars": {
      type: "string",
      description: "Character limit for captured output blocks",
    },
    "context-lookback": {
      type: "string",
      description: "Lines scanned before an error marker",
    },
    "context-keep": {
      type: "string",
      description: "Context lines kept after filtering",
    },
    concurrency: {
      type: "string",
      description: "Log files parsed at the same time",
    },
    debug: {
      type: "boolean",
      description: "Write a debug log to ~/.buildlog/debug",
      default: false,
    },
    quiet: {
      type: "boolean",
      description: "Print nothing on success",
      alias: "q",
      default: false,
    },
  },
  run: async ({ args }) => {
    try {
      const config = resolveRunConfig({
        flags: flagsToOverrides(args),
        env: readEnvOverrides(),
        project: loadProjectConfig(process.cwd()),
      });

      const result = await new SummaryRunner(config).run();

      if (!args.quiet) {
        for (const line of formatRunReport(result, shouldUseColor())) {
          console.log(line);
        }
      }
    } catch (error) {
      console.error(
        paint(`Error: ${formatError(error)}`, "error", shouldUseColor(process.stderr))
      );
      process.exit(1);
    }
  },
});
