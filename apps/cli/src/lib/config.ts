/**
 * Config management for the buildlog CLI
 *
 * Sources, highest priority first:
 * - Command-line flags
 * - Environment variables (BUILDLOG_*), optionally loaded from .env
 * - Project file: .buildlog/config.json in the working directory
 * - Built-in defaults
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  DefaultContextKeep,
  DefaultContextLookback,
  DefaultMaxOutputChars,
} from "@buildlog/parser";
import type { RunConfig } from "../runner/types.js";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * ProjectConfig is the raw structure read from .buildlog/config.json
 */
export interface ProjectConfig {
  $schema?: string;
  logDirectory?: string;
  output?: string;
  maxOutputChars?: number;
  contextLookback?: number;
  contextKeep?: number;
  concurrency?: number;
}

/**
 * Values that can come from flags or the environment.
 * Numbers arrive as strings and are validated during resolution.
 */
export interface ConfigOverrides {
  logDirectory?: string;
  output?: string;
  maxOutputChars?: string;
  contextLookback?: string;
  contextKeep?: string;
  concurrency?: string;
  debug?: boolean;
}

export interface ConfigLoadResult {
  config: ProjectConfig;
  error?: string;
}

// ============================================================================
// Constants
// ============================================================================

const BUILDLOG_DIR_NAME = ".buildlog";
const PROJECT_CONFIG_FILE = "config.json";

const DEFAULT_LOG_DIRECTORY = "logs";
const DEFAULT_OUTPUT = "build_summary.json";
const DEFAULT_CONCURRENCY = 8;

const MIN_OUTPUT_CHARS = 100;
const MAX_OUTPUT_CHARS = 1_000_000;
const MIN_LOOKBACK = 1;
const MAX_LOOKBACK = 1000;
const MIN_CONCURRENCY = 1;
const MAX_CONCURRENCY = 64;

const INTEGER_PATTERN = /^\d+$/;
const WINDOWS_DRIVE_PATTERN = /^[A-Za-z]:\\/;
const TRUTHY_VALUES = new Set(["1", "true", "yes", "on"]);

export const ENV_KEYS = {
  logDirectory: "BUILDLOG_LOG_DIR",
  output: "BUILDLOG_OUTPUT",
  maxOutputChars: "BUILDLOG_MAX_OUTPUT_CHARS",
  contextLookback: "BUILDLOG_CONTEXT_LOOKBACK",
  contextKeep: "BUILDLOG_CONTEXT_KEEP",
  concurrency: "BUILDLOG_CONCURRENCY",
  debug: "BUILDLOG_DEBUG",
  home: "BUILDLOG_HOME",
} as const;

// ============================================================================
// Path Helpers
// ============================================================================

const validateOverridePath = (path: string): string | null => {
  if (path.includes("..")) {
    return null;
  }
  if (!(path.startsWith("/") || WINDOWS_DRIVE_PATTERN.test(path))) {
    return null;
  }
  return path;
};

/**
 * Gets the global buildlog directory (~/.buildlog), used for debug logs.
 * BUILDLOG_HOME replaces the home directory when it is an absolute path.
 */
export const getBuildlogDir = (env: NodeJS.ProcessEnv = process.env): string => {
  const override = env[ENV_KEYS.home];
  if (override) {
    const validated = validateOverridePath(override);
    if (validated) {
      return join(validated, BUILDLOG_DIR_NAME);
    }
  }
  return join(homedir(), BUILDLOG_DIR_NAME);
};

/**
 * Gets the path to the project config file (<cwd>/.buildlog/config.json)
 */
export const getProjectConfigPath = (cwd: string): string =>
  join(cwd, BUILDLOG_DIR_NAME, PROJECT_CONFIG_FILE);

// ============================================================================
// Config Loading
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const STRING_KEYS = ["$schema", "logDirectory", "output"] as const;
const NUMBER_KEYS = [
  "maxOutputChars",
  "contextLookback",
  "contextKeep",
  "concurrency",
] as const;

/**
 * Validate the shape of parsed config JSON. Unknown keys are ignored.
 * Returns an error message for the first field with the wrong type.
 */
export const parseProjectConfig = (
  data: unknown
): { config: ProjectConfig; error?: string } => {
  if (!isRecord(data)) {
    return { config: {}, error: "config must be a JSON object" };
  }

  const config: ProjectConfig = {};
  for (const key of STRING_KEYS) {
    const value = data[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "string") {
      return { config: {}, error: `${key} must be a string` };
    }
    config[key] = value;
  }
  for (const key of NUMBER_KEYS) {
    const value = data[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "number") {
      return { config: {}, error: `${key} must be a number` };
    }
    config[key] = value;
  }
  return { config };
};

/**
 * Loads the project config with detailed error information.
 * Missing or empty files are an empty config, not an error.
 */
export const loadProjectConfigSafe = (cwd: string): ConfigLoadResult => {
  const configPath = getProjectConfigPath(cwd);

  if (!existsSync(configPath)) {
    return { config: {} };
  }

  let data: string;
  try {
    data = readFileSync(configPath, "utf-8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "EACCES") {
      return {
        config: {},
        error: `cannot read config at ${configPath}: permission denied`,
      };
    }
    if (code === "EISDIR") {
      return {
        config: {},
        error: `cannot read config at ${configPath}: path is a directory`,
      };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { config: {}, error: `cannot read config at ${configPath}: ${message}` };
  }

  if (!data.trim()) {
    return { config: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return { config: {}, error: `config at ${configPath} is not valid JSON` };
  }

  const result = parseProjectConfig(parsed);
  if (result.error) {
    return { config: {}, error: `config at ${configPath}: ${result.error}` };
  }
  return result;
};

/**
 * Loads the project config, warning on stderr for corrupted or unreadable files.
 */
export const loadProjectConfig = (cwd: string): ProjectConfig => {
  const result = loadProjectConfigSafe(cwd);
  if (result.error) {
    console.error(`warning: ${result.error}`);
  }
  return result.config;
};

/**
 * Reads overrides from BUILDLOG_* environment variables.
 */
export const readEnvOverrides = (
  env: NodeJS.ProcessEnv = process.env
): ConfigOverrides => {
  const overrides: ConfigOverrides = {};
  const logDirectory = env[ENV_KEYS.logDirectory];
  if (logDirectory) {
    overrides.logDirectory = logDirectory;
  }
  const output = env[ENV_KEYS.output];
  if (output) {
    overrides.output = output;
  }
  const maxOutputChars = env[ENV_KEYS.maxOutputChars];
  if (maxOutputChars) {
    overrides.maxOutputChars = maxOutputChars;
  }
  const contextLookback = env[ENV_KEYS.contextLookback];
  if (contextLookback) {
    overrides.contextLookback = contextLookback;
  }
  const contextKeep = env[ENV_KEYS.contextKeep];
  if (contextKeep) {
    overrides.contextKeep = contextKeep;
  }
  const concurrency = env[ENV_KEYS.concurrency];
  if (concurrency) {
    overrides.concurrency = concurrency;
  }
  const debug = env[ENV_KEYS.debug];
  if (debug !== undefined) {
    overrides.debug = TRUTHY_VALUES.has(debug.trim().toLowerCase());
  }
  return overrides;
};

// ============================================================================
// Validation
// ============================================================================

/**
 * Parse an integer setting from a flag/env string or a config file number.
 */
export const parseIntegerSetting = (
  key: string,
  value: string | number | undefined
): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new ConfigError(key, `expected a whole number, got ${value}`);
    }
    return value;
  }
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ConfigError(key, `expected a whole number, got "${value}"`);
  }
  return Number.parseInt(trimmed, 10);
};

const checkRange = (
  key: string,
  value: number,
  min: number,
  max: number
): number => {
  if (value < min || value > max) {
    throw new ConfigError(key, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
};

// ============================================================================
// Resolution
// ============================================================================

export interface ResolveOptions {
  /** Flags from the command line */
  readonly flags?: ConfigOverrides;
  /** Values from the environment */
  readonly env?: ConfigOverrides;
  /** Contents of the project config file */
  readonly project?: ProjectConfig;
}

/**
 * Merge every configuration source into a validated RunConfig.
 *
 * @throws ConfigError when a numeric setting is malformed or out of range
 */
export const resolveRunConfig = ({
  flags = {},
  env = {},
  project = {},
}: ResolveOptions = {}): RunConfig => {
  const pick = <K extends keyof ConfigOverrides & keyof ProjectConfig>(
    key: K
  ): ConfigOverrides[K] | ProjectConfig[K] =>
    flags[key] ?? env[key] ?? project[key];

  const maxOutputChars = checkRange(
    "maxOutputChars",
    parseIntegerSetting("maxOutputChars", pick("maxOutputChars")) ??
      DefaultMaxOutputChars,
    MIN_OUTPUT_CHARS,
    MAX_OUTPUT_CHARS
  );
  const contextLookback = checkRange(
    "contextLookback",
    parseIntegerSetting("contextLookback", pick("contextLookback")) ??
      DefaultContextLookback,
    MIN_LOOKBACK,
    MAX_LOOKBACK
  );
  const contextKeep = checkRange(
    "contextKeep",
    parseIntegerSetting("contextKeep", pick("contextKeep")) ??
      Math.min(DefaultContextKeep, contextLookback),
    MIN_LOOKBACK,
    contextLookback
  );
  const concurrency = checkRange(
    "concurrency",
    parseIntegerSetting("concurrency", pick("concurrency")) ??
      DEFAULT_CONCURRENCY,
    MIN_CONCURRENCY,
    MAX_CONCURRENCY
  );

  return {
    logDirectory: pick("logDirectory") ?? DEFAULT_LOG_DIRECTORY,
    outputPath: pick("output") ?? DEFAULT_OUTPUT,
    parse: { maxOutputChars, contextLookback, contextKeep },
    concurrency,
    debug: flags.debug ?? env.debug ?? false,
  };
};
