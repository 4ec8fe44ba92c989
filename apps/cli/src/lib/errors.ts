/**
 * Base error class for run failures the CLI reports and exits on.
 */
export class BuildlogError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BuildlogError";
    Object.setPrototypeOf(this, BuildlogError.prototype);
  }
}

/**
 * Error thrown when a configuration value is out of range or not a number.
 */
export class ConfigError extends BuildlogError {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`invalid ${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when the summary artifact cannot be written.
 */
export class SummaryWriteError extends BuildlogError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`cannot write summary to ${path}: ${reason}`, { cause });
    this.name = "SummaryWriteError";
    this.path = path;
    Object.setPrototypeOf(this, SummaryWriteError.prototype);
  }
}
