export class AssetwrightError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "AssetwrightError";
  }
}

/**
 * Error codes for programmatic error handling.
 * All error codes are uppercase snake_case.
 */
export const ErrorCodes = {
  CONFIG_ERROR: "CONFIG_ERROR",
  INVALID_CONFIG_FILE: "INVALID_CONFIG_FILE",
  SCHEMA_VALIDATION: "SCHEMA_VALIDATION",
  LOOKUP_ERROR: "LOOKUP_ERROR",
  GIT_ERROR: "GIT_ERROR",
  NOT_GIT_REPO: "NOT_GIT_REPO",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ConfigError extends AssetwrightError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIG_ERROR);
    this.name = "ConfigError";
  }
}

/**
 * Thrown when a configuration file cannot be read or parsed
 * (empty file, unsupported extension, syntax error, missing top-level key).
 */
export class InvalidConfigFileError extends AssetwrightError {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(
      `Error reading configuration file ${filePath}: ${reason}`,
      ErrorCodes.INVALID_CONFIG_FILE,
    );
    this.name = "InvalidConfigFileError";
  }
}

export class SchemaValidationError extends AssetwrightError {
  constructor(message: string) {
    super(message, ErrorCodes.SCHEMA_VALIDATION);
    this.name = "SchemaValidationError";
  }
}

/**
 * Thrown by template filters when a path is not a key of the run's file map.
 */
export class LookupError extends AssetwrightError {
  constructor(public readonly key: string) {
    super(`No compiled path: ${key}`, ErrorCodes.LOOKUP_ERROR);
    this.name = "LookupError";
  }
}

export class GitError extends AssetwrightError {
  constructor(message: string) {
    super(message, ErrorCodes.GIT_ERROR);
    this.name = "GitError";
  }
}

export class NotGitRepoError extends AssetwrightError {
  constructor(message: string) {
    super(message, ErrorCodes.NOT_GIT_REPO);
    this.name = "NotGitRepoError";
  }
}

export function isAssetwrightError(error: unknown): error is AssetwrightError {
  return error instanceof AssetwrightError;
}

export function toExitCode(error: unknown): number {
  if (error === null || error === undefined) {
    return 0;
  }

  return 1;
}

/**
 * Best-effort message extraction for errors thrown by third-party compilers.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
