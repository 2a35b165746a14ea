/**
 * Deterministic error codes for the routewright CLI
 *
 * Format: RW_<CATEGORY>_<NUMBER>
 *
 * Diagnostics raised while reading decorators (RW_ARGS, RW_PARAM,
 * RW_CONTRACT, RW_TARGET) live in the compiler. These codes cover failures
 * of the command itself.
 */

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_INVALID: 'RW_CONFIG_001',
  CONFIG_EXISTS: 'RW_CONFIG_002',

  // IO errors (300-399)
  IO_READ_ERROR: 'RW_IO_301',
  IO_WRITE_ERROR: 'RW_IO_302',
  IO_PATH_NOT_FOUND: 'RW_IO_304',

  // CLI errors (400-499)
  CLI_INVALID_ARGUMENT: 'RW_CLI_401',
  CLI_UNKNOWN_DIAGNOSTIC: 'RW_CLI_402',

  // GEN errors (500-599)
  GEN_FAILED: 'RW_GEN_501',
  GEN_STALE_OUTPUT: 'RW_GEN_502',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * User-facing message for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: 'Configuration file is invalid',
  [ErrorCodes.CONFIG_EXISTS]: 'Configuration file already exists',

  [ErrorCodes.IO_READ_ERROR]: 'Failed to read file',
  [ErrorCodes.IO_WRITE_ERROR]: 'Failed to write file',
  [ErrorCodes.IO_PATH_NOT_FOUND]: 'Path not found',

  [ErrorCodes.CLI_INVALID_ARGUMENT]: 'Invalid argument provided',
  [ErrorCodes.CLI_UNKNOWN_DIAGNOSTIC]: 'Unknown diagnostic code',

  [ErrorCodes.GEN_FAILED]: 'Route generation failed',
  [ErrorCodes.GEN_STALE_OUTPUT]: 'Generated routes are out of date',
};

export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: `
Check routewright.config.yaml for mistakes.

Common issues:
- 'include' and 'exclude' must be lists of glob patterns
- 'runtimeModule' must be the module the markers are imported from
- 'testFileHandling.mode' must be "exclude" or "include"

Run with --verbose for more details.
`.trim(),

  [ErrorCodes.CONFIG_EXISTS]: `
A configuration file is already present. Edit it directly, or overwrite it:

  routewright init --force
`.trim(),

  [ErrorCodes.IO_READ_ERROR]: `
Failed to read a file. Check:

1. The file exists and is readable
2. You have permission to read the file
`.trim(),

  [ErrorCodes.IO_WRITE_ERROR]: `
Failed to write a file. Check:

1. The directory exists
2. You have write permission
3. The file is not locked by an editor or another process
`.trim(),

  [ErrorCodes.IO_PATH_NOT_FOUND]: `
The specified path doesn't exist.

Run: pwd && ls to verify your location, or pass --path.
`.trim(),

  [ErrorCodes.CLI_INVALID_ARGUMENT]: `
Invalid command-line argument.

Run: routewright --help

Common commands:
  routewright generate        # Rewrite generated routes in place
  routewright check           # Fail if generated routes are stale
  routewright explain <code>  # Explain a diagnostic code
  routewright init            # Write a default configuration
`.trim(),

  [ErrorCodes.CLI_UNKNOWN_DIAGNOSTIC]: `
List every diagnostic code:

  routewright explain --list
`.trim(),

  [ErrorCodes.GEN_FAILED]: `
Generation stopped before any file was written.

Run with --verbose to see the underlying error.
`.trim(),

  [ErrorCodes.GEN_STALE_OUTPUT]: `
At least one file's generated region differs from what the decorators produce.

Regenerate and commit the result:

  routewright generate
`.trim(),
};

/**
 * Structured CLI Error with deterministic error code
 */
export class CLIError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: { details?: unknown; cause?: Error }) {
    super(message ?? ErrorMessages[code], { cause: options?.cause });

    this.name = 'CLIError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    Error.captureStackTrace?.(this, CLIError);
  }

  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
      if (this.cause.stack) {
        parts.push(`\n${this.cause.stack}`);
      }
    }

    return parts.join('');
  }

  toUserStringWithRemediation(): string {
    const indented = this.getRemediation()
      .split('\n')
      .map((line) => `  ${line}`)
      .join('\n');
    return `${this.toUserString()}\n\nHow to fix:\n${indented}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause ? { message: this.cause.message, stack: this.cause.stack } : undefined,
    };
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Wrap an unknown error in a CLIError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CLIError(code, message, { cause });
}
