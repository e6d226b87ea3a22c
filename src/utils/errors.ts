/**
 * Error classes for changegate with user-facing messages
 *
 * Problems inside a validated document are never thrown; they are reported as
 * ValidationError values. These errors cover operational failures only.
 */

export type ErrorCode =
  | 'CHANGE_NOT_FOUND'
  | 'CONFIG_NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'STATE_READ_ERROR'
  | 'STATE_WRITE_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'FILE_READ_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Base error class with code and suggestion
 */
export class ChangegateError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public suggestion?: string
  ) {
    super(message);
    this.name = 'ChangegateError';
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const yellow = useColor ? '\x1b[33m' : '';
    const reset = useColor ? '\x1b[0m' : '';

    let output = `${red}Error [${this.code}]:${reset} ${this.message}`;

    if (this.suggestion) {
      output += `\n\n${yellow}Suggestion:${reset} ${this.suggestion}`;
    }

    return output;
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error factories with predefined messages and suggestions
 */
export const errors = {
  changeNotFound(changeId: string, changesDir: string): ChangegateError {
    return new ChangegateError(
      `Change '${changeId}' not found in ${changesDir}`,
      'CHANGE_NOT_FOUND',
      `Check the change id, or pass --root to point at the project directory.`
    );
  },

  configNotFound(path: string): ChangegateError {
    return new ChangegateError(
      `Configuration file not found at ${path}`,
      'CONFIG_NOT_FOUND',
      `Run 'changegate init' to create a configuration file.`
    );
  },

  invalidConfig(path: string, details?: string): ChangegateError {
    return new ChangegateError(
      `Invalid configuration file at ${path}${details ? `: ${details}` : ''}`,
      'INVALID_CONFIG',
      `Fix the file by hand, or run 'changegate init --force' to rewrite it.`
    );
  },

  stateReadError(path: string, cause?: unknown): ChangegateError {
    return new ChangegateError(
      `Failed to load state record ${path}${cause === undefined ? '' : `: ${reasonOf(cause)}`}`,
      'STATE_READ_ERROR',
      `Repair the YAML, or delete the file to start a fresh record.`
    );
  },

  stateWriteError(path: string, cause?: unknown): ChangegateError {
    return new ChangegateError(
      `Failed to save state record ${path}${cause === undefined ? '' : `: ${reasonOf(cause)}`}`,
      'STATE_WRITE_ERROR',
      `Check that you have write permissions for the change directory.`
    );
  },

  fileWriteError(path: string, reason?: string): ChangegateError {
    return new ChangegateError(
      `Failed to write file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_WRITE_ERROR',
      `Check that you have write permissions for the directory.`
    );
  },

  fileReadError(path: string, reason?: string): ChangegateError {
    return new ChangegateError(
      `Failed to read file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_READ_ERROR',
      `Check that the file exists and you have read permissions.`
    );
  },

  unknown(error: unknown): ChangegateError {
    return new ChangegateError(
      `An unexpected error occurred: ${reasonOf(error)}`,
      'UNKNOWN_ERROR',
      `Re-run with --verbose for more details.`
    );
  },
};

export function isChangegateError(error: unknown): error is ChangegateError {
  return error instanceof ChangegateError;
}

/**
 * Format any error for CLI display
 */
export function formatError(error: unknown, useColor = true): string {
  if (isChangegateError(error)) {
    return error.format(useColor);
  }
  return errors.unknown(error).format(useColor);
}

/**
 * Report an error from a CLI command and mark the process as failed
 */
export function handleError(error: unknown, useColor = process.stdout.isTTY ?? false): void {
  console.error(formatError(error, useColor));
  process.exitCode = 1;
}
